import { NotFoundError } from "./errors";
import { KeyedMutex } from "./lock";
import { ConversationSession } from "./session";
import { safeLog } from "../utils/logging";

export type SessionStoreOptions = {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  now?: () => Date;
};

/**
 * Owns every live conversation for the lifetime of the process. Creation is
 * synchronous, so two first messages for the same id can never both create.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly mutex = new KeyedMutex();
  private readonly now: () => Date;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  resolve(conversationId: string): ConversationSession {
    const existing = this.sessions.get(conversationId);
    if (existing) return existing;
    const fresh = new ConversationSession(conversationId, this.now());
    this.sessions.set(conversationId, fresh);
    safeLog(`[STORE] created ${conversationId} (live=${this.sessions.size})`);
    return fresh;
  }

  get(conversationId: string): ConversationSession {
    const session = this.sessions.get(conversationId);
    if (!session) throw new NotFoundError(`Conversation ${conversationId} not found`);
    return session;
  }

  delete(conversationId: string): void {
    if (!this.sessions.delete(conversationId)) {
      throw new NotFoundError(`Conversation ${conversationId} not found`);
    }
  }

  /**
   * Runs one request cycle with exclusive access to the conversation. The
   * session is resolved inside the critical section so a concurrent delete or
   * eviction cannot hand out a detached session.
   */
  runExclusive<T>(conversationId: string, task: (session: ConversationSession) => Promise<T>): Promise<T> {
    return this.mutex.run(conversationId, () => task(this.resolve(conversationId)));
  }

  evictIdle(now: Date = this.now()): string[] {
    if (this.options.idleTimeoutMs <= 0) return [];
    const evicted: string[] = [];
    for (const [id, session] of this.sessions) {
      if (this.mutex.isLocked(id)) continue;
      if (now.getTime() - session.lastActivityAt.getTime() < this.options.idleTimeoutMs) continue;
      this.sessions.delete(id);
      evicted.push(id);
    }
    if (evicted.length > 0) {
      safeLog(`[STORE] evicted ${evicted.length} idle conversation(s) (live=${this.sessions.size})`);
    }
    return evicted;
  }

  startEviction(): void {
    if (this.sweeper || this.options.idleTimeoutMs <= 0) return;
    this.sweeper = setInterval(() => {
      this.evictIdle();
    }, this.options.sweepIntervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (!this.sweeper) return;
    clearInterval(this.sweeper);
    this.sweeper = null;
  }
}
