import axios, { AxiosInstance } from "axios";
import type { WireIntelligence } from "../utils/schema";
import type { TerminationReason } from "../utils/types";
import { describeError, safeLog, safeWarn } from "../utils/logging";

export type FinalReportPayload = {
  conversation_id: string;
  scam_detected: boolean;
  confidence_score: number;
  total_messages_exchanged: number;
  extracted_intelligence: WireIntelligence;
  end_reason: TerminationReason;
};

export type ReportResult = {
  ok: boolean;
  attempts: number;
  status?: number;
};

export interface FinalReporter {
  report(payload: FinalReportPayload): Promise<ReportResult>;
}

export class DisabledReporter implements FinalReporter {
  async report(): Promise<ReportResult> {
    return { ok: false, attempts: 0 };
  }
}

/**
 * Posts the final intelligence of an ended conversation. Never rejects:
 * delivery problems are logged and reported in the result.
 */
export class HttpFinalReporter implements FinalReporter {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly maxAttempts: number = 3,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  async report(payload: FinalReportPayload): Promise<ReportResult> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        const response = await this.http.post(this.url, payload, {
          timeout: this.timeoutMs,
          headers: { "Content-Type": "application/json" }
        });
        safeLog(`[CALLBACK] ${payload.conversation_id} delivered (status=${response.status}, attempt=${attempt})`);
        return { ok: true, attempts: attempt, status: response.status };
      } catch (err) {
        lastError = err;
      }
    }
    safeWarn(
      `[CALLBACK] ${payload.conversation_id} failed after ${this.maxAttempts} attempts: ${describeError(lastError)}`
    );
    return { ok: false, attempts: this.maxAttempts };
  }
}

export function createFinalReporter(url: string, timeoutMs: number): FinalReporter {
  return url ? new HttpFinalReporter(url, timeoutMs) : new DisabledReporter();
}
