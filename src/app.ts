import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import { PersonaEngine } from "./core/agent";
import { FinalReporter, createFinalReporter } from "./core/callback";
import { HoneypotService } from "./core/honeypot";
import { DEFAULT_PERSONA, PersonaProfile } from "./core/persona";
import { createModelClient } from "./core/providers";
import type { ModelClient } from "./core/providers/modelClient";
import { ScamScorer } from "./core/scoring";
import { SessionStore } from "./core/sessionStore";
import { createHoneypotRouter, toErrorResponse } from "./routes/honeypot";
import type { HoneypotConfig } from "./utils/config";
import { isRecord } from "./utils/guards";
import { makeErrorResponse } from "./utils/schema";

export type HoneypotOverrides = {
  model?: ModelClient;
  reporter?: FinalReporter;
  persona?: PersonaProfile;
  now?: () => Date;
};

export type Honeypot = {
  app: Express;
  service: HoneypotService;
  store: SessionStore;
  model: ModelClient;
};

function isJsonParseFailure(err: unknown): boolean {
  return isRecord(err) && err.type === "entity.parse.failed";
}

export function createApp(service: HoneypotService, options: { apiKey: string; provider: string }): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ type: "*/*", limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    return res.json({
      status: "healthy",
      model_provider: options.provider,
      active_conversations: service.activeConversations
    });
  });

  app.use("/api", createHoneypotRouter(service, { apiKey: options.apiKey }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isJsonParseFailure(err)) {
      return res.status(400).json(makeErrorResponse("Malformed JSON body", "INVALID_INPUT"));
    }
    const { status, body } = toErrorResponse(err);
    return res.status(status).json(body);
  });

  return app;
}

/**
 * Wires one honeypot from configuration. Tests pass overrides for the model,
 * the reporter and the clock.
 */
export function createHoneypot(config: HoneypotConfig, overrides: HoneypotOverrides = {}): Honeypot {
  const model = overrides.model ?? createModelClient(config);
  const store = new SessionStore({
    idleTimeoutMs: config.sessionIdleTimeoutMs,
    sweepIntervalMs: config.sessionSweepIntervalMs,
    now: overrides.now
  });
  const scorer = new ScamScorer(model, {
    threshold: config.scamThreshold,
    timeoutMs: config.modelTimeoutMs,
    historyWindow: config.historyWindow
  });
  const engine = new PersonaEngine(model, overrides.persona ?? DEFAULT_PERSONA, {
    policy: config.policy,
    timeoutMs: config.modelTimeoutMs,
    historyWindow: config.historyWindow
  });
  const reporter = overrides.reporter ?? createFinalReporter(config.callbackUrl, config.callbackTimeoutMs);
  const service = new HoneypotService({ store, scorer, engine, reporter, now: overrides.now });
  const app = createApp(service, { apiKey: config.apiKey, provider: model.provider });
  return { app, service, store, model };
}
