import { NextFunction, Request, Response, Router } from "express";
import { HoneypotError, InvalidInputError, UnauthorizedError } from "../core/errors";
import type { HoneypotRequest, HoneypotService } from "../core/honeypot";
import { isRecord, nonEmptyString } from "../utils/guards";
import { describeError, maskDigits, safeError, safeLog, safeStringify, sanitizeHeaders } from "../utils/logging";
import { ErrorResponse, makeErrorResponse } from "../utils/schema";

export const MAX_MESSAGE_LENGTH = 5000;
export const MAX_CONVERSATION_ID_LENGTH = 200;

export type HoneypotRouterOptions = {
  apiKey: string;
};

function logIncoming(req: Request, body: unknown) {
  const headers = sanitizeHeaders(req.headers);
  safeLog(`[INCOMING] headers: ${safeStringify(headers, 2000)}`);
  safeLog(`[INCOMING] body: ${safeStringify(body, 2000)}`);
}

function logScammer(text: string) {
  safeLog(`[SCAMMER] ${maskDigits(text)}`);
}

function logOutgoing(status: number, responseJson: unknown) {
  safeLog(`[OUTGOING] response_json: ${safeStringify(responseJson, 5000)}`);
  safeLog(`[OUTGOING] status: ${status}`);
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof HoneypotError && err.code !== "INTERNAL") {
    return { status: err.httpStatus, body: makeErrorResponse(err.message, err.code) };
  }
  safeError(`[ERROR] ${describeError(err)}`);
  return { status: 500, body: makeErrorResponse("Internal server error", "INTERNAL") };
}

/**
 * Accepts `{ conversation_id, message }`, the `conversationId` / `sessionId`
 * spellings, and `message: { text }`.
 */
export function parseHoneypotRequest(body: unknown): HoneypotRequest {
  if (!isRecord(body)) throw new InvalidInputError("Request body must be a JSON object");

  const conversationId =
    nonEmptyString(body.conversation_id) ?? nonEmptyString(body.conversationId) ?? nonEmptyString(body.sessionId);
  if (!conversationId) throw new InvalidInputError("conversation_id must be a non-empty string");
  if (conversationId.length > MAX_CONVERSATION_ID_LENGTH) {
    throw new InvalidInputError(`conversation_id must be at most ${MAX_CONVERSATION_ID_LENGTH} characters`);
  }

  const rawMessage = isRecord(body.message) ? body.message.text : body.message;
  const message = nonEmptyString(rawMessage);
  if (!message) throw new InvalidInputError("message must be a non-empty string");
  if (message.length > MAX_MESSAGE_LENGTH) {
    throw new InvalidInputError(`message must be at most ${MAX_MESSAGE_LENGTH} characters`);
  }

  return { conversationId: conversationId.trim(), message };
}

export function createHoneypotRouter(service: HoneypotService, options: HoneypotRouterOptions): Router {
  const router = Router();

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (!options.apiKey) return next();
    if (req.header("x-api-key") === options.apiKey) return next();
    const { status, body } = toErrorResponse(new UnauthorizedError());
    logOutgoing(status, body);
    return res.status(status).json(body);
  });

  router.post("/honeypot", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    logIncoming(req, body);
    try {
      const request = parseHoneypotRequest(body);
      logScammer(request.message);
      const responseJson = await service.handleMessage(request);
      logOutgoing(200, responseJson);
      return res.status(200).json(responseJson);
    } catch (err) {
      const { status, body: errorJson } = toErrorResponse(err);
      logOutgoing(status, errorJson);
      return res.status(status).json(errorJson);
    }
  });

  router.get("/conversation/:id", (req: Request, res: Response) => {
    try {
      return res.status(200).json(service.getConversation(req.params.id));
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      return res.status(status).json(body);
    }
  });

  router.delete("/conversation/:id", (req: Request, res: Response) => {
    try {
      service.deleteConversation(req.params.id);
      return res.status(200).json({ status: "deleted", conversation_id: req.params.id });
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      return res.status(status).json(body);
    }
  });

  return router;
}
