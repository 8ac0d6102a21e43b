export type ErrorCode = "INVALID_INPUT" | "NOT_FOUND" | "UNAUTHORIZED" | "INTERNAL";

export class HoneypotError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;

  constructor(message: string, code: ErrorCode, httpStatus: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

export class InvalidInputError extends HoneypotError {
  constructor(message: string) {
    super(message, "INVALID_INPUT", 400);
  }
}

export class NotFoundError extends HoneypotError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}

export class UnauthorizedError extends HoneypotError {
  constructor(message: string = "Invalid API key") {
    super(message, "UNAUTHORIZED", 401);
  }
}

export class InternalInvariantViolationError extends HoneypotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INTERNAL", 500, options);
  }
}

/**
 * Raised by model clients. Never reaches an HTTP caller: the scorer and the
 * persona engine catch it and fall back to local behavior.
 */
export class UpstreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UpstreamUnavailableError extends UpstreamError {}

export class ModelNotConfiguredError extends UpstreamUnavailableError {
  constructor() {
    super("no model provider configured");
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`model call timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}
