/**
 * Error taxonomy for a chat turn.
 *
 * Every failure that leaves the core is a ChatError subclass carrying its
 * kind, category and the retry context (status, attempts, elapsed time) the
 * caller needs to decide whether to offer /retry.
 */

import type { ErrorEvent } from "./types.js";

export type ChatErrorKind =
  | "HostNotAllowed"
  | "Timeout"
  | "RateLimited"
  | "ProviderError"
  | "StreamCorrupt"
  | "Cancelled"
  | "ConfigInvalid"
  | "ConnectionFailed"
  | "InterceptorFailed";

export type ErrorCategory = "local" | "security" | "transient" | "permanent" | "stream" | "cancelled";

export interface ErrorContext {
  status?: number;
  attempts?: number;
  elapsedMs?: number;
  cause?: unknown;
}

export abstract class ChatError extends Error {
  abstract readonly kind: ChatErrorKind;
  abstract readonly category: ErrorCategory;
  readonly status?: number;
  attempts: number;
  elapsedMs: number;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.status = context.status;
    this.attempts = context.attempts ?? 0;
    this.elapsedMs = context.elapsedMs ?? 0;
  }

  /** Transient failures are the only ones worth re-sending unchanged */
  get retryable(): boolean {
    return this.category === "transient";
  }

  withAttempts(attempts: number, elapsedMs: number): this {
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    return this;
  }
}

export class ConfigInvalidError extends ChatError {
  readonly kind = "ConfigInvalid";
  readonly category = "local";

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "ConfigInvalidError";
  }
}

export class InterceptorFailedError extends ChatError {
  readonly kind = "InterceptorFailed";
  readonly category = "local";

  constructor(interceptor: string, reason: string, context?: ErrorContext) {
    super(`Payload interceptor '${interceptor}' failed: ${reason}`, context);
    this.name = "InterceptorFailedError";
  }
}

export class HostNotAllowedError extends ChatError {
  readonly kind = "HostNotAllowed";
  readonly category = "security";
  readonly host: string;
  readonly url: string;

  constructor(host: string, url: string, reason?: string) {
    super(
      `Blocked: host '${host}' is not in the allowed hosts list.` +
        (reason ? ` (${reason})` : "") +
        `\nEndpoint: ${url}` +
        `\nAdd it to 'security.allowedHosts' in your config or set CLIAI_ALLOWED_HOSTS to permit this host.`
    );
    this.name = "HostNotAllowedError";
    this.host = host;
    this.url = url;
  }
}

export class TimeoutError extends ChatError {
  readonly kind = "Timeout";
  readonly category = "transient";

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "TimeoutError";
  }
}

export class ConnectionFailedError extends ChatError {
  readonly kind = "ConnectionFailed";
  readonly category = "transient";
  readonly code?: string;

  constructor(message: string, code?: string, context?: ErrorContext) {
    super(message, context);
    this.name = "ConnectionFailedError";
    this.code = code;
  }
}

export class RateLimitedError extends ChatError {
  readonly kind = "RateLimited";
  readonly category = "transient";
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, context?: ErrorContext) {
    super(message, { status: 429, ...context });
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class ProviderError extends ChatError {
  readonly kind = "ProviderError";
  readonly category: ErrorCategory;

  constructor(status: number, message: string, context?: ErrorContext) {
    super(message, { ...context, status });
    this.name = "ProviderError";
    this.category = status >= 500 ? "transient" : "permanent";
  }
}

export class StreamCorruptError extends ChatError {
  readonly kind = "StreamCorrupt";
  readonly category = "stream";

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "StreamCorruptError";
  }
}

export class CancelledError extends ChatError {
  readonly kind = "Cancelled";
  readonly category = "cancelled";

  constructor(message = "Request cancelled.", context?: ErrorContext) {
    super(message, context);
    this.name = "CancelledError";
  }
}

export function isChatError(value: unknown): value is ChatError {
  return value instanceof ChatError;
}

/**
 * Normalize anything thrown into a ChatError.
 * Unknown failures are reported as permanent provider errors with status 0.
 */
export function toChatError(error: unknown): ChatError {
  if (isChatError(error)) return error;
  if (error instanceof Error && error.name === "AbortError") {
    return new CancelledError(undefined, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(0, message, { cause: error });
}

export function errorEvent(error: ChatError): ErrorEvent {
  return { type: "error", kind: error.kind, message: error.message, error };
}
