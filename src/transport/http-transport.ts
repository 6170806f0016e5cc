/**
 * RetryingTransport - issues the chat completion request for one turn.
 *
 * Owns: endpoint URL, headers, per-attempt timeout, redirect handling,
 * failure classification, exponential backoff with jitter.
 * Does NOT own: payload assembly, interception, stream decoding.
 *
 * State machine per send(): Idle → Attempting → {Success, RetryWait, Failed},
 * with RetryWait looping back to Attempting. The allowlist gate is consulted
 * on every attempt and every redirect hop, before the request is issued.
 */

import { Agent, fetch as undiciFetch } from "undici";
import type { AllowlistGate } from "../network/allowlist.js";
import type { ConnectionProfile, Payload, RetryPolicy } from "../types.js";
import { isRecord } from "../types.js";
import {
  CancelledError,
  ChatError,
  ConnectionFailedError,
  ProviderError,
  RateLimitedError,
  TimeoutError,
  isChatError,
} from "../errors.js";
import { toWireBody } from "../chat/payload-builder.js";
import { DEFAULT_RETRY_POLICY, computeBackoff, parseRetryAfter, sleep as defaultSleep, type SleepFn } from "./backoff.js";
import { log, logComponent, logStructured, maskCredential } from "../logger.js";
import { APP_VERSION } from "../config.js";

// ─── HTTP seam ────────────────────────────────────────────

export interface ByteStreamReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
  releaseLock(): void;
}

export interface ByteStream {
  getReader(): ByteStreamReader;
}

export interface HttpRequest {
  method: "POST" | "GET";
  headers: Record<string, string>;
  body?: string;
  redirect: "manual";
  signal: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: { get(name: string): string | null };
  readonly body: ByteStream | null;
  text(): Promise<string>;
}

/** Anything shaped like fetch(); tests pass an in-process stand-in */
export type FetchLike = (url: string, init: HttpRequest) => Promise<HttpResponse>;

// Keep-alive agent for chat endpoints; the per-attempt timeout is enforced separately
const chatAgent = new Agent({
  headersTimeout: 600000, // 10 minutes, slow local models can take long before the first byte
  bodyTimeout: 600000,
  keepAliveTimeout: 30000,
  keepAliveMaxTimeout: 600000,
  connect: { timeout: 10000 },
});

export const undiciFetcher: FetchLike = (url, init) => undiciFetch(url, { ...init, dispatcher: chatAgent });

// ─── Transport ────────────────────────────────────────────

export type TransportState = "Idle" | "Attempting" | "Success" | "RetryWait" | "Failed";

export interface TransportTransition {
  state: TransportState;
  attempt: number;
  url: string;
  delayMs?: number;
  status?: number;
  error?: ChatError;
}

export interface TransportResult {
  response: HttpResponse;
  /** Final URL after redirects */
  url: string;
  attempts: number;
  elapsedMs: number;
}

export interface RetryingTransportOptions {
  profile: ConnectionProfile;
  gate: AllowlistGate;
  retryPolicy?: RetryPolicy;
  fetch?: FetchLike;
  sleep?: SleepFn;
  random?: () => number;
  now?: () => number;
  maxRedirects?: number;
  onStateChange?: (transition: TransportTransition) => void;
}

type AttemptOutcome =
  | { ok: true; response: HttpResponse; url: string }
  | { ok: false; error: ChatError };

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const STATUS_HINTS: Record<number, string> = {
  401: "Authentication failed. Check your API key.",
  403: "Access forbidden. Your API key may not have permission for this model.",
  404: "Endpoint not found. Check your --endpoint URL and model name.",
  422: "Invalid request. The server rejected the payload.",
  429: "Rate limited: too many requests.",
};

const CONNECTION_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * `<endpoint>/chat/completions`, unless the endpoint already names that path.
 */
export function completionsUrl(endpoint: string): string {
  const base = endpoint.trim().replace(/\/+$/, "");
  return base.endsWith("/chat/completions") ? base : `${base}/chat/completions`;
}

/**
 * Human-readable message for an error response body.
 */
export function extractErrorMessage(body: string, status: number): string {
  const hint = STATUS_HINTS[status];
  const withHint = (msg: string) => `[${status}] ${msg}` + (hint ? `\n${hint}` : "");

  try {
    const data: unknown = JSON.parse(body);
    if (isRecord(data)) {
      const err = data.error;
      const msg = isRecord(err) ? err.message : err;
      if (typeof msg === "string" && msg) return withHint(msg);
    }
  } catch {
    // Not JSON, fall through to the raw body
  }

  const trimmed = body.trim();
  if (trimmed && trimmed.length < 500) return withHint(trimmed);
  return `[${status}] ${hint ?? "Server error."}`;
}

function errorCode(error: unknown): string | undefined {
  if (!isRecord(error) && !(error instanceof Error)) return undefined;
  const direct: unknown = Reflect.get(error, "code");
  if (typeof direct === "string") return direct;
  const cause: unknown = Reflect.get(error, "cause");
  if (cause !== undefined && cause !== error) return errorCode(cause);
  return undefined;
}

async function discardBody(response: HttpResponse): Promise<void> {
  if (!response.body) return;
  await response.body
    .getReader()
    .cancel()
    .catch((err: unknown) => log(`[Transport] Failed to discard redirect body: ${String(err)}`));
}

async function readBodySafely(response: HttpResponse): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log(`[Transport] Could not read error body: ${String(error)}`);
    return "";
  }
}

export class RetryingTransport {
  private profile: ConnectionProfile;
  private readonly gate: AllowlistGate;
  private readonly policy: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly maxRedirects: number;
  private readonly onStateChange?: (transition: TransportTransition) => void;

  constructor(options: RetryingTransportOptions) {
    this.profile = options.profile;
    this.gate = options.gate;
    this.policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetch ?? undiciFetcher;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.onStateChange = options.onStateChange;
  }

  setProfile(profile: ConnectionProfile): void {
    this.profile = profile;
  }

  getEndpoint(): string {
    return completionsUrl(this.profile.endpoint);
  }

  getHeaders(stream: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: stream ? "text/event-stream" : "application/json",
      "User-Agent": `cliai/${APP_VERSION}`,
    };
    if (this.profile.apiKey) {
      headers["Authorization"] = `Bearer ${this.profile.apiKey}`;
    }
    return headers;
  }

  /**
   * Send the payload, retrying transient failures per the retry policy.
   * Resolves with a 2xx response whose body has not been read yet;
   * rejects with a classified ChatError carrying attempts and elapsed time.
   */
  async send(payload: Payload, signal?: AbortSignal): Promise<TransportResult> {
    const url = this.getEndpoint();
    const body = JSON.stringify(toWireBody(payload));
    const headers = this.getHeaders(payload.stream);
    const started = this.now();
    const elapsed = () => this.now() - started;

    logStructured("Transport Request", {
      url,
      model: payload.model,
      messageCount: payload.messages.length,
      stream: payload.stream,
      apiKey: maskCredential(this.profile.apiKey),
      maxAttempts: this.policy.maxAttempts,
    });

    this.emit({ state: "Idle", attempt: 0, url });
    let previousDelayMs = 0;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw this.fail(new CancelledError(), attempt - 1, elapsed(), url);
      }

      this.emit({ state: "Attempting", attempt, url });
      const outcome = await this.attemptOnce(url, body, headers, signal).catch((error: unknown) => {
        // Gate rejections and local errors are terminal on the first attempt
        throw this.fail(isChatError(error) ? error : new ProviderError(0, String(error)), attempt, elapsed(), url);
      });

      if (outcome.ok) {
        logComponent("transport", `Success on attempt ${attempt} (${outcome.response.status})`);
        this.emit({ state: "Success", attempt, url: outcome.url, status: outcome.response.status });
        return { response: outcome.response, url: outcome.url, attempts: attempt, elapsedMs: elapsed() };
      }

      const error = outcome.error;
      if (!this.isRetryable(error) || attempt >= this.policy.maxAttempts) {
        throw this.fail(error, attempt, elapsed(), url);
      }

      // Jitter may not shorten the wait below the previous one
      let delayMs = Math.max(previousDelayMs, computeBackoff(attempt, this.policy, this.random));
      if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
        if (error.retryAfterMs > this.policy.maxRetryAfterMs) {
          log(`[Transport] Retry-After ${error.retryAfterMs}ms exceeds limit, giving up`);
          throw this.fail(error, attempt, elapsed(), url);
        }
        delayMs = Math.max(delayMs, error.retryAfterMs);
      }
      previousDelayMs = delayMs;

      log(`[Transport] Attempt ${attempt} failed (${error.kind}: ${error.message.split("\n")[0]}), retrying in ${delayMs}ms`);
      this.emit({ state: "RetryWait", attempt, url, delayMs, status: error.status, error });

      try {
        await this.sleep(delayMs, signal);
      } catch (sleepError) {
        const cancelled = isChatError(sleepError) ? sleepError : new CancelledError(undefined, { cause: sleepError });
        throw this.fail(cancelled, attempt, elapsed(), url);
      }
    }
  }

  private isRetryable(error: ChatError): boolean {
    if (error.kind === "Timeout" || error.kind === "ConnectionFailed") return true;
    return error.status !== undefined && this.policy.retryableStatuses.includes(error.status);
  }

  private fail(error: ChatError, attempts: number, elapsedMs: number, url: string): ChatError {
    error.withAttempts(attempts, elapsedMs);
    log(`[Transport] Failed after ${attempts} attempt(s) in ${elapsedMs}ms: ${error.kind}`);
    this.emit({ state: "Failed", attempt: attempts, url, status: error.status, error });
    return error;
  }

  private emit(transition: TransportTransition): void {
    this.onStateChange?.(transition);
  }

  /**
   * One attempt: gate, request, follow redirects (gating each hop).
   * Resolves with an outcome for anything retry logic should judge;
   * throws only for gate rejections and local errors.
   */
  private async attemptOnce(
    url: string,
    body: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.profile.timeoutMs);

    let ok = false;
    try {
      let currentUrl = url;
      let method: HttpRequest["method"] = "POST";
      let currentBody: string | undefined = body;

      for (let hop = 0; ; hop++) {
        await this.gate.assertAllowed(currentUrl);

        const response = await this.fetchImpl(currentUrl, {
          method,
          headers,
          body: currentBody,
          redirect: "manual",
          signal: controller.signal,
        });
        const status = response.status;

        if (REDIRECT_STATUSES.has(status)) {
          const location = response.headers.get("location");
          await discardBody(response);
          if (!location) {
            return { ok: false, error: new ProviderError(status, `[${status}] Redirect without a Location header`) };
          }
          if (hop >= this.maxRedirects) {
            return { ok: false, error: new ProviderError(status, `[${status}] Too many redirects`) };
          }
          const next = new URL(location, currentUrl).toString();
          log(`[Transport] Redirect ${status} → ${next}`);
          if (status === 301 || status === 302 || status === 303) {
            method = "GET";
            currentBody = undefined;
          }
          currentUrl = next;
          continue;
        }

        if (status >= 200 && status < 300) {
          if (!response.body) {
            return { ok: false, error: new ProviderError(status, `[${status}] Empty response body`) };
          }
          ok = true;
          return { ok: true, response, url: currentUrl };
        }

        const text = await readBodySafely(response);
        const message = extractErrorMessage(text, status);
        if (status === 429) {
          const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"), this.now());
          return { ok: false, error: new RateLimitedError(message, retryAfterMs) };
        }
        return { ok: false, error: new ProviderError(status, message) };
      }
    } catch (error) {
      if (isChatError(error)) throw error;
      if (signal?.aborted) {
        return { ok: false, error: new CancelledError(undefined, { cause: error }) };
      }
      if (timedOut) {
        return {
          ok: false,
          error: new TimeoutError(
            `Request timed out after ${this.profile.timeoutMs}ms. The model may be loading or the request is too large.`,
            { cause: error }
          ),
        };
      }
      const code = errorCode(error);
      const reason = error instanceof Error ? error.message : String(error);
      if (code && !CONNECTION_CODES.has(code)) {
        log(`[Transport] Unrecognized network error code ${code}, treating as connection failure`);
      }
      return {
        ok: false,
        error: new ConnectionFailedError(
          `Connection failed: ${url}${code ? ` (${code})` : ""}: ${reason}\nIs the server running? Check your --endpoint setting.`,
          code,
          { cause: error }
        ),
      };
    } finally {
      clearTimeout(timer);
      // A successful response keeps forwarding cancellation to its body
      if (!ok) signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
