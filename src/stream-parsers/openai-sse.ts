/**
 * OpenAI chat completions SSE → StreamEvent decoder.
 *
 * The body arrives as arbitrary byte chunks:
 *   data: {"choices":[{"delta":{"content":"Hel"}}]}\n\n
 *   data: {"choices":[{"delta":{"content":"lo"},"finish_reason":"stop"}]}\n\n
 *   data: [DONE]\n\n
 *
 * Yields text_delta for each piece of assistant text and ends with exactly one
 * done or error event.
 */

import type { ByteStream, ByteStreamReader } from "../transport/http-transport.js";
import type { StreamEvent, TokenUsage } from "../types.js";
import { isRecord } from "../types.js";
import {
  CancelledError,
  ConnectionFailedError,
  ProviderError,
  StreamCorruptError,
  TimeoutError,
  errorEvent,
  isChatError,
  type ChatError,
} from "../errors.js";
import { log, logComponent, truncateContent } from "../logger.js";

export interface SseEvent {
  event?: string;
  data: string;
}

/**
 * Line-oriented SSE framing. Feed decoded text with push(); complete
 * events come back as soon as their terminating blank line is seen.
 */
export class SseEventParser {
  private buffer = "";
  private dataLines: string[] = [];
  private eventName: string | undefined;

  push(text: string): SseEvent[] {
    this.buffer += text;
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";

    const events: SseEvent[] = [];
    for (const line of lines) {
      const event = this.processLine(line.endsWith("\r") ? line.slice(0, -1) : line);
      if (event) events.push(event);
    }
    return events;
  }

  /** End of input: treat any partial line as complete and emit the pending event */
  flush(): SseEvent[] {
    const events: SseEvent[] = [];
    if (this.buffer) {
      const rest = this.buffer.endsWith("\r") ? this.buffer.slice(0, -1) : this.buffer;
      this.buffer = "";
      const event = this.processLine(rest);
      if (event) events.push(event);
    }
    const pending = this.dispatch();
    if (pending) events.push(pending);
    return events;
  }

  reset(): void {
    this.buffer = "";
    this.dataLines = [];
    this.eventName = undefined;
  }

  private processLine(line: string): SseEvent | null {
    if (line === "") return this.dispatch();
    if (line.startsWith(":")) return null;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "data") {
      this.dataLines.push(value);
    } else if (field === "event") {
      this.eventName = value;
    }
    return null;
  }

  private dispatch(): SseEvent | null {
    if (this.dataLines.length === 0) {
      this.eventName = undefined;
      return null;
    }
    const event: SseEvent = { data: this.dataLines.join("\n") };
    if (this.eventName) event.event = this.eventName;
    this.dataLines = [];
    this.eventName = undefined;
    return event;
  }
}

export interface DecodeOptions {
  signal?: AbortSignal;
  /** Consecutive unparseable payloads tolerated before StreamCorrupt */
  maxConsecutiveMalformed?: number;
  /** Longest wait for the next chunk */
  idleTimeoutMs?: number;
  /** HTTP status reported on an error for a body with no SSE payloads */
  status?: number;
}

export function parseUsage(value: unknown): TokenUsage | undefined {
  if (!isRecord(value)) return undefined;
  const prompt = value.prompt_tokens;
  const completion = value.completion_tokens;
  if (typeof prompt !== "number" || typeof completion !== "number") return undefined;
  const total = typeof value.total_tokens === "number" ? value.total_tokens : prompt + completion;
  return { promptTokens: prompt, completionTokens: completion, totalTokens: total };
}

/**
 * ProviderError for a JSON payload that carries an `error` member, else null.
 */
export function payloadError(data: Record<string, unknown>): ProviderError | null {
  const err = data.error;
  if (err === undefined || err === null || err === false) return null;
  if (isRecord(err)) {
    const message = typeof err.message === "string" ? err.message : JSON.stringify(err);
    const status = typeof err.code === "number" ? err.code : typeof err.status === "number" ? err.status : 0;
    return new ProviderError(status, `Provider error: ${message}`);
  }
  return new ProviderError(0, `Provider error: ${String(err)}`);
}

function firstChoice(data: Record<string, unknown>): Record<string, unknown> | undefined {
  const choices = data.choices;
  if (!Array.isArray(choices)) return undefined;
  const first: unknown = choices[0];
  return isRecord(first) ? first : undefined;
}

function deltaText(data: Record<string, unknown>): string {
  if (typeof data.delta === "string") return data.delta;
  const choice = firstChoice(data);
  if (choice && isRecord(choice.delta) && typeof choice.delta.content === "string") {
    return choice.delta.content;
  }
  return "";
}

type Step =
  | { kind: "delta"; text: string }
  | { kind: "skip" }
  | { kind: "done" }
  | { kind: "error"; error: ChatError };

interface DecodeState {
  malformed: number;
  payloads: number;
  finishReason: string | null;
  usage?: TokenUsage;
}

function interpret(event: SseEvent, state: DecodeState, maxMalformed: number): Step {
  const data = event.data.trim();
  if (data === "[DONE]") {
    state.payloads++;
    return { kind: "done" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    parsed = undefined;
  }

  if (!isRecord(parsed)) {
    state.malformed++;
    log(`[SSE] Skipping malformed payload (${state.malformed}/${maxMalformed}): ${truncateContent(data, 120)}`);
    if (state.malformed >= maxMalformed) {
      return {
        kind: "error",
        error: new StreamCorruptError(`Stream corrupt: ${state.malformed} consecutive malformed events`),
      };
    }
    return { kind: "skip" };
  }
  state.malformed = 0;
  state.payloads++;

  const error = payloadError(parsed);
  if (error) return { kind: "error", error };
  if (event.event === "error") {
    return { kind: "error", error: new ProviderError(0, `Provider error: ${truncateContent(data, 300)}`) };
  }

  const choice = firstChoice(parsed);
  if (choice && typeof choice.finish_reason === "string") state.finishReason = choice.finish_reason;
  const usage = parseUsage(parsed.usage);
  if (usage) state.usage = usage;

  const text = deltaText(parsed);
  return text ? { kind: "delta", text } : { kind: "skip" };
}

function readChunk(
  reader: ByteStreamReader,
  signal: AbortSignal | undefined,
  idleTimeoutMs: number | undefined
): Promise<{ done: boolean; value?: Uint8Array }> {
  return new Promise((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(new CancelledError("Response cancelled."));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    if (idleTimeoutMs && idleTimeoutMs > 0) {
      timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(`No data received for ${idleTimeoutMs}ms.`));
      }, idleTimeoutMs);
    }

    reader.read().then(
      (result) => {
        cleanup();
        resolve(result);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

function classifyReadError(error: unknown, signal?: AbortSignal): ChatError {
  if (isChatError(error)) return error;
  if (signal?.aborted) return new CancelledError("Response cancelled.", { cause: error });
  const reason = error instanceof Error ? error.message : String(error);
  return new ConnectionFailedError(`Stream interrupted: ${reason}`, undefined, { cause: error });
}

/**
 * Decode an SSE body lazily. Stopping iteration early cancels the reader.
 */
export async function* decodeSseStream(
  body: ByteStream,
  options: DecodeOptions = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  const { signal, idleTimeoutMs } = options;
  const maxMalformed = Math.max(1, options.maxConsecutiveMalformed ?? 3);
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseEventParser();
  const state: DecodeState = { malformed: 0, payloads: 0, finishReason: null };
  let chunks = 0;

  const done = (): StreamEvent =>
    state.usage
      ? { type: "done", finishReason: state.finishReason, usage: state.usage }
      : { type: "done", finishReason: state.finishReason };

  try {
    while (true) {
      let chunk: { done: boolean; value?: Uint8Array };
      try {
        chunk = await readChunk(reader, signal, idleTimeoutMs);
      } catch (error) {
        const chatError = classifyReadError(error, signal);
        log(`[SSE] Read failed after ${chunks} chunk(s): ${chatError.kind}`);
        yield errorEvent(chatError);
        return;
      }

      const events = chunk.done
        ? [...parser.push(decoder.decode()), ...parser.flush()]
        : parser.push(decoder.decode(chunk.value, { stream: true }));
      if (!chunk.done) chunks++;

      for (const event of events) {
        logComponent("sse", `event ${truncateContent(event.data, 100)}`);
        const step = interpret(event, state, maxMalformed);
        if (step.kind === "delta") {
          yield { type: "text_delta", text: step.text };
        } else if (step.kind === "error") {
          yield errorEvent(step.error);
          return;
        } else if (step.kind === "done") {
          log(`[SSE] Stream complete after ${chunks} chunk(s), finish_reason=${state.finishReason}`);
          yield done();
          return;
        }
      }

      if (chunk.done) {
        if (state.payloads === 0) {
          log(`[SSE] Body ended after ${chunks} chunk(s) without a single SSE payload`);
          yield errorEvent(new ProviderError(options.status ?? 0, "Unexpected response body: no SSE events received."));
          return;
        }
        log(`[SSE] Stream ended without [DONE] after ${chunks} chunk(s)`);
        yield done();
        return;
      }
    }
  } finally {
    parser.reset();
    await reader.cancel().catch((err: unknown) => log(`[SSE] Reader cancel failed: ${String(err)}`));
  }
}
