import type { ByteStream, ByteStreamReader, FetchLike, HttpRequest, HttpResponse } from "../src/transport/http-transport.js";
import type { ConnectionProfile, StreamEvent } from "../src/types.js";

const encoder = new TextEncoder();

/**
 * Byte stream fed from fixed chunks. With `hang`, the read after the last
 * chunk never resolves until the reader is cancelled.
 */
export class ChunkStream implements ByteStream {
  cancelled = false;
  reads = 0;
  private readonly chunks: Uint8Array[];
  private release: (() => void) | null = null;

  constructor(chunks: Array<string | Uint8Array>, private readonly options: { hang?: boolean; failAfter?: Error } = {}) {
    this.chunks = chunks.map((c) => (typeof c === "string" ? encoder.encode(c) : c));
  }

  getReader(): ByteStreamReader {
    return {
      read: async () => {
        this.reads++;
        if (this.cancelled) return { done: true };
        const next = this.chunks.shift();
        if (next) return { done: false, value: next };
        if (this.options.failAfter) throw this.options.failAfter;
        if (this.options.hang) {
          await new Promise<void>((resolve) => {
            this.release = resolve;
          });
        }
        return { done: true };
      },
      cancel: async () => {
        this.cancelled = true;
        this.release?.();
      },
      releaseLock: () => {},
    };
  }
}

export function sseBody(...payloads: string[]): string {
  return payloads.map((p) => `data: ${p}\n\n`).join("");
}

export function deltaChunk(text: string): string {
  return JSON.stringify({ choices: [{ index: 0, delta: { content: text }, finish_reason: null }] });
}

export function fakeResponse(
  status: number,
  options: { headers?: Record<string, string>; body?: string | ByteStream | null } = {}
): HttpResponse {
  const headers = new Map(Object.entries(options.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]));
  const raw = options.body;
  const text = typeof raw === "string" ? raw : "";
  const body: ByteStream | null = raw === null ? null : typeof raw === "object" ? raw : new ChunkStream([text]);
  return {
    status,
    headers: { get: (name) => headers.get(name.toLowerCase()) ?? null },
    body,
    text: async () => text,
  };
}

export interface RecordedCall {
  url: string;
  init: HttpRequest;
}

/**
 * fetch stand-in that answers from a queue of responders and records calls.
 */
export function scriptedFetch(
  ...responders: Array<(call: RecordedCall) => HttpResponse | Promise<HttpResponse>>
): FetchLike & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl = async (url: string, init: HttpRequest): Promise<HttpResponse> => {
    const call = { url, init };
    calls.push(call);
    const responder = responders[Math.min(calls.length - 1, responders.length - 1)];
    return responder(call);
  };
  return Object.assign(fetchImpl, { calls });
}

export function testProfile(overrides: Partial<ConnectionProfile> = {}): ConnectionProfile {
  return {
    endpoint: "https://api.test/v1",
    apiKey: "test-secret",
    model: "test-model",
    stream: true,
    timeoutMs: 5000,
    ...overrides,
  };
}

export async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const result: StreamEvent[] = [];
  for await (const event of events) result.push(event);
  return result;
}

export function textOf(events: StreamEvent[]): string {
  return events.map((e) => (e.type === "text_delta" ? e.text : "")).join("");
}

export const noSleep = async (): Promise<void> => {};
