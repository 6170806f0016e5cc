/**
 * Core data model shared by the payload builder, allowlist gate,
 * retrying transport, stream decoders and session engine.
 */

import type { ChatError, ChatErrorKind } from "./errors.js";

export type MessageRole = "system" | "user" | "assistant";

export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Fully resolved connection settings for one endpoint.
 * Read-only to the core; the caller may swap it between turns.
 */
export interface ConnectionProfile {
  /** Base URL of the OpenAI-compatible API, e.g. https://api.openai.com/v1 */
  endpoint: string;
  apiKey?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  stream: boolean;
  /** Per-attempt budget until response headers arrive, and idle budget per stream read */
  timeoutMs: number;
  systemPrompt?: string;
  /** Ask the server for a trailing usage chunk (stream_options.include_usage) */
  includeUsage?: boolean;
}

export interface SamplingOptions {
  temperature?: number;
  maxTokens?: number;
  includeUsage?: boolean;
}

export interface Payload {
  model: string;
  messages: Message[];
  options: SamplingOptions;
  stream: boolean;
}

/** Per-call overrides accepted by buildPayload */
export interface PayloadOverrides {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
}

/** JSON body actually written to the socket */
export interface WireBody {
  model: string;
  messages: Message[];
  stream: boolean;
  temperature?: number;
  max_tokens?: number;
  stream_options?: { include_usage: boolean };
}

export interface AllowlistPolicy {
  enforced: boolean;
  /** Exact host (optionally host:port / [v6]:port), "*.domain" wildcard, or CIDR range */
  allowedHosts: string[];
}

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fractional jitter, 0.2 means ±20% */
  jitter: number;
  retryableStatuses: number[];
  /** A Retry-After beyond this gives up instead of sleeping */
  maxRetryAfterMs: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type StreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "done"; finishReason: string | null; usage?: TokenUsage }
  | { type: "error"; kind: ChatErrorKind; message: string; error: ChatError };

export type TextDeltaEvent = Extract<StreamEvent, { type: "text_delta" }>;
export type DoneEvent = Extract<StreamEvent, { type: "done" }>;
export type ErrorEvent = Extract<StreamEvent, { type: "error" }>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
