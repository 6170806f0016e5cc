/**
 * PayloadBuilder - assembles the chat completion request body for one turn.
 *
 * Pure: reads the profile and conversation, clones messages, validates
 * sampling options. No network or I/O.
 */

import type { Conversation } from "../session/conversation.js";
import type {
  ConnectionProfile,
  Message,
  Payload,
  PayloadOverrides,
  WireBody,
} from "../types.js";
import { ConfigInvalidError } from "../errors.js";

export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;

export interface PayloadLimits {
  maxTokensCap: number;
  maxInputChars: number;
}

export const DEFAULT_PAYLOAD_LIMITS: PayloadLimits = {
  maxTokensCap: 4096,
  maxInputChars: 100_000,
};

export interface BuildPayloadInput {
  profile: ConnectionProfile;
  conversation: Conversation;
  userText: string;
  overrides?: PayloadOverrides;
  limits?: PayloadLimits;
  /** Leave the trailing user/assistant exchange out of the history (retry) */
  dropLastExchange?: boolean;
}

export function validateTemperature(value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < TEMPERATURE_RANGE.min || value > TEMPERATURE_RANGE.max) {
    throw new ConfigInvalidError(
      `Temperature must be between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}, got ${value}`
    );
  }
}

export function validateMaxTokens(value: number | undefined, cap: number): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigInvalidError(`max_tokens must be a positive integer, got ${value}`);
  }
  if (value > cap) {
    throw new ConfigInvalidError(`max_tokens ${value} exceeds the configured cap of ${cap}`);
  }
}

export function buildPayload(input: BuildPayloadInput): Payload {
  const { profile, conversation, userText, overrides = {} } = input;
  const limits = input.limits ?? DEFAULT_PAYLOAD_LIMITS;

  const model = (overrides.model ?? profile.model).trim();
  if (!model) {
    throw new ConfigInvalidError("No model configured. Set one with --model or in your profile.");
  }

  if (!userText.trim()) {
    throw new ConfigInvalidError("Message is empty.");
  }
  if (userText.length > limits.maxInputChars) {
    throw new ConfigInvalidError(
      `Message is ${userText.length} characters; the limit is ${limits.maxInputChars}.`
    );
  }

  const temperature = overrides.temperature ?? profile.temperature;
  const maxTokens = overrides.maxTokens ?? profile.maxTokens;
  validateTemperature(temperature);
  validateMaxTokens(maxTokens, limits.maxTokensCap);

  const messages: Message[] = conversation
    .requestMessages({ dropLastExchange: input.dropLastExchange })
    .map((m) => ({ role: m.role, content: m.content }));
  messages.push({ role: "user", content: userText });

  const options: Payload["options"] = {};
  if (temperature !== undefined) options.temperature = temperature;
  if (maxTokens !== undefined) options.maxTokens = maxTokens;

  const stream = overrides.stream ?? profile.stream;
  if (stream && profile.includeUsage) options.includeUsage = true;

  return { model, messages, options, stream };
}

/**
 * Serialize a payload into the OpenAI chat completions wire shape.
 */
export function toWireBody(payload: Payload): WireBody {
  const body: WireBody = {
    model: payload.model,
    messages: payload.messages.map((m) => ({ role: m.role, content: m.content })),
    stream: payload.stream,
  };
  if (payload.options.temperature !== undefined) body.temperature = payload.options.temperature;
  if (payload.options.maxTokens !== undefined) body.max_tokens = payload.options.maxTokens;
  if (payload.stream && payload.options.includeUsage) {
    body.stream_options = { include_usage: true };
  }
  return body;
}

/**
 * Deep copy so downstream stages can never reach back into session state.
 */
export function clonePayload(payload: Payload): Payload {
  return {
    model: payload.model,
    messages: payload.messages.map((m) => ({ ...m })),
    options: { ...payload.options },
    stream: payload.stream,
  };
}
