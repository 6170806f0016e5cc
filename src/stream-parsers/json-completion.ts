/**
 * Non-streaming adapter: one JSON chat completion → text_delta + done.
 */

import type { StreamEvent } from "../types.js";
import { isRecord } from "../types.js";
import { CancelledError, ConnectionFailedError, ProviderError, errorEvent } from "../errors.js";
import { parseUsage, payloadError } from "./openai-sse.js";
import { log, truncateContent } from "../logger.js";

export async function* decodeJsonCompletion(
  response: { text(): Promise<string> },
  options: { signal?: AbortSignal } = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  let raw: string;
  try {
    raw = await response.text();
  } catch (error) {
    if (options.signal?.aborted) {
      yield errorEvent(new CancelledError("Response cancelled.", { cause: error }));
      return;
    }
    const reason = error instanceof Error ? error.message : String(error);
    yield errorEvent(new ConnectionFailedError(`Failed to read response: ${reason}`, undefined, { cause: error }));
    return;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    log(`[JSON] Unparseable completion body: ${truncateContent(raw, 200)}`);
    yield errorEvent(new ProviderError(0, "Provider returned a response that is not valid JSON."));
    return;
  }
  if (!isRecord(data)) {
    yield errorEvent(new ProviderError(0, "Provider returned an unexpected response shape."));
    return;
  }

  const error = payloadError(data);
  if (error) {
    yield errorEvent(error);
    return;
  }

  const choices: unknown = data.choices;
  const choice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (!isRecord(choice)) {
    yield errorEvent(new ProviderError(0, "Provider response contained no choices."));
    return;
  }

  const message = choice.message;
  const content = isRecord(message) && typeof message.content === "string" ? message.content : "";
  yield { type: "text_delta", text: content };

  const finishReason = typeof choice.finish_reason === "string" ? choice.finish_reason : null;
  const usage = parseUsage(data.usage);
  yield usage ? { type: "done", finishReason, usage } : { type: "done", finishReason };
}
