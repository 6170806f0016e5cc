/**
 * SessionEngine - runs one chat turn at a time:
 *   build → intercept → gate → transport → decode → commit.
 *
 * Events reach the caller through a bounded handoff queue. The conversation is
 * only touched at a turn's terminal event, and only while that turn is still
 * the active one.
 */

import { Conversation } from "./conversation.js";
import { AllowlistGate, type GateDecision, type HostResolver } from "../network/allowlist.js";
import { RetryingTransport, type FetchLike, type TransportTransition } from "../transport/http-transport.js";
import { DEFAULT_RETRY_POLICY, type SleepFn } from "../transport/backoff.js";
import { buildPayload, validateTemperature, type PayloadLimits } from "../chat/payload-builder.js";
import { applyInterceptor, identityInterceptor, type PayloadInterceptor } from "../chat/interceptor.js";
import { decodeSseStream } from "../stream-parsers/openai-sse.js";
import { decodeJsonCompletion } from "../stream-parsers/json-completion.js";
import { handoff } from "../utils/handoff-queue.js";
import {
  CancelledError,
  ConfigInvalidError,
  ProviderError,
  errorEvent,
  toChatError,
} from "../errors.js";
import type {
  AllowlistPolicy,
  ConnectionProfile,
  PayloadOverrides,
  RetryPolicy,
  StreamEvent,
  TokenUsage,
} from "../types.js";
import { log, logComponent } from "../logger.js";
import { DEFAULT_BUFFER_SIZE, DEFAULT_MAX_CONSECUTIVE_MALFORMED } from "../config.js";

export interface CompletedExchange {
  userText: string;
  assistantText: string;
  model: string;
  endpoint: string;
  attempts: number;
  elapsedMs: number;
  finishReason: string | null;
  usage?: TokenUsage;
  /** True when the exchange replaced the previous one (retry) */
  replaced: boolean;
}

export interface SessionEngineOptions {
  profile: ConnectionProfile;
  allowlist: AllowlistPolicy;
  retry?: RetryPolicy;
  interceptor?: PayloadInterceptor;
  conversation?: Conversation;
  fetch?: FetchLike;
  sleep?: SleepFn;
  random?: () => number;
  resolver?: HostResolver;
  bufferSize?: number;
  maxConsecutiveMalformed?: number;
  limits?: PayloadLimits;
  onExchange?: (exchange: CompletedExchange) => void | Promise<void>;
  onTransportState?: (transition: TransportTransition) => void;
}

export interface TurnOptions {
  signal?: AbortSignal;
  overrides?: PayloadOverrides;
}

type TurnMode = "append" | "replace";

interface TurnMeta {
  model: string;
  endpoint: string;
  attempts: number;
  elapsedMs: number;
}

function linkSignal(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) return () => {};
  if (source.aborted) {
    target.abort(source.reason);
    return () => {};
  }
  const onAbort = () => target.abort(source.reason);
  source.addEventListener("abort", onAbort, { once: true });
  return () => source.removeEventListener("abort", onAbort);
}

export class SessionEngine {
  private profile: ConnectionProfile;
  private readonly gate: AllowlistGate;
  private readonly transport: RetryingTransport;
  private readonly interceptor: PayloadInterceptor;
  private readonly conv: Conversation;
  private readonly bufferSize: number;
  private readonly maxConsecutiveMalformed: number;
  private readonly limits?: PayloadLimits;
  private readonly onExchange?: (exchange: CompletedExchange) => void | Promise<void>;

  private turnCounter = 0;
  private activeTurn: { id: number; controller: AbortController } | null = null;
  private lastFailed: { userText: string; mode: TurnMode } | null = null;

  constructor(options: SessionEngineOptions) {
    this.profile = { ...options.profile };
    this.gate = new AllowlistGate(options.allowlist, { resolver: options.resolver });
    this.transport = new RetryingTransport({
      profile: this.profile,
      gate: this.gate,
      retryPolicy: options.retry ?? DEFAULT_RETRY_POLICY,
      fetch: options.fetch,
      sleep: options.sleep,
      random: options.random,
      onStateChange: options.onTransportState,
    });
    this.interceptor = options.interceptor ?? identityInterceptor;
    this.conv = options.conversation ?? new Conversation(options.profile.systemPrompt ?? "");
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    this.maxConsecutiveMalformed = options.maxConsecutiveMalformed ?? DEFAULT_MAX_CONSECUTIVE_MALFORMED;
    this.limits = options.limits;
    this.onExchange = options.onExchange;
  }

  get conversation(): Conversation {
    return this.conv;
  }

  getProfile(): ConnectionProfile {
    return { ...this.profile };
  }

  get isBusy(): boolean {
    return this.activeTurn !== null;
  }

  /** True when retryLast() has something to re-send */
  get canRetry(): boolean {
    return this.lastFailed !== null || this.conv.hasTrailingExchange();
  }

  /**
   * Swap profile fields between turns.
   */
  updateProfile(patch: Partial<ConnectionProfile>): ConnectionProfile {
    if (this.activeTurn) {
      throw new ConfigInvalidError("Cannot change the profile while a response is in progress.");
    }
    const next: ConnectionProfile = { ...this.profile, ...patch };
    if (!next.model.trim()) throw new ConfigInvalidError("Model name cannot be empty.");
    validateTemperature(next.temperature);

    this.profile = next;
    this.transport.setProfile(next);
    if (patch.systemPrompt !== undefined) this.conv.systemPrompt = patch.systemPrompt;
    logComponent("session", "Profile updated", { model: next.model, endpoint: next.endpoint });
    return { ...next };
  }

  /** Check the configured endpoint against the allowlist without sending anything */
  checkEndpoint(): Promise<GateDecision> {
    return this.gate.check(this.transport.getEndpoint());
  }

  /** Abort the in-flight turn, if any */
  cancel(): void {
    this.activeTurn?.controller.abort(new CancelledError());
  }

  sendTurn(userText: string, options: TurnOptions = {}): AsyncGenerator<StreamEvent, void, undefined> {
    return this.runTurn(userText, "append", options);
  }

  /**
   * Re-run the most recent user message without duplicating it in history.
   */
  retryLast(options: TurnOptions = {}): AsyncGenerator<StreamEvent, void, undefined> {
    if (this.lastFailed) {
      return this.runTurn(this.lastFailed.userText, this.lastFailed.mode, options);
    }
    const lastUser = this.conv.hasTrailingExchange() ? this.conv.lastUserMessage() : null;
    if (lastUser !== null) {
      return this.runTurn(lastUser, "replace", options);
    }
    return (async function* (): AsyncGenerator<StreamEvent, void, undefined> {
      yield errorEvent(new ConfigInvalidError("Nothing to retry."));
    })();
  }

  private async *runTurn(
    userText: string,
    mode: TurnMode,
    options: TurnOptions
  ): AsyncGenerator<StreamEvent, void, undefined> {
    // One turn in flight: a new one supersedes the previous
    this.activeTurn?.controller.abort(new CancelledError("Superseded by a new turn."));
    const id = ++this.turnCounter;
    const controller = new AbortController();
    this.activeTurn = { id, controller };
    const unlink = linkSignal(options.signal, controller);
    const isActive = () => this.activeTurn?.id === id;

    logComponent("session", `Turn ${id} started (${mode})`);

    const meta: TurnMeta = {
      model: options.overrides?.model ?? this.profile.model,
      endpoint: this.transport.getEndpoint(),
      attempts: 0,
      elapsedMs: 0,
    };
    const events = handoff(this.pipeline(userText, mode, controller.signal, options.overrides, meta), this.bufferSize);
    let assistantText = "";
    let finished = false;

    try {
      while (true) {
        const next = await events.next();
        if (next.done) break;
        const event = next.value;

        if (event.type === "text_delta") {
          assistantText += event.text;
          yield event;
          continue;
        }

        finished = true;
        if (event.type === "error") {
          if (isActive()) this.lastFailed = { userText, mode };
          log(`[Session] Turn ${id} failed: ${event.kind}: ${event.message.split("\n")[0]}`);
          yield event;
          return;
        }

        if (!isActive() || controller.signal.aborted) {
          yield errorEvent(new CancelledError("Turn was cancelled before it completed."));
          return;
        }

        if (mode === "replace") {
          this.conv.replaceLastExchange(userText, assistantText);
        } else {
          this.conv.appendExchange(userText, assistantText);
        }
        this.conv.clearSystemHint();
        this.lastFailed = null;
        logComponent("session", `Turn ${id} committed`, {
          assistantChars: assistantText.length,
          attempts: meta.attempts,
          finishReason: event.finishReason,
        });

        await this.notifyExchange({
          userText,
          assistantText,
          model: meta.model,
          endpoint: meta.endpoint,
          attempts: meta.attempts,
          elapsedMs: meta.elapsedMs,
          finishReason: event.finishReason,
          usage: event.usage,
          replaced: mode === "replace",
        });
        yield event;
        return;
      }

      // The pipeline always ends with a terminal event; reaching here means it did not
      if (!finished) {
        if (isActive()) this.lastFailed = { userText, mode };
        yield errorEvent(new ProviderError(0, "Response ended without a terminal event."));
      }
    } finally {
      if (!finished) controller.abort(new CancelledError());
      await events.return();
      unlink();
      if (isActive()) this.activeTurn = null;
    }
  }

  private async *pipeline(
    userText: string,
    mode: TurnMode,
    signal: AbortSignal,
    overrides: PayloadOverrides | undefined,
    meta: TurnMeta
  ): AsyncGenerator<StreamEvent, void, undefined> {
    try {
      const payload = buildPayload({
        profile: this.profile,
        conversation: this.conv,
        userText,
        overrides,
        limits: this.limits,
        dropLastExchange: mode === "replace",
      });
      const intercepted = await applyInterceptor(this.interceptor, payload);
      meta.model = intercepted.model;

      const result = await this.transport.send(intercepted, signal);
      meta.attempts = result.attempts;
      meta.elapsedMs = result.elapsedMs;
      meta.endpoint = result.url;

      const { response } = result;
      const contentType = response.headers.get("content-type") ?? "";
      if (!intercepted.stream || contentType.includes("application/json")) {
        yield* decodeJsonCompletion(response, { signal });
        return;
      }
      if (!response.body) {
        throw new ProviderError(response.status, "Streaming response has no body.");
      }
      yield* decodeSseStream(response.body, {
        signal,
        maxConsecutiveMalformed: this.maxConsecutiveMalformed,
        idleTimeoutMs: this.profile.timeoutMs,
        status: response.status,
      });
    } catch (error) {
      yield errorEvent(toChatError(error));
    }
  }

  private async notifyExchange(exchange: CompletedExchange): Promise<void> {
    if (!this.onExchange) return;
    try {
      await this.onExchange(exchange);
    } catch (error) {
      log(`[Session] onExchange handler failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
