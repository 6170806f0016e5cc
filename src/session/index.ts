// Public API of the chat core
export { SessionEngine } from "./session-engine.js";
export type { CompletedExchange, SessionEngineOptions, TurnOptions } from "./session-engine.js";
export { Conversation } from "./conversation.js";
export type { ConversationSnapshot } from "./conversation.js";
export { saveExchange, exchangeFileName } from "./exchange-log.js";
export type { ExchangeRecord } from "./exchange-log.js";
export { AllowlistGate } from "../network/allowlist.js";
export type { GateDecision, HostResolver } from "../network/allowlist.js";
export { RetryingTransport, completionsUrl } from "../transport/http-transport.js";
export type { FetchLike, HttpResponse, TransportState, TransportTransition } from "../transport/http-transport.js";
export { DEFAULT_RETRY_POLICY, computeBackoff } from "../transport/backoff.js";
export { buildPayload, toWireBody } from "../chat/payload-builder.js";
export {
  applyInterceptor,
  composeInterceptors,
  createInterceptor,
  identityInterceptor,
  loadInterceptorModule,
} from "../chat/interceptor.js";
export type { PayloadInterceptor } from "../chat/interceptor.js";
export { Redactor, createRedactionInterceptor } from "../chat/redactor.js";
export { decodeSseStream, SseEventParser } from "../stream-parsers/openai-sse.js";
export { decodeJsonCompletion } from "../stream-parsers/json-completion.js";
export * from "../errors.js";
export * from "../types.js";
