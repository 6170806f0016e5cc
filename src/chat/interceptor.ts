/**
 * Payload interceptors: user-pluggable transforms run once per turn,
 * after the payload is built and before the allowlist gate and transport.
 *
 * A user module can be bound at session start with loadInterceptorModule():
 *
 *   // my-interceptor.mjs
 *   export function interceptPayload(payload) {
 *     return { ...payload, options: { ...payload.options, temperature: 0.2 } };
 *   }
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { Message, MessageRole, Payload } from "../types.js";
import { isRecord } from "../types.js";
import { ConfigInvalidError, InterceptorFailedError, isChatError } from "../errors.js";
import { clonePayload } from "./payload-builder.js";
import { log } from "../logger.js";

export interface PayloadInterceptor {
  readonly name: string;
  transform(payload: Payload): Payload | Promise<Payload>;
}

export type InterceptFn = (payload: Payload) => Payload | Promise<Payload>;

export const identityInterceptor: PayloadInterceptor = {
  name: "identity",
  transform: (payload) => payload,
};

export function createInterceptor(name: string, fn: InterceptFn): PayloadInterceptor {
  return { name, transform: fn };
}

/**
 * Chain interceptors left to right. An empty list is the identity.
 */
export function composeInterceptors(...interceptors: PayloadInterceptor[]): PayloadInterceptor {
  const active = interceptors.filter((i) => i !== identityInterceptor);
  if (active.length === 0) return identityInterceptor;
  if (active.length === 1) return active[0];

  return {
    name: active.map((i) => i.name).join(" → "),
    async transform(payload) {
      let current = payload;
      for (const interceptor of active) {
        current = await applyInterceptor(interceptor, current);
      }
      return current;
    },
  };
}

const ROLES: ReadonlySet<string> = new Set<MessageRole>(["system", "user", "assistant"]);

function isMessage(value: unknown): value is Message {
  return (
    isRecord(value) &&
    typeof value.role === "string" &&
    ROLES.has(value.role) &&
    typeof value.content === "string"
  );
}

/**
 * Check that an interceptor returned something still shaped like a payload.
 * Returns a reason string when it did not.
 */
export function describePayloadProblem(value: unknown): string | null {
  if (!isRecord(value)) return "did not return a payload object";
  if (typeof value.model !== "string" || !value.model.trim()) return "payload.model must be a non-empty string";
  if (!Array.isArray(value.messages)) return "payload.messages must be an array";
  const badIndex = value.messages.findIndex((m) => !isMessage(m));
  if (badIndex !== -1) return `payload.messages[${badIndex}] must be {role, content} with a known role`;
  if (typeof value.stream !== "boolean") return "payload.stream must be a boolean";
  if (!isRecord(value.options)) return "payload.options must be an object";
  return null;
}

/**
 * Run one interceptor over a private copy of the payload.
 * Any throw or malformed result fails the turn locally.
 */
export async function applyInterceptor(
  interceptor: PayloadInterceptor,
  payload: Payload
): Promise<Payload> {
  if (interceptor === identityInterceptor) return payload;

  let result: unknown;
  try {
    result = await interceptor.transform(clonePayload(payload));
  } catch (error) {
    if (isChatError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    log(`[Interceptor] ${interceptor.name} threw: ${reason}`);
    throw new InterceptorFailedError(interceptor.name, reason, { cause: error });
  }

  if (!isPayload(result)) {
    throw new InterceptorFailedError(interceptor.name, describePayloadProblem(result) ?? "invalid payload");
  }
  return result;
}

function isPayload(value: unknown): value is Payload {
  return describePayloadProblem(value) === null;
}

/**
 * Import a user interceptor module and bind it once.
 * The module exports `interceptPayload(payload)` or a default function.
 */
export async function loadInterceptorModule(modulePath: string): Promise<PayloadInterceptor> {
  const absolute = resolve(modulePath);
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(absolute).href);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigInvalidError(`Cannot load interceptor module ${absolute}: ${reason}`, { cause: error });
  }

  const fn = isRecord(mod) ? (mod.interceptPayload ?? mod.default) : undefined;
  if (typeof fn !== "function") {
    throw new ConfigInvalidError(
      `Interceptor module ${absolute} must export an 'interceptPayload' function or a default function`
    );
  }

  log(`[Interceptor] Loaded ${absolute}`);
  return {
    name: absolute,
    transform: async (payload) => {
      const result: unknown = await fn(payload);
      if (!isPayload(result)) {
        throw new InterceptorFailedError(absolute, describePayloadProblem(result) ?? "invalid payload");
      }
      return result;
    },
  };
}
