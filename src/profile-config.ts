/**
 * cliai Profile Configuration
 *
 * Connection profiles plus security, retry and redaction settings.
 * Supports two scopes:
 *   - Global: ~/.cliai/config.json (shared across all projects)
 *   - Local:  .cliai.json in the current directory (project-specific overrides)
 *
 * Resolution order: defaults < config files (local over global) < environment < CLI flags.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import {
  CONFIG_FILE,
  DEFAULT_ALLOWED_HOSTS,
  DEFAULT_ENDPOINT,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  ENV,
  LOCAL_CONFIG_FILENAME,
} from "./config.js";
import { ConfigInvalidError } from "./errors.js";
import { DEFAULT_RETRY_POLICY } from "./transport/backoff.js";
import { validateMaxTokens, validateTemperature } from "./chat/payload-builder.js";
import { extractDestination } from "./network/allowlist.js";
import type { AllowlistPolicy, ConnectionProfile, RetryPolicy } from "./types.js";
import { isRecord } from "./types.js";

export type ProfileScope = "local" | "global";

/**
 * A named connection profile as stored on disk; every field optional
 */
export interface ProfileSettings {
  endpoint?: string;
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  stream?: boolean;
  timeoutMs?: number;
  includeUsage?: boolean;
}

export interface SecuritySettings {
  enforceAllowlist?: boolean;
  allowedHosts?: string[];
}

export interface RetrySettings {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
}

export interface RedactSettings {
  enabled?: boolean;
  /** value → placeholder */
  terms?: Record<string, string>;
}

/**
 * Root configuration structure
 */
export interface CliaiConfig {
  version: string;
  defaultProfile: string;
  profiles: Record<string, ProfileSettings>;
  security?: SecuritySettings;
  retry?: RetrySettings;
  redact?: RedactSettings;
  /** Path to a payload interceptor module */
  interceptor?: string;
}

/**
 * Profile with scope metadata for display
 */
export interface ProfileWithScope {
  name: string;
  scope: ProfileScope;
  isDefault: boolean;
  shadowed?: boolean; // global profile hidden by same-name local profile
  settings: ProfileSettings;
}

/**
 * Values given on the command line; undefined means "not given"
 */
export interface SettingsOverrides {
  profile?: string;
  endpoint?: string;
  apiKey?: string;
  model?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
  timeoutMs?: number;
  allowHosts?: string[];
  enforceAllowlist?: boolean;
  interceptor?: string;
  redact?: boolean;
}

export interface ResolvedSettings {
  profileName: string;
  profile: ConnectionProfile;
  allowlist: AllowlistPolicy;
  retry: RetryPolicy;
  redact: { enabled: boolean; terms: Record<string, string> };
  interceptorPath?: string;
}

export const MAX_TOKENS_CAP = 128_000;

/**
 * Default configuration
 */
export function defaultConfig(): CliaiConfig {
  return {
    version: "1.0.0",
    defaultProfile: "default",
    profiles: {
      default: { endpoint: DEFAULT_ENDPOINT, model: DEFAULT_MODEL, stream: true },
    },
    security: { enforceAllowlist: false, allowedHosts: [...DEFAULT_ALLOWED_HOSTS] },
    retry: {
      maxAttempts: DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs: DEFAULT_RETRY_POLICY.baseDelayMs,
      maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
      jitter: DEFAULT_RETRY_POLICY.jitter,
    },
    redact: { enabled: true, terms: {} },
  };
}

// ─── Validation ──────────────────────────────────────────

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ConfigInvalidError(`${where}.${key} must be a string`);
  return value;
}

function optionalNumber(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigInvalidError(`${where}.${key} must be a number`);
  }
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ConfigInvalidError(`${where}.${key} must be true or false`);
  return value;
}

function optionalSection(obj: Record<string, unknown>, key: string, where: string): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw new ConfigInvalidError(`${where}.${key} must be an object`);
  return value;
}

function parseProfile(raw: unknown, where: string): ProfileSettings {
  if (!isRecord(raw)) throw new ConfigInvalidError(`${where} must be an object`);
  return {
    endpoint: optionalString(raw, "endpoint", where),
    apiKey: optionalString(raw, "apiKey", where),
    model: optionalString(raw, "model", where),
    temperature: optionalNumber(raw, "temperature", where),
    maxTokens: optionalNumber(raw, "maxTokens", where),
    systemPrompt: optionalString(raw, "systemPrompt", where),
    stream: optionalBoolean(raw, "stream", where),
    timeoutMs: optionalNumber(raw, "timeoutMs", where),
    includeUsage: optionalBoolean(raw, "includeUsage", where),
  };
}

/**
 * Validate parsed JSON into a CliaiConfig. Unknown keys are ignored.
 */
export function parseConfig(raw: unknown, source: string): CliaiConfig {
  if (!isRecord(raw)) throw new ConfigInvalidError(`${source}: configuration must be a JSON object`);

  const profiles: Record<string, ProfileSettings> = {};
  const rawProfiles = optionalSection(raw, "profiles", source);
  for (const [name, value] of Object.entries(rawProfiles ?? {})) {
    profiles[name] = parseProfile(value, `${source}: profiles.${name}`);
  }

  const config: CliaiConfig = {
    version: optionalString(raw, "version", source) ?? "1.0.0",
    defaultProfile: optionalString(raw, "defaultProfile", source) ?? "",
    profiles,
  };

  const security = optionalSection(raw, "security", source);
  if (security) {
    const hosts = security.allowedHosts;
    if (hosts !== undefined && (!Array.isArray(hosts) || !hosts.every((h) => typeof h === "string"))) {
      throw new ConfigInvalidError(`${source}: security.allowedHosts must be an array of strings`);
    }
    config.security = {
      enforceAllowlist: optionalBoolean(security, "enforceAllowlist", `${source}: security`),
      allowedHosts: Array.isArray(hosts) ? hosts.filter((h): h is string => typeof h === "string") : undefined,
    };
  }

  const retry = optionalSection(raw, "retry", source);
  if (retry) {
    const where = `${source}: retry`;
    config.retry = {
      maxAttempts: optionalNumber(retry, "maxAttempts", where),
      baseDelayMs: optionalNumber(retry, "baseDelayMs", where),
      maxDelayMs: optionalNumber(retry, "maxDelayMs", where),
      jitter: optionalNumber(retry, "jitter", where),
    };
  }

  const redact = optionalSection(raw, "redact", source);
  if (redact) {
    const terms: Record<string, string> = {};
    for (const [value, placeholder] of Object.entries(optionalSection(redact, "terms", `${source}: redact`) ?? {})) {
      if (typeof placeholder !== "string") {
        throw new ConfigInvalidError(`${source}: redact.terms values must be strings`);
      }
      terms[value] = placeholder;
    }
    config.redact = { enabled: optionalBoolean(redact, "enabled", `${source}: redact`), terms };
  }

  const interceptor = optionalString(raw, "interceptor", source);
  if (interceptor) config.interceptor = interceptor;

  return config;
}

function readConfigFile(path: string): CliaiConfig | null {
  if (!existsSync(path)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigInvalidError(`Failed to parse ${path}: ${reason}`, { cause: error });
  }
  return parseConfig(raw, path);
}

// ─── Global Config ───────────────────────────────────────

/**
 * Load global configuration from ~/.cliai/config.json
 * Returns null if the file doesn't exist
 */
export function loadConfig(path: string = CONFIG_FILE): CliaiConfig | null {
  return readConfigFile(path);
}

export function saveConfig(config: CliaiConfig, path: string = CONFIG_FILE): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), "utf-8");
}

export function configExists(path: string = CONFIG_FILE): boolean {
  return existsSync(path);
}

/**
 * Create the global config with defaults unless it already exists.
 * Returns true when a file was written.
 */
export function writeDefaultConfig(path: string = CONFIG_FILE): boolean {
  if (existsSync(path)) return false;
  saveConfig(defaultConfig(), path);
  return true;
}

// ─── Local Config ────────────────────────────────────────

/**
 * Get path to local config file (.cliai.json in CWD)
 */
export function getLocalConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, LOCAL_CONFIG_FILENAME);
}

export function loadLocalConfig(path: string = getLocalConfigPath()): CliaiConfig | null {
  return readConfigFile(path);
}

// ─── Profiles ────────────────────────────────────────────

/**
 * List profiles from both scopes. Local profiles come first; a global
 * profile with the same name is marked shadowed.
 */
export function listProfiles(global: CliaiConfig | null, local: CliaiConfig | null): ProfileWithScope[] {
  const defaultName = local?.defaultProfile || global?.defaultProfile || "default";
  const result: ProfileWithScope[] = [];
  const localNames = new Set(Object.keys(local?.profiles ?? {}));

  for (const [name, settings] of Object.entries(local?.profiles ?? {})) {
    result.push({ name, scope: "local", isDefault: name === defaultName, settings });
  }
  for (const [name, settings] of Object.entries(global?.profiles ?? {})) {
    const shadowed = localNames.has(name);
    result.push({ name, scope: "global", isDefault: !shadowed && name === defaultName, shadowed, settings });
  }
  return result;
}

// ─── Resolution ──────────────────────────────────────────

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new ConfigInvalidError(`${name} must be a number, got '${value}'`);
  return parsed;
}

export function parseBooleanFlag(value: string, name: string): boolean {
  const lower = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(lower)) return true;
  if (["0", "false", "no", "off"].includes(lower)) return false;
  throw new ConfigInvalidError(`${name} must be true or false, got '${value}'`);
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = envString(env, name);
  return value === undefined ? undefined : parseBooleanFlag(value, name);
}

export function splitHostList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((h) => h.trim())
    .filter(Boolean);
}

function validateRetry(retry: RetryPolicy): RetryPolicy {
  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
    throw new ConfigInvalidError(`retry.maxAttempts must be a positive integer, got ${retry.maxAttempts}`);
  }
  if (retry.baseDelayMs < 0 || retry.maxDelayMs < 0) {
    throw new ConfigInvalidError("retry delays cannot be negative");
  }
  if (retry.jitter < 0 || retry.jitter > 1) {
    throw new ConfigInvalidError(`retry.jitter must be between 0 and 1, got ${retry.jitter}`);
  }
  return retry;
}

/**
 * Merge defaults, config files, environment and CLI flags into the settings
 * a session runs with. Pure: callers load the files and pass them in.
 */
export function resolveSettings(input: {
  global: CliaiConfig | null;
  local: CliaiConfig | null;
  env?: NodeJS.ProcessEnv;
  cli?: SettingsOverrides;
}): ResolvedSettings {
  const { global, local } = input;
  const env = input.env ?? {};
  const cli = input.cli ?? {};

  const requested = cli.profile ?? envString(env, ENV.PROFILE);
  const profileName = requested ?? (local?.defaultProfile || global?.defaultProfile || "default");
  const fromFile = local?.profiles[profileName] ?? global?.profiles[profileName];
  if (requested !== undefined && !fromFile) {
    throw new ConfigInvalidError(`Profile '${requested}' not found. Run 'cliai config' to list profiles.`);
  }
  const file: ProfileSettings = fromFile ?? {};

  const profile: ConnectionProfile = {
    endpoint: cli.endpoint ?? envString(env, ENV.ENDPOINT) ?? file.endpoint ?? DEFAULT_ENDPOINT,
    apiKey: cli.apiKey ?? envString(env, ENV.API_KEY) ?? file.apiKey,
    model: cli.model ?? envString(env, ENV.MODEL) ?? file.model ?? DEFAULT_MODEL,
    temperature: cli.temperature ?? envNumber(env, ENV.TEMPERATURE) ?? file.temperature,
    maxTokens: cli.maxTokens ?? envNumber(env, ENV.MAX_TOKENS) ?? file.maxTokens,
    stream: cli.stream ?? envBoolean(env, ENV.STREAM) ?? file.stream ?? true,
    timeoutMs: cli.timeoutMs ?? envNumber(env, ENV.TIMEOUT_MS) ?? file.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    systemPrompt: cli.systemPrompt ?? envString(env, ENV.SYSTEM_PROMPT) ?? file.systemPrompt,
    includeUsage: file.includeUsage ?? false,
  };

  extractDestination(profile.endpoint);
  if (!profile.model.trim()) throw new ConfigInvalidError("Model name cannot be empty.");
  validateTemperature(profile.temperature);
  validateMaxTokens(profile.maxTokens, MAX_TOKENS_CAP);
  if (!Number.isFinite(profile.timeoutMs) || profile.timeoutMs <= 0) {
    throw new ConfigInvalidError(`Timeout must be a positive number of milliseconds, got ${profile.timeoutMs}`);
  }

  const baseHosts = local?.security?.allowedHosts ?? global?.security?.allowedHosts ?? DEFAULT_ALLOWED_HOSTS;
  const allowedHosts = [
    ...new Set([...baseHosts, ...splitHostList(envString(env, ENV.ALLOWED_HOSTS)), ...(cli.allowHosts ?? [])]),
  ];
  const allowlist: AllowlistPolicy = {
    enforced:
      cli.enforceAllowlist ??
      envBoolean(env, ENV.ENFORCE_ALLOWLIST) ??
      local?.security?.enforceAllowlist ??
      global?.security?.enforceAllowlist ??
      false,
    allowedHosts,
  };

  const maxRetries = envNumber(env, ENV.MAX_RETRIES);
  const retry = validateRetry({
    ...DEFAULT_RETRY_POLICY,
    ...definedOnly(global?.retry),
    ...definedOnly(local?.retry),
    ...(maxRetries !== undefined ? { maxAttempts: maxRetries + 1 } : {}),
  });

  const redact = {
    enabled: cli.redact ?? local?.redact?.enabled ?? global?.redact?.enabled ?? true,
    terms: { ...global?.redact?.terms, ...local?.redact?.terms },
  };

  return {
    profileName,
    profile,
    allowlist,
    retry,
    redact,
    interceptorPath: cli.interceptor ?? local?.interceptor ?? global?.interceptor,
  };
}

function definedOnly(settings: RetrySettings | undefined): RetrySettings {
  const result: RetrySettings = {};
  if (!settings) return result;
  if (settings.maxAttempts !== undefined) result.maxAttempts = settings.maxAttempts;
  if (settings.baseDelayMs !== undefined) result.baseDelayMs = settings.baseDelayMs;
  if (settings.maxDelayMs !== undefined) result.maxDelayMs = settings.maxDelayMs;
  if (settings.jitter !== undefined) result.jitter = settings.jitter;
  return result;
}
