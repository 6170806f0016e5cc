import { homedir } from "node:os";
import { join } from "node:path";

export const APP_NAME = "cliai";
export const APP_VERSION = "0.4.0";

// Config directory and file paths
export const CONFIG_DIR = join(homedir(), ".cliai");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");
export const LOCAL_CONFIG_FILENAME = ".cliai.json";
export const EXCHANGES_DIR = join(CONFIG_DIR, "exchanges");

export const DEFAULT_ENDPOINT = "http://localhost:11434/v1";
export const DEFAULT_MODEL = "llama3.1";
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_BUFFER_SIZE = 64;
export const DEFAULT_MAX_CONSECUTIVE_MALFORMED = 3;

/** Hosts permitted out of the box when the allowlist is enforced */
export const DEFAULT_ALLOWED_HOSTS = ["localhost", "127.0.0.1", "[::1]"];

/**
 * Environment variable names
 */
export const ENV = {
  PROFILE: "CLIAI_PROFILE",
  ENDPOINT: "CLIAI_ENDPOINT",
  API_KEY: "CLIAI_API_KEY",
  MODEL: "CLIAI_MODEL",
  TEMPERATURE: "CLIAI_TEMPERATURE",
  MAX_TOKENS: "CLIAI_MAX_TOKENS",
  SYSTEM_PROMPT: "CLIAI_SYSTEM_PROMPT",
  STREAM: "CLIAI_STREAM",
  TIMEOUT_MS: "CLIAI_TIMEOUT_MS",
  ALLOWED_HOSTS: "CLIAI_ALLOWED_HOSTS",
  ENFORCE_ALLOWLIST: "CLIAI_ENFORCE_ALLOWLIST",
  MAX_RETRIES: "CLIAI_MAX_RETRIES",
  DEBUG: "CLIAI_DEBUG",
} as const;
