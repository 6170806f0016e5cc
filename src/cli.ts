import { APP_NAME, APP_VERSION, ENV } from "./config.js";
import { ConfigInvalidError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { SettingsOverrides } from "./profile-config.js";

export type CliCommand = "chat" | "config" | "help" | "version";

export interface CliConfig {
  command: CliCommand;
  overrides: SettingsOverrides;
  debug: boolean;
  logLevel: LogLevel;
  /** Single-shot prompt; absent means interactive */
  prompt?: string;
  /** Read the single-shot prompt from stdin */
  stdin: boolean;
  /** NDJSON event output for single-shot runs */
  jsonOutput: boolean;
  /** `config --init` */
  init: boolean;
}

export function getVersion(): string {
  return APP_VERSION;
}

// Flags that take a value, with their long name
const VALUE_FLAGS: Record<string, string> = {
  "-e": "--endpoint",
  "--endpoint": "--endpoint",
  "-k": "--api-key",
  "--api-key": "--api-key",
  "-m": "--model",
  "--model": "--model",
  "-p": "--profile",
  "--profile": "--profile",
  "-s": "--system",
  "--system": "--system",
  "-t": "--temperature",
  "--temperature": "--temperature",
  "--max-tokens": "--max-tokens",
  "--timeout": "--timeout",
  "--allow-host": "--allow-host",
  "--interceptor": "--interceptor",
  "--prompt": "--prompt",
  "--log-level": "--log-level",
};

const LOG_LEVELS: LogLevel[] = ["debug", "info", "minimal"];

function parseNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new ConfigInvalidError(`${flag} expects a number, got '${value}'`);
  }
  return n;
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseArgs(args: string[]): CliConfig {
  const config: CliConfig = {
    command: "chat",
    overrides: {},
    debug: false,
    logLevel: "info",
    stdin: false,
    jsonOutput: false,
    init: false,
  };
  const overrides = config.overrides;
  let sawCommand = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // --flag=value
    let flag = arg;
    let inline: string | undefined;
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 2) {
      flag = arg.slice(0, eq);
      inline = arg.slice(eq + 1);
    }

    const longName = VALUE_FLAGS[flag];
    if (longName) {
      const value = inline ?? args[i + 1];
      if (value === undefined || (inline === undefined && value.startsWith("-") && value.length > 1 && !/^-\d/.test(value))) {
        throw new ConfigInvalidError(`${flag} requires a value`);
      }
      if (inline === undefined) i++;

      switch (longName) {
        case "--endpoint":
          overrides.endpoint = value;
          break;
        case "--api-key":
          overrides.apiKey = value;
          break;
        case "--model":
          overrides.model = value;
          break;
        case "--profile":
          overrides.profile = value;
          break;
        case "--system":
          overrides.systemPrompt = value;
          break;
        case "--temperature":
          overrides.temperature = parseNumber(flag, value);
          break;
        case "--max-tokens":
          overrides.maxTokens = parseNumber(flag, value);
          break;
        case "--timeout":
          // seconds on the command line
          overrides.timeoutMs = Math.round(parseNumber(flag, value) * 1000);
          break;
        case "--allow-host":
          overrides.allowHosts = [...(overrides.allowHosts ?? []), value];
          break;
        case "--interceptor":
          overrides.interceptor = value;
          break;
        case "--prompt":
          config.prompt = value;
          break;
        case "--log-level": {
          const level = LOG_LEVELS.find((l) => l === value);
          if (!level) throw new ConfigInvalidError(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
          config.logLevel = level;
          break;
        }
      }
      continue;
    }

    if (inline !== undefined) {
      throw new ConfigInvalidError(`${flag} does not take a value`);
    }

    switch (flag) {
      case "--no-stream":
        overrides.stream = false;
        break;
      case "--enforce-allowlist":
        overrides.enforceAllowlist = true;
        break;
      case "--no-redact":
        overrides.redact = false;
        break;
      case "--debug":
        config.debug = true;
        break;
      case "--json":
        config.jsonOutput = true;
        break;
      case "--stdin":
        config.stdin = true;
        break;
      case "--init":
        config.init = true;
        break;
      case "-h":
      case "--help":
        config.command = "help";
        break;
      case "-v":
      case "--version":
        config.command = "version";
        break;
      default:
        if (flag.startsWith("-")) {
          throw new ConfigInvalidError(`Unknown option: ${flag}. Run '${APP_NAME} --help' for usage.`);
        }
        if (sawCommand || (flag !== "chat" && flag !== "config")) {
          throw new ConfigInvalidError(`Unexpected argument: ${flag}. Use --prompt to send a single message.`);
        }
        sawCommand = true;
        if (config.command !== "help" && config.command !== "version") config.command = flag;
    }
  }

  if (config.init && config.command !== "config") {
    throw new ConfigInvalidError("--init is only valid with the 'config' command");
  }
  if (config.jsonOutput && config.prompt === undefined && !config.stdin) {
    throw new ConfigInvalidError("--json requires --prompt or --stdin");
  }

  return config;
}

export function helpText(): string {
  return `${APP_NAME} v${APP_VERSION} - chat with OpenAI-compatible endpoints from the terminal

USAGE
  ${APP_NAME} [chat] [options]          Start an interactive chat
  ${APP_NAME} --prompt "text" [--json]  Send one message and exit
  ${APP_NAME} config [--init]           Show or create the configuration

OPTIONS
  -e, --endpoint <url>      API base URL (e.g. https://api.openai.com/v1)
  -k, --api-key <key>       API key sent as a Bearer token
  -m, --model <name>        Model name
  -p, --profile <name>      Profile from the config file
  -s, --system <prompt>     System prompt
  -t, --temperature <n>     Sampling temperature (0-2)
      --max-tokens <n>      Maximum tokens in the reply
      --no-stream           Wait for the full reply instead of streaming
      --timeout <seconds>   Time allowed until the server responds
      --allow-host <host>   Add a host, *.domain or CIDR range to the allowlist (repeatable)
      --enforce-allowlist   Refuse endpoints outside the allowlist
      --interceptor <path>  Module exporting interceptPayload(payload)
      --no-redact           Send messages without masking secrets
      --stdin               Read the single-shot prompt from stdin
      --json                Print single-shot output as NDJSON events
      --debug               Write a debug log to ./logs
      --log-level <level>   debug | info | minimal
  -h, --help                Show this help
  -v, --version             Show the version

ENVIRONMENT
  ${Object.values(ENV).join(", ")}
  A .env file in the current directory is loaded first.

CHAT COMMANDS
  /help /clear /model [name] /system [prompt] /retry /redact /info /exit
`;
}
