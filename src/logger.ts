import { appendFile, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "minimal";

let logFilePath: string | null = null;
let logLevel: LogLevel = "info"; // Default to structured logging
let logBuffer: string[] = []; // Buffer for async writes
let flushTimer: NodeJS.Timeout | null = null;
let exitHookInstalled = false;
const FLUSH_INTERVAL_MS = 100; // Flush every 100ms
const MAX_BUFFER_SIZE = 50; // Flush if buffer exceeds 50 messages

/**
 * Debug configuration for component-specific logging
 */
export interface DebugConfig {
  enabled: boolean;
  components: {
    transport: boolean;
    sse: boolean;
    allowlist: boolean;
    session: boolean;
  };
}

export type DebugComponent = keyof DebugConfig["components"];

let debugConfig: DebugConfig | null = null;

/**
 * Initialize debug configuration from environment variables
 */
export function initializeDebugConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv
): DebugConfig {
  const config: DebugConfig = {
    enabled: env.CLIAI_DEBUG === "true" || argv.includes("--debug"),
    components: {
      transport: env.CLIAI_DEBUG_TRANSPORT === "true",
      sse: env.CLIAI_DEBUG_SSE === "true",
      allowlist: env.CLIAI_DEBUG_ALLOWLIST === "true",
      session: env.CLIAI_DEBUG_SESSION === "true",
    },
  };

  // Enable all components if main debug flag is set and no specific components are enabled
  if (config.enabled && !Object.values(config.components).some(Boolean)) {
    config.components = { transport: true, sse: true, allowlist: true, session: true };
  }

  debugConfig = config;
  return config;
}

export function shouldDebug(component: DebugComponent): boolean {
  if (!debugConfig || !debugConfig.enabled) return false;
  return debugConfig.components[component];
}

/**
 * Flush log buffer to file (async)
 */
function flushLogBuffer(): void {
  if (!logFilePath || logBuffer.length === 0) return;

  const toWrite = logBuffer.join("");
  logBuffer = [];

  appendFile(logFilePath, toWrite, (err) => {
    if (err) {
      console.error(`[cliai] Warning: Failed to write to log file: ${err.message}`);
    }
  });
}

function scheduleFlush(): void {
  if (flushTimer) return;

  flushTimer = setInterval(flushLogBuffer, FLUSH_INTERVAL_MS);
  // Never keep the process alive just to flush logs
  flushTimer.unref();

  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.on("exit", () => {
    if (flushTimer) {
      clearInterval(flushTimer);
      flushTimer = null;
    }
    // Final flush (must be sync on exit)
    if (logFilePath && logBuffer.length > 0) {
      writeFileSync(logFilePath, logBuffer.join(""), { flag: "a" });
      logBuffer = [];
    }
  });
}

/**
 * Initialize file logging for this session
 */
export function initLogger(debugMode: boolean, level: LogLevel = "info", logsDir?: string): void {
  if (!debugMode) {
    logFilePath = null;
    if (flushTimer) {
      clearInterval(flushTimer);
      flushTimer = null;
    }
    return;
  }

  logLevel = level;

  const dir = logsDir ?? join(process.cwd(), "logs");
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .split("T")
    .join("_")
    .slice(0, -5);
  logFilePath = join(dir, `cliai_${timestamp}.log`);

  writeFileSync(
    logFilePath,
    `cliai Debug Log - ${new Date().toISOString()}\nLog Level: ${level}\n${"=".repeat(80)}\n\n`
  );

  scheduleFlush();
}

/**
 * Log a message (to file only in debug mode, silent otherwise)
 * Uses async buffered writes to avoid blocking event loop
 */
export function log(message: string, forceConsole = false): void {
  if (logFilePath) {
    logBuffer.push(`[${new Date().toISOString()}] ${message}\n`);

    if (logBuffer.length >= MAX_BUFFER_SIZE) {
      flushLogBuffer();
    }
  }

  if (forceConsole) {
    console.log(message);
  }
}

export function getLogFilePath(): string | null {
  return logFilePath;
}

/**
 * Mask sensitive credentials for logging
 * Shows only first 4 and last 4 characters
 */
export function maskCredential(credential: string | undefined): string {
  if (!credential || credential.length <= 8) {
    return "***";
  }
  return `${credential.substring(0, 4)}...${credential.substring(credential.length - 4)}`;
}

/**
 * Truncate content for logging (keeps first N chars + "...")
 */
export function truncateContent(content: unknown, maxLength = 200): string {
  const str = typeof content === "string" ? content : JSON.stringify(content) ?? String(content);
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.substring(0, maxLength)}... [truncated ${str.length - maxLength} chars]`;
}

/**
 * Log structured data (only in info/debug mode)
 * Automatically truncates long content based on log level
 */
export function logStructured(label: string, data: Record<string, unknown>): void {
  if (!logFilePath) return;

  if (logLevel === "minimal") {
    log(`[${label}]`);
    return;
  }

  if (logLevel === "info") {
    const structured: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === "string" || typeof value === "object") {
        structured[key] = truncateContent(value, 150);
      } else {
        structured[key] = value;
      }
    }
    log(`[${label}] ${JSON.stringify(structured, null, 2)}`);
    return;
  }

  log(`[${label}] ${JSON.stringify(data, null, 2)}`);
}

/**
 * Component-specific logging that checks debug configuration
 */
export function logComponent(
  component: DebugComponent,
  message: string,
  data?: Record<string, unknown>
): void {
  if (!shouldDebug(component)) return;

  if (data) {
    logStructured(`${component.toUpperCase()}_${message}`, data);
  } else {
    log(`[${component.toUpperCase()}] ${message}`);
  }
}
