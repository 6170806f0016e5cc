import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  getLogFilePath,
  initLogger,
  initializeDebugConfig,
  maskCredential,
  shouldDebug,
  truncateContent,
} from "../src/logger.js";

describe("maskCredential", () => {
  it("should keep only the first and last four characters", () => {
    expect(maskCredential("test-secret")).toBe("test...cret");
  });

  it("should hide short or missing values entirely", () => {
    expect(maskCredential("short")).toBe("***");
    expect(maskCredential(undefined)).toBe("***");
  });
});

describe("truncateContent", () => {
  it("should report how much was cut", () => {
    expect(truncateContent("abcdefghij", 4)).toBe("abcd... [truncated 6 chars]");
    expect(truncateContent({ a: 1 })).toBe('{"a":1}');
  });
});

describe("initializeDebugConfig", () => {
  afterEach(() => {
    initializeDebugConfig({}, []);
  });

  it("should enable every component when only the main flag is set", () => {
    const config = initializeDebugConfig({ CLIAI_DEBUG: "true" }, []);
    expect(config.components).toEqual({ transport: true, sse: true, allowlist: true, session: true });
    expect(shouldDebug("sse")).toBe(true);
  });

  it("should keep an explicit component selection", () => {
    const config = initializeDebugConfig({ CLIAI_DEBUG_SSE: "true" }, ["--debug"]);
    expect(config.enabled).toBe(true);
    expect(config.components).toEqual({ transport: false, sse: true, allowlist: false, session: false });
    expect(shouldDebug("transport")).toBe(false);
  });
});

describe("initLogger", () => {
  let dir: string | undefined;

  afterEach(() => {
    initLogger(false);
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should stay silent unless debug mode is on", () => {
    initLogger(false);
    expect(getLogFilePath()).toBeNull();
  });

  it("should create a log file with a header in debug mode", () => {
    dir = mkdtempSync(join(tmpdir(), "logger-test-"));
    initLogger(true, "debug", dir);

    const path = getLogFilePath();
    expect(path).not.toBeNull();
    expect(path?.startsWith(join(dir, "cliai_"))).toBe(true);
    expect(readFileSync(path ?? "", "utf-8")).toMatch(/^cliai Debug Log - .*\nLog Level: debug\n/);
  });
});
