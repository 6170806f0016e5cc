import { describe, it, expect } from "vitest";
import { parseArgs } from "../src/cli.js";

describe("parseArgs", () => {
  it("should default to an interactive chat", () => {
    expect(parseArgs([])).toEqual({
      command: "chat",
      overrides: {},
      debug: false,
      logLevel: "info",
      stdin: false,
      jsonOutput: false,
      init: false,
    });
  });

  it("should map connection flags to overrides", () => {
    const config = parseArgs([
      "-e",
      "https://api.test/v1",
      "--model=test-model",
      "-k",
      "test-secret",
      "-t",
      "0.4",
      "--max-tokens",
      "512",
      "--timeout",
      "2.5",
      "--no-stream",
      "-s",
      "Be brief.",
    ]);

    expect(config.overrides).toEqual({
      endpoint: "https://api.test/v1",
      model: "test-model",
      apiKey: "test-secret",
      temperature: 0.4,
      maxTokens: 512,
      timeoutMs: 2500,
      stream: false,
      systemPrompt: "Be brief.",
    });
  });

  it("should collect repeated --allow-host flags", () => {
    const config = parseArgs(["--allow-host", "a.test", "--allow-host=10.0.0.0/8", "--enforce-allowlist"]);
    expect(config.overrides.allowHosts).toEqual(["a.test", "10.0.0.0/8"]);
    expect(config.overrides.enforceAllowlist).toBe(true);
  });

  it("should parse single-shot options", () => {
    const config = parseArgs(["--prompt", "hello", "--json", "--no-redact"]);
    expect(config.prompt).toBe("hello");
    expect(config.jsonOutput).toBe(true);
    expect(config.overrides.redact).toBe(false);
  });

  it("should accept a negative number as a value", () => {
    expect(parseArgs(["-t", "-1"]).overrides.temperature).toBe(-1);
  });

  it("should recognise subcommands and meta flags", () => {
    expect(parseArgs(["config", "--init"])).toMatchObject({ command: "config", init: true });
    expect(parseArgs(["--help"]).command).toBe("help");
    expect(parseArgs(["chat", "-v"]).command).toBe("version");
    expect(parseArgs(["--debug", "--log-level", "minimal"])).toMatchObject({ debug: true, logLevel: "minimal" });
  });

  it("should reject bad input", () => {
    expect(() => parseArgs(["--model"])).toThrow("--model requires a value");
    expect(() => parseArgs(["-m", "--debug"])).toThrow("-m requires a value");
    expect(() => parseArgs(["--frobnicate"])).toThrow("Unknown option: --frobnicate. Run 'cliai --help' for usage.");
    expect(() => parseArgs(["hello"])).toThrow("Unexpected argument: hello. Use --prompt to send a single message.");
    expect(() => parseArgs(["-t", "warm"])).toThrow("-t expects a number, got 'warm'");
    expect(() => parseArgs(["--init"])).toThrow("--init is only valid with the 'config' command");
    expect(() => parseArgs(["--json"])).toThrow("--json requires --prompt or --stdin");
    expect(() => parseArgs(["--debug=yes"])).toThrow("--debug does not take a value");
    expect(() => parseArgs(["--log-level", "loud"])).toThrow("--log-level must be one of debug, info, minimal");
  });
});
