import { describe, it, expect, beforeEach } from "vitest";
import { CommandHandler, parseCommand } from "../src/commands.js";
import { SessionEngine } from "../src/session/session-engine.js";
import { Redactor } from "../src/chat/redactor.js";
import type { ChatOutput } from "../src/chat-ui.js";
import { fakeResponse, scriptedFetch, testProfile } from "./helpers.js";

class CapturedOutput implements ChatOutput {
  readonly lines: string[] = [];

  write(text: string): void {
    this.lines.push(text);
  }

  line(text = ""): void {
    this.lines.push(text);
  }

  info(text: string): void {
    this.lines.push(`info: ${text}`);
  }

  warn(text: string): void {
    this.lines.push(`warn: ${text}`);
  }

  error(text: string): void {
    this.lines.push(`error: ${text}`);
  }
}

describe("parseCommand", () => {
  it("should split the command from its arguments", () => {
    expect(parseCommand("/model gpt-test")).toEqual({ command: "model", args: "gpt-test" });
    expect(parseCommand("  /system  Be brief.  ")).toEqual({ command: "system", args: "Be brief." });
    expect(parseCommand("/HELP")).toEqual({ command: "help", args: "" });
  });

  it("should treat anything else as a chat message", () => {
    expect(parseCommand("hello")).toBeNull();
    expect(parseCommand("//not a command")).toBeNull();
    expect(parseCommand("/")).toBeNull();
  });
});

describe("CommandHandler", () => {
  let engine: SessionEngine;
  let output: CapturedOutput;
  let redactor: Redactor | undefined;

  const handler = () =>
    new CommandHandler({
      engine,
      output,
      redactor,
      summary: () => ({
        profileName: "default",
        profile: engine.getProfile(),
        allowlist: { enforced: false, allowedHosts: [] },
        redactEnabled: redactor !== undefined,
        historyLength: engine.conversation.length,
      }),
    });

  const run = (input: string) => {
    const parsed = parseCommand(input);
    if (!parsed) throw new Error(`not a command: ${input}`);
    return handler().handle(parsed);
  };

  beforeEach(() => {
    engine = new SessionEngine({
      profile: testProfile(),
      allowlist: { enforced: false, allowedHosts: [] },
      fetch: scriptedFetch(() => fakeResponse(500)),
    });
    output = new CapturedOutput();
    redactor = undefined;
  });

  it("should show and switch the model", () => {
    run("/model");
    run("/model other-model");

    expect(output.lines).toEqual(["info: Model: test-model", "info: Model set to other-model"]);
    expect(engine.getProfile().model).toBe("other-model");
  });

  it("should show, set and clear the system prompt", () => {
    run("/system");
    run("/system Be brief.");
    run("/system");
    expect(engine.conversation.systemPrompt).toBe("Be brief.");
    run("/system clear");

    expect(output.lines).toEqual([
      "info: No system prompt set.",
      "info: System prompt updated.",
      "info: System prompt: Be brief.",
      "info: System prompt cleared.",
    ]);
    expect(engine.conversation.systemPrompt).toBe("");
  });

  it("should clear the conversation", () => {
    engine.conversation.appendExchange("q", "a");

    expect(run("/clear")).toEqual({ action: "continue" });
    expect(engine.conversation.isEmpty).toBe(true);
    expect(output.lines).toEqual(["info: Conversation cleared."]);
  });

  it("should only offer a retry when there is something to retry", () => {
    expect(run("/retry")).toEqual({ action: "continue" });
    expect(output.lines).toEqual(["warn: Nothing to retry."]);

    engine.conversation.appendExchange("q", "a");
    expect(run("/retry")).toEqual({ action: "retry" });
  });

  it("should show the redaction table", () => {
    run("/redact");

    redactor = new Redactor();
    run("/redact");
    redactor.redact("key sk-testtesttesttesttesttest");
    run("/redact");

    expect(output.lines).toEqual([
      "info: Redaction is off.",
      "info: Nothing has been redacted yet.",
      "  [KEY_1]  ←  sk-testtesttesttesttesttest",
    ]);
  });

  it("should show session info with the API key masked", () => {
    run("/info");

    expect(output.lines.some((l) => l.includes("test...cret"))).toBe(true);
    expect(output.lines.some((l) => l.includes("test-secret"))).toBe(false);
  });

  it("should list commands for /help", () => {
    run("/help");
    expect(output.lines.some((l) => l.startsWith("  /retry"))).toBe(true);
  });

  it("should exit on /exit and /quit", () => {
    expect(run("/exit")).toEqual({ action: "exit" });
    expect(run("/quit")).toEqual({ action: "exit" });
  });

  it("should report unknown commands", () => {
    run("/nope");
    expect(output.lines).toEqual(["error: Unknown command: /nope. Type /help for the list."]);
  });
});
