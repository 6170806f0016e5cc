import type { SessionEngine } from "./session/session-engine.js";
import type { Redactor } from "./chat/redactor.js";
import { printInfo, type ChatOutput, type SessionSummary } from "./chat-ui.js";
import { isChatError } from "./errors.js";

export interface ParsedCommand {
  command: string;
  args: string;
}

export type CommandOutcome = { action: "continue" } | { action: "exit" } | { action: "retry" };

export interface CommandContext {
  engine: SessionEngine;
  output: ChatOutput;
  /** Present when redaction is on */
  redactor?: Redactor;
  summary: () => SessionSummary;
}

const HELP: Array<[string, string]> = [
  ["/help", "Show this list"],
  ["/clear", "Forget the conversation (the system prompt stays)"],
  ["/model [name]", "Show or switch the model"],
  ["/system [prompt|clear]", "Show, set or clear the system prompt"],
  ["/retry", "Send the last message again"],
  ["/redact", "Show the values masked so far"],
  ["/info", "Show session settings"],
  ["/exit, /quit", "Leave the chat"],
];

/**
 * "/model gpt-4o" → { command: "model", args: "gpt-4o" }. Anything not
 * starting with a single slash is a chat message.
 */
export function parseCommand(input: string): ParsedCommand | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/") || trimmed.startsWith("//") || trimmed.length === 1) return null;
  const space = trimmed.search(/\s/);
  const command = (space === -1 ? trimmed.slice(1) : trimmed.slice(1, space)).toLowerCase();
  const args = space === -1 ? "" : trimmed.slice(space + 1).trim();
  return { command, args };
}

export class CommandHandler {
  constructor(private readonly ctx: CommandContext) {}

  handle(parsed: ParsedCommand): CommandOutcome {
    const { engine, output } = this.ctx;

    switch (parsed.command) {
      case "help": {
        const width = Math.max(...HELP.map(([cmd]) => cmd.length));
        for (const [cmd, description] of HELP) {
          output.line(`  ${cmd.padEnd(width)}  ${description}`);
        }
        return { action: "continue" };
      }

      case "clear":
        engine.conversation.clear();
        output.info("Conversation cleared.");
        return { action: "continue" };

      case "model":
        if (!parsed.args) {
          output.info(`Model: ${engine.getProfile().model}`);
          return { action: "continue" };
        }
        if (this.update(() => engine.updateProfile({ model: parsed.args }))) {
          output.info(`Model set to ${parsed.args}`);
        }
        return { action: "continue" };

      case "system": {
        if (!parsed.args) {
          const current = engine.conversation.systemPrompt;
          output.info(current ? `System prompt: ${current}` : "No system prompt set.");
          return { action: "continue" };
        }
        const prompt = parsed.args === "clear" ? "" : parsed.args;
        if (this.update(() => engine.updateProfile({ systemPrompt: prompt }))) {
          output.info(prompt ? "System prompt updated." : "System prompt cleared.");
        }
        return { action: "continue" };
      }

      case "retry":
        if (!engine.canRetry) {
          output.warn("Nothing to retry.");
          return { action: "continue" };
        }
        return { action: "retry" };

      case "redact": {
        const redactor = this.ctx.redactor;
        if (!redactor) {
          output.info("Redaction is off.");
          return { action: "continue" };
        }
        const table = redactor.getMappingTable();
        if (table.length === 0) {
          output.info("Nothing has been redacted yet.");
          return { action: "continue" };
        }
        for (const { original, placeholder } of table) {
          output.line(`  ${placeholder}  ←  ${original}`);
        }
        return { action: "continue" };
      }

      case "info":
        printInfo(output, this.ctx.summary());
        return { action: "continue" };

      case "exit":
      case "quit":
        return { action: "exit" };

      default:
        output.error(`Unknown command: /${parsed.command}. Type /help for the list.`);
        return { action: "continue" };
    }
  }

  private update(apply: () => void): boolean {
    try {
      apply();
      return true;
    } catch (error) {
      if (!isChatError(error)) throw error;
      this.ctx.output.error(error.message);
      return false;
    }
  }
}
