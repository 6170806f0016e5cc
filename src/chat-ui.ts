import chalk from "chalk";
import { input, select } from "@inquirer/prompts";
import type { Interface as ReadlineInterface } from "node:readline/promises";
import { APP_NAME, APP_VERSION } from "./config.js";
import { maskCredential } from "./logger.js";
import type { Redactor } from "./chat/redactor.js";
import type { AllowlistPolicy, ConnectionProfile, TokenUsage } from "./types.js";
import type { ChatErrorKind } from "./errors.js";

/**
 * Where the chat loop and slash commands print. Tests capture it.
 */
export interface ChatOutput {
  /** Raw text, no newline (streamed deltas) */
  write(text: string): void;
  line(text?: string): void;
  info(text: string): void;
  warn(text: string): void;
  error(text: string): void;
}

export class TerminalOutput implements ChatOutput {
  constructor(private readonly stream: NodeJS.WriteStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(text);
  }

  line(text = ""): void {
    this.stream.write(`${text}\n`);
  }

  info(text: string): void {
    this.line(chalk.cyan(text));
  }

  warn(text: string): void {
    this.line(chalk.yellow(text));
  }

  error(text: string): void {
    this.line(chalk.red(text));
  }
}

export interface SessionSummary {
  profileName: string;
  profile: ConnectionProfile;
  allowlist: AllowlistPolicy;
  redactEnabled: boolean;
  interceptor?: string;
  historyLength?: number;
  redactionCount?: number;
}

export function printWelcome(out: ChatOutput, summary: SessionSummary): void {
  out.line(chalk.bold(`\n${APP_NAME} v${APP_VERSION}`));
  out.line("─".repeat(60));
  out.line(`${chalk.gray("Profile:")}  ${summary.profileName}`);
  out.line(`${chalk.gray("Endpoint:")} ${summary.profile.endpoint}`);
  out.line(`${chalk.gray("Model:")}    ${chalk.green(summary.profile.model)}`);
  if (summary.redactEnabled) {
    out.line(`${chalk.gray("Redaction:")} on`);
  }
  out.line("─".repeat(60));
  out.line(chalk.gray("Type /help for commands, Ctrl+C to stop a response, /exit to quit.\n"));
}

/**
 * Session info table (/info). The API key is always masked.
 */
export function printInfo(out: ChatOutput, summary: SessionSummary): void {
  const { profile, allowlist } = summary;
  const rows: Array<[string, string]> = [
    ["Profile", summary.profileName],
    ["Endpoint", profile.endpoint],
    ["Model", profile.model],
    ["API key", profile.apiKey ? maskCredential(profile.apiKey) : "(none)"],
    ["Temperature", profile.temperature === undefined ? "(server default)" : String(profile.temperature)],
    ["Max tokens", profile.maxTokens === undefined ? "(server default)" : String(profile.maxTokens)],
    ["Streaming", profile.stream ? "yes" : "no"],
    ["Timeout", `${profile.timeoutMs / 1000}s`],
    ["System prompt", profile.systemPrompt ? truncate(profile.systemPrompt, 50) : "(none)"],
    ["Allowlist", allowlist.enforced ? `enforced (${allowlist.allowedHosts.join(", ") || "empty"})` : "off"],
    ["Redaction", summary.redactEnabled ? `on (${summary.redactionCount ?? 0} value(s) masked)` : "off"],
    ["Interceptor", summary.interceptor ?? "(none)"],
    ["History", `${summary.historyLength ?? 0} message(s)`],
  ];
  const width = Math.max(...rows.map(([label]) => label.length));
  out.line();
  for (const [label, value] of rows) {
    out.line(`  ${chalk.gray(label.padEnd(width))}  ${value}`);
  }
  out.line();
}

export function printTurnError(
  out: ChatOutput,
  error: { kind: ChatErrorKind; message: string },
  canRetry: boolean
): void {
  if (error.kind === "Cancelled") {
    out.warn("\n[cancelled]");
    return;
  }
  out.error(`\n✗ ${error.kind}: ${error.message}`);
  if (canRetry && error.kind !== "HostNotAllowed" && error.kind !== "ConfigInvalid") {
    out.line(chalk.gray("  Type /retry to send the message again."));
  }
}

export function formatUsage(usage: TokenUsage | undefined): string {
  if (!usage) return "";
  return `${usage.promptTokens} in / ${usage.completionTokens} out`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

type ReviewAction = "send" | "add" | "unredact" | "cancel";

/**
 * Show the message as it will leave the process and let the user adjust
 * what is masked. Resolves true to send, false to drop the message.
 */
export async function reviewRedactions(redactor: Redactor, text: string): Promise<boolean> {
  while (true) {
    const { text: masked, redactions } = redactor.redact(text);
    console.log(chalk.yellow(`\n${redactions.length} sensitive value(s) will be masked before sending:`));
    for (const r of redactions) {
      console.log(`  ${chalk.gray(r.category.padEnd(18))} ${truncate(r.original, 40)} → ${chalk.cyan(r.placeholder)}`);
    }
    console.log(chalk.gray(`\n  ${truncate(masked, 400)}\n`));

    const action = await select<ReviewAction>({
      message: "Send this message?",
      choices: [
        { name: "Send", value: "send" },
        { name: "Add a redaction", value: "add" },
        { name: "Unredact a value", value: "unredact", disabled: redactions.length === 0 },
        { name: "Cancel", value: "cancel" },
      ],
    });

    if (action === "send") return true;
    if (action === "cancel") return false;

    if (action === "add") {
      const value = (await input({ message: "Text to redact:" })).trim();
      if (!value) {
        console.log(chalk.yellow("No text provided."));
      } else if (!text.includes(value)) {
        console.log(chalk.yellow(`'${truncate(value, 40)}' not found in the message.`));
      } else {
        const added = redactor.addManualRedaction(value);
        console.log(chalk.green(`Redacted: ${truncate(value, 40)} → ${added.placeholder}`));
      }
      continue;
    }

    const original = await select({
      message: "Unredact which value?",
      choices: redactions.map((r) => ({ name: `${r.placeholder}  ${truncate(r.original, 40)}`, value: r.original })),
    });
    redactor.removeRedaction(original);
    console.log(chalk.green(`Unredacted: ${truncate(original, 40)}`));
  }
}

/**
 * Read one line; resolves null when input is closed (Ctrl+D).
 */
export function readUserLine(rl: ReadlineInterface, prompt: string): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(prompt).then(
      (answer) => {
        rl.off("close", onClose);
        resolve(answer);
      },
      (error: unknown) => {
        rl.off("close", onClose);
        if (error instanceof Error && error.name === "AbortError") {
          resolve(null);
        } else {
          reject(error);
        }
      }
    );
  });
}
