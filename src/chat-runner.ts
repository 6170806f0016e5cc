/**
 * Chat Runner - interactive REPL and single-shot mode.
 *
 * Single-shot NDJSON output format (--prompt "..." --json):
 * {"event":"start","model":"gpt-4o-mini","created":1706558400}
 * {"event":"delta","content":"Hello"}
 * {"event":"done","finish_reason":"stop","usage":{"prompt_tokens":10,"completion_tokens":5}}
 * {"event":"error","error":{"type":"RateLimited","message":"[429] ..."}}
 */

import chalk from "chalk";
import { createInterface } from "node:readline/promises";
import type { CliConfig } from "./cli.js";
import { SessionEngine } from "./session/session-engine.js";
import { saveExchange } from "./session/exchange-log.js";
import { Redactor, StreamUnredactor, createRedactionInterceptor } from "./chat/redactor.js";
import {
  composeInterceptors,
  identityInterceptor,
  loadInterceptorModule,
  type PayloadInterceptor,
} from "./chat/interceptor.js";
import { loadConfig, loadLocalConfig, resolveSettings, type ResolvedSettings } from "./profile-config.js";
import { CommandHandler, parseCommand } from "./commands.js";
import {
  TerminalOutput,
  reviewRedactions,
  formatUsage,
  printTurnError,
  printWelcome,
  readUserLine,
  type ChatOutput,
  type SessionSummary,
} from "./chat-ui.js";
import type { StreamEvent } from "./types.js";
import { log } from "./logger.js";

/**
 * NDJSON event types
 */
interface NdjsonEvent {
  event: "start" | "delta" | "done" | "error";
  model?: string;
  created?: number;
  content?: string;
  finish_reason?: string | null;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
  error?: {
    type: string;
    message: string;
  };
}

/**
 * Write an NDJSON event to stdout
 */
function writeEvent(event: NdjsonEvent): void {
  process.stdout.write(JSON.stringify(event) + "\n");
}

interface ChatSession {
  settings: ResolvedSettings;
  engine: SessionEngine;
  redactor?: Redactor;
  interceptorName?: string;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Resolve settings and wire up the session engine.
 */
export async function createChatSession(cli: CliConfig): Promise<ChatSession> {
  const settings = resolveSettings({
    global: loadConfig(),
    local: loadLocalConfig(),
    env: process.env,
    cli: cli.overrides,
  });

  const interceptors: PayloadInterceptor[] = [];
  let interceptorName: string | undefined;
  if (settings.interceptorPath) {
    const custom = await loadInterceptorModule(settings.interceptorPath);
    interceptors.push(custom);
    interceptorName = custom.name;
  }

  // Redaction runs last so nothing a custom interceptor adds escapes masking
  const redactor = settings.redact.enabled ? new Redactor(settings.redact.terms) : undefined;
  if (redactor) interceptors.push(createRedactionInterceptor(redactor));

  const interceptor = interceptors.length > 0 ? composeInterceptors(...interceptors) : identityInterceptor;

  const engine = new SessionEngine({
    profile: settings.profile,
    allowlist: settings.allowlist,
    retry: settings.retry,
    interceptor,
    onExchange: (exchange) => {
      saveExchange({
        prompt: exchange.userText,
        response: redactor ? redactor.unredact(exchange.assistantText) : exchange.assistantText,
        model: exchange.model,
        endpoint: exchange.endpoint,
      });
    },
    onTransportState: (t) => {
      if (t.state === "RetryWait") {
        log(`[Chat] Retrying in ${t.delayMs}ms (attempt ${t.attempt} failed)`);
      }
    },
  });

  return { settings, engine, redactor, interceptorName };
}

function summarize(session: ChatSession): SessionSummary {
  return {
    profileName: session.settings.profileName,
    profile: session.engine.getProfile(),
    allowlist: session.settings.allowlist,
    redactEnabled: session.redactor !== undefined,
    interceptor: session.interceptorName,
    historyLength: session.engine.conversation.length,
    redactionCount: session.redactor?.size,
  };
}

/**
 * Refuse to start when the configured endpoint is outside the allowlist.
 */
async function checkStartupEndpoint(session: ChatSession, out: ChatOutput): Promise<boolean> {
  const decision = await session.engine.checkEndpoint();
  if (decision.allowed) return true;
  out.error(
    `Blocked: host '${decision.host}' is not in the allowed hosts list (${decision.reason}).\n` +
      `Add it with --allow-host ${decision.host} or in 'security.allowedHosts' of your config.`
  );
  return false;
}

/**
 * Send one message and exit. Returns the process exit code.
 */
export async function runSingleShot(cli: CliConfig): Promise<number> {
  let text = cli.prompt ?? "";
  if (cli.stdin) {
    const input = await readStdin();
    text = text ? `${input.trim()}\n\n${text}` : input.trim();
  }

  const session = await createChatSession(cli);
  const stderr = new TerminalOutput(process.stderr);
  if (!(await checkStartupEndpoint(session, stderr))) return 1;

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  const unredactor = session.redactor ? new StreamUnredactor(session.redactor) : undefined;
  const model = session.engine.getProfile().model;
  if (cli.jsonOutput) writeEvent({ event: "start", model, created: Math.floor(Date.now() / 1000) });

  try {
    for await (const event of session.engine.sendTurn(text, { signal: controller.signal })) {
      if (event.type === "text_delta") {
        const shown = unredactor ? unredactor.push(event.text) : event.text;
        if (!shown) continue;
        if (cli.jsonOutput) writeEvent({ event: "delta", content: shown });
        else process.stdout.write(shown);
        continue;
      }

      const tail = unredactor?.flush() ?? "";
      if (tail) {
        if (cli.jsonOutput) writeEvent({ event: "delta", content: tail });
        else process.stdout.write(tail);
      }

      if (event.type === "done") {
        if (cli.jsonOutput) {
          writeEvent({
            event: "done",
            finish_reason: event.finishReason,
            usage: event.usage
              ? { prompt_tokens: event.usage.promptTokens, completion_tokens: event.usage.completionTokens }
              : undefined,
          });
        } else {
          process.stdout.write("\n");
        }
        return 0;
      }

      if (cli.jsonOutput) {
        writeEvent({ event: "error", error: { type: event.kind, message: event.message } });
      } else {
        printTurnError(stderr, event, false);
      }
      return 1;
    }
    return 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

/**
 * Render one turn's events. Deltas are shown unredacted.
 */
async function renderTurn(
  events: AsyncGenerator<StreamEvent, void, undefined>,
  session: ChatSession,
  out: ChatOutput
): Promise<void> {
  const unredactor = session.redactor ? new StreamUnredactor(session.redactor) : undefined;
  out.write(chalk.bold.magenta("ai › "));

  for await (const event of events) {
    if (event.type === "text_delta") {
      out.write(unredactor ? unredactor.push(event.text) : event.text);
      continue;
    }
    if (unredactor) out.write(unredactor.flush());

    if (event.type === "done") {
      const usage = formatUsage(event.usage);
      out.line(usage ? chalk.gray(`\n  (${usage})`) : "");
    } else {
      printTurnError(out, event, session.engine.canRetry);
    }
  }
  out.line();
}

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

/**
 * Interactive REPL. Returns the process exit code.
 */
export async function runInteractive(cli: CliConfig): Promise<number> {
  const session = await createChatSession(cli);
  const out = new TerminalOutput();
  if (!(await checkStartupEndpoint(session, out))) return 1;

  const { engine, redactor } = session;
  const commands = new CommandHandler({ engine, output: out, redactor, summary: () => summarize(session) });
  printWelcome(out, summarize(session));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let turnController: AbortController | null = null;

  // Ctrl+C stops the response in progress; at the prompt it leaves
  rl.on("SIGINT", () => {
    if (turnController) {
      turnController.abort();
    } else {
      rl.close();
    }
  });

  const runTurn = async (start: (signal: AbortSignal) => AsyncGenerator<StreamEvent, void, undefined>) => {
    const controller = new AbortController();
    turnController = controller;
    try {
      await renderTurn(start(controller.signal), session, out);
    } finally {
      turnController = null;
    }
  };

  try {
    while (true) {
      const line = await readUserLine(rl, chalk.green("you › "));
      if (line === null) break;
      const text = line.trim();
      if (!text) continue;

      const parsed = parseCommand(text);
      if (parsed) {
        const outcome = commands.handle(parsed);
        if (outcome.action === "exit") break;
        if (outcome.action === "retry") {
          await runTurn((signal) => engine.retryLast({ signal }));
        }
        continue;
      }

      if (redactor) {
        const fresh = redactor.redact(text).redactions.filter((r) => r.category !== "cached");
        if (fresh.length > 0) {
          rl.pause();
          let send: boolean;
          try {
            send = await reviewRedactions(redactor, text);
          } catch (error) {
            if (!isExitPromptError(error)) throw error;
            send = false;
          } finally {
            rl.resume();
          }
          if (!send) {
            out.warn("Message not sent.");
            continue;
          }
        }
      }

      await runTurn((signal) => engine.sendTurn(text, { signal }));
    }
  } finally {
    rl.close();
  }

  out.line(chalk.gray("Bye."));
  return 0;
}

export async function runChat(cli: CliConfig): Promise<number> {
  if (cli.prompt !== undefined || cli.stdin) {
    return runSingleShot(cli);
  }
  return runInteractive(cli);
}
