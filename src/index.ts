#!/usr/bin/env node

// Load .env file before anything else (quiet mode to suppress verbose output)
import { config } from "dotenv";
config({ quiet: true }); // Loads .env from current working directory

import { isChatError } from "./errors.js";

// Handle Ctrl+C gracefully during interactive prompts
function handlePromptExit(err: unknown): void {
  if (err && typeof err === "object" && "name" in err && err.name === "ExitPromptError") {
    console.log("");
    process.exit(0);
  }
  throw err;
}

function reportFatal(err: unknown): never {
  if (isChatError(err)) {
    console.error(`\n✗ ${err.kind}: ${err.message}`);
  } else {
    console.error("\n✗ Unexpected error:", err instanceof Error ? err.message : err);
  }
  process.exit(1);
}

async function main(): Promise<void> {
  const { parseArgs, getVersion, helpText } = await import("./cli.js");
  const { initLogger, initializeDebugConfig, getLogFilePath } = await import("./logger.js");

  const cliConfig = parseArgs(process.argv.slice(2));

  const debug = initializeDebugConfig(process.env, cliConfig.debug ? ["--debug"] : []).enabled;
  initLogger(debug, cliConfig.logLevel);
  if (debug && !cliConfig.jsonOutput) {
    const logFile = getLogFilePath();
    if (logFile) {
      console.log(`[cliai] Debug log: ${logFile}`);
    }
  }

  switch (cliConfig.command) {
    case "help":
      console.log(helpText());
      return;
    case "version":
      console.log(getVersion());
      return;
    case "config": {
      const { configCommand } = await import("./config-command.js");
      await configCommand(cliConfig);
      return;
    }
    case "chat": {
      const { runChat } = await import("./chat-runner.js");
      process.exitCode = await runChat(cliConfig).catch((err: unknown) => {
        handlePromptExit(err);
        return 1;
      });
      return;
    }
  }
}

main().catch(reportFatal);
