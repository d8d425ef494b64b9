#!/usr/bin/env tsx
import fs from "node:fs/promises";
import process from "node:process";
import { createInterface } from "node:readline";
import { loadConfig } from "@config/config";
import { createLogger } from "@config/logger";
import type { Session, SessionResult } from "@session/session";
import { createSessionRuntime } from "@session/bootstrap";
import { HELP_BANNER, parseArgs, printUsage } from "./args";

function print(result: SessionResult): void {
  for (const line of result.lines) {
    console.log(line);
  }
}

async function runCommandsFile(session: Session, commandsPath: string): Promise<boolean> {
  const raw = await fs.readFile(commandsPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;
    console.log(`cmd> ${line}`);
    const result = session.processLine(line);
    print(result);
    if (result.exit) {
      return true;
    }
  }
  return false;
}

async function runInteractive(session: Session): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "cmd> "
  });
  rl.on("SIGINT", () => rl.close());

  console.log(HELP_BANNER);
  rl.prompt();
  for await (const line of rl) {
    const result = session.processLine(line);
    print(result);
    if (result.exit) {
      break;
    }
    rl.prompt();
  }
  rl.close();
}

function waitForInterrupt(): Promise<void> {
  console.log("Playing. Press Ctrl+C to stop.");
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
  });
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options === "help") {
    printUsage();
    return;
  }

  const config = await loadConfig(options.configPath, {
    seed: options.seed,
    quiet: options.quiet
  });
  const logger = createLogger("letterwire", { quiet: config.quiet });
  const { engine, session, bindingTable } = createSessionRuntime(config, {
    session: logger,
    engine: createLogger("engine", { quiet: config.quiet })
  });

  for (const line of bindingTable) {
    console.log(line);
  }

  if (options.trace) {
    engine.onMidi((activity) => {
      for (const event of activity.events) {
        console.info(`[trace] ${activity.label}#${activity.handle} @${event.samplePosition}`, event.message);
      }
    });
  }

  // No audio device is opened: blocks are rendered on the block period and dropped.
  const periodMs = (config.blockSize / config.sampleRate) * 1000;
  const timer = setInterval(() => {
    engine.render();
  }, periodMs);

  try {
    if (options.commandsPath) {
      const exited = await runCommandsFile(session, options.commandsPath);
      if (!exited) {
        await waitForInterrupt();
      }
    } else {
      await runInteractive(session);
    }
  } finally {
    clearInterval(timer);
    engine.clear();
    logger.info("Stopped");
  }
}

main().catch((error) => {
  console.error("[letterwire] failed:", error);
  process.exitCode = 1;
});
