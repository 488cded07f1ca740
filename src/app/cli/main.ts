#!/usr/bin/env node
// Main CLI entry point for resub

import * as fs from "fs";
import * as path from "path";
import * as readline from "readline/promises";
import { createInlineLogger } from "../../infrastructure/logger";
import { HELP_TEXT, parseFlags, type ParsedFlags } from "./flags";
import { errorMessage, openSession, runOnce, showFiles, type CliContext } from "./run";

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "../../../package.json"), "utf-8")
  );
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

async function askYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/**
 * Print once, then again after every batch of file changes until Ctrl+C.
 */
async function watch(flags: ParsedFlags, context: CliContext): Promise<void> {
  const opened = await openSession(flags, context);
  const { engine } = opened;
  await showFiles(opened, flags, context);

  // One pass at a time; changes during a pass schedule exactly one more
  let running: Promise<void> | null = null;
  let again = false;

  const rerun = (): void => {
    if (running) {
      again = true;
      return;
    }
    running = showFiles(opened, flags, context)
      .catch((error: unknown) => context.logger.error(errorMessage(error)))
      .finally(() => {
        running = null;
        if (again) {
          again = false;
          rerun();
        }
      });
  };

  engine.onChange((paths) => {
    context.logger.debug(`Changed: ${paths.join(", ")}`);
    rerun();
  });

  const watcher = await engine.startWatch();
  if (!watcher.isRunning()) {
    await engine.dispose();
    process.exitCode = 1;
    return;
  }
  context.logger.info("Watching for changes... (Ctrl+C to stop)");

  const shutdown = (): void => {
    engine.dispose().then(
      () => process.exit(0),
      (error: unknown) => {
        context.logger.error(errorMessage(error));
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2));

  if (flags.error) {
    console.error(`error: ${flags.error}`);
    console.error('Run "resub --help" for more information.');
    process.exit(2);
  }
  if (flags.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }
  if (flags.version) {
    console.log(`resub v${readVersion()}`);
    process.exit(0);
  }

  const context: CliContext = {
    stdout: process.stdout,
    logger: createInlineLogger({ verbose: flags.verbose }),
    color: process.stdout.isTTY === true,
    prompt: process.stdin.isTTY ? askYesNo : null,
  };

  if (flags.watch) {
    await watch(flags, context);
    return;
  }
  process.exitCode = await runOnce(flags, context);
}

main().catch((error: unknown) => {
  console.error(`error: ${errorMessage(error)}`);
  process.exit(1);
});
