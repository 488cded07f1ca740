/**
 * CLI workflow: open a session over a root, then list, preview or apply.
 * Kept apart from main.ts so it runs without touching the process.
 */

import * as path from "path";
import type { Logger } from "../../domain/ports";
import { getIoConcurrency, parallelMap } from "../../domain/services";
import type { OutputStream } from "../../infrastructure/logger";
import { createReplaceSession } from "../../composition";
import type { ReplaceEngine } from "../engine";
import type { ReplaceSession } from "../session";
import type { ParsedFlags } from "./flags";
import {
  formatCommitResult,
  formatCommitSummary,
  formatListEntry,
  formatPreview,
} from "./render";

export interface CliContext {
  /** Receives file lists, diffs and commit results */
  stdout: OutputStream;
  /** Receives progress and diagnostics */
  logger: Logger;
  /** Highlight matches with ANSI colors */
  color: boolean;
  /** Asks a yes/no question; null when nobody can answer */
  prompt: ((question: string) => Promise<boolean>) | null;
}

export interface OpenSession {
  engine: ReplaceEngine;
  session: ReplaceSession;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load config, build the index and seed a session from the flags.
 */
export async function openSession(flags: ParsedFlags, context: CliContext): Promise<OpenSession> {
  const rootDir = path.resolve(flags.cwd ?? process.cwd());
  const { engine, session } = await createReplaceSession(rootDir, { logger: context.logger });

  if (flags.glob !== undefined) {
    session.setGlobQuery(flags.glob);
  }
  session.setFromPattern(flags.from ?? "");
  session.setToTemplate(flags.to ?? "");

  return { engine, session };
}

/**
 * Print the filtered files: matching lines in list mode (or when there is
 * no pattern), otherwise the diff of every file the substitution changes.
 */
export async function showFiles(
  { engine, session }: OpenSession,
  flags: ParsedFlags,
  context: CliContext
): Promise<void> {
  const files = await session.refresh();
  const from = session.fromPattern;
  const listOnly = flags.list || from === "";

  if (listOnly) {
    const regex = from === "" ? null : engine.compiledRegex(from);
    const contents = await parallelMap(
      files,
      (file) => (regex ? engine.read(file) : Promise.resolve("")),
      getIoConcurrency()
    );

    contents.forEach((content, i) => {
      if (content.success) {
        context.stdout.write(`${formatListEntry(files[i], content.value, regex, context.color)}\n`);
      } else {
        context.logger.warn(errorMessage(content.error));
      }
    });
    context.logger.info(`${files.length} file${files.length === 1 ? "" : "s"} matched`);
    logStats(engine, context.logger);
    return;
  }

  const previews = await parallelMap(
    files,
    (file) => engine.preview(file, from, session.toTemplate),
    getIoConcurrency()
  );

  let changed = 0;
  for (const preview of previews) {
    if (!preview.success) {
      context.logger.warn(errorMessage(preview.error));
      continue;
    }
    if (!preview.value.changed) continue;

    context.stdout.write(`${changed > 0 ? "\n" : ""}${formatPreview(preview.value)}\n`);
    changed++;
  }
  context.logger.info(`${changed} of ${files.length} files would change`);
  logStats(engine, context.logger);
}

function logStats(engine: ReplaceEngine, logger: Logger): void {
  const stats = engine.stats();
  logger.debug(
    `Index: ${stats.indexedFiles} files, ${stats.cachedContents} cached, ` +
      `${stats.compiledPatterns} compiled patterns, memo ${stats.memoized ? "set" : "empty"}`
  );
}

/**
 * Commit the substitution to every filtered file.
 *
 * @returns Process exit code: 1 when any file failed
 */
export async function applyChanges(
  { session }: OpenSession,
  flags: ParsedFlags,
  context: CliContext
): Promise<number> {
  if (session.fromPattern === "") {
    context.logger.error("--apply requires --from");
    return 2;
  }

  const files = await session.refresh();
  if (files.length === 0) {
    context.logger.info("No files to change");
    return 0;
  }

  if (!flags.yes) {
    if (!context.prompt) {
      context.logger.error("Cannot ask for confirmation without a terminal; pass --yes");
      return 1;
    }
    const approved = await context.prompt(`Apply to ${files.length} files? [y/N] `);
    if (!approved) {
      context.logger.info("Nothing applied");
      return 0;
    }
  }

  session.requestCommitAll();
  const results = await session.confirm();
  for (const result of results) {
    context.stdout.write(`${formatCommitResult(result)}\n`);
  }
  context.logger.info(formatCommitSummary(results));

  return results.some((result) => !result.success) ? 1 : 0;
}

/**
 * One pass without watching.
 *
 * @returns Process exit code
 */
export async function runOnce(flags: ParsedFlags, context: CliContext): Promise<number> {
  const opened = await openSession(flags, context);
  try {
    if (flags.apply) {
      return await applyChanges(opened, flags, context);
    }
    await showFiles(opened, flags, context);
    return 0;
  } finally {
    await opened.engine.dispose();
  }
}
