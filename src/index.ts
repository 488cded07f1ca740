/**
 * resub - Interactive-speed regex search and replace across a directory tree
 *
 * @example
 * ```ts
 * import resub from 'resub';
 *
 * // Files under src/ with a match, excluding tests
 * const files = await resub.filter('./project', 'src/**,!*.test.ts', 'oldName');
 *
 * // Rewrite them
 * const results = await resub.replace('./project', {
 *   glob: 'src/**,!*.test.ts',
 *   from: 'old(Name)',
 *   to: 'new$1',
 * });
 * ```
 *
 * @example Long-lived engine with watching
 * ```ts
 * import { open, createInlineLogger } from 'resub';
 *
 * const engine = await open('./project', { logger: createInlineLogger() });
 * await engine.startWatch();
 * engine.setQuery('*.rs', 'fn \\w+');
 * const matches = await engine.filter();
 * const preview = await engine.preview(matches[0], 'fn (\\w+)', 'pub fn $1');
 * await engine.dispose();
 * ```
 */

import type { CommitResult } from "./domain/entities";
import { createReplaceEngine, createReplaceSession } from "./composition";
import { ReplaceEngine, type EngineOptions } from "./app/engine";
import { ReplaceSession } from "./app/session";
import {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
} from "./infrastructure/logger";

// Re-export types
export type {
  CommitResult,
  Config,
  ConfirmState,
  DiffLine,
  DiffLineKind,
  FileIndex,
  PreviewResult,
  Query,
} from "./domain/entities";
export type {
  ChangeWatcher,
  CompiledRegex,
  CompileResult,
  FileSystem,
  InvalidationSink,
  Logger,
  LoggerFactory,
  RegexMatch,
} from "./domain/ports";
export type { EngineOptions, EngineStats } from "./app/engine";
export type { HighlightSegment } from "./domain/services";

export { ResubError, FileReadError, FileWriteError } from "./domain/entities";
export { highlightMatches, computeLineDiff } from "./domain/services";
export { loadConfig, findConfigFile } from "./infrastructure/config";
export { compilePattern } from "./infrastructure/regex";
export { ReplaceEngine, ReplaceSession };

// Re-export logger implementations and factories
export {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
};

/**
 * Open an engine over a directory with its index built.
 * Call `dispose()` when done if watching was started.
 */
export async function open(
  directory: string,
  options: EngineOptions = {}
): Promise<ReplaceEngine> {
  return createReplaceEngine(directory, options);
}

/**
 * Open a session (engine plus selection state) over a directory.
 */
export async function openSession(
  directory: string,
  options: EngineOptions = {}
): Promise<ReplaceSession> {
  const { session } = await createReplaceSession(directory, options);
  return session;
}

/**
 * Files under `directory` matching a glob query and a content regex.
 */
export async function filter(
  directory: string,
  glob: string,
  content: string,
  options: EngineOptions = {}
): Promise<string[]> {
  const engine = await createReplaceEngine(directory, options);
  try {
    engine.setQuery(glob, content);
    return [...(await engine.filter())];
  } finally {
    await engine.dispose();
  }
}

export interface ReplaceRequest {
  /** Glob query; the config's globFilter when omitted */
  glob?: string;
  /** Pattern to replace; only files containing it are touched */
  from: string;
  /** Replacement template */
  to: string;
}

/**
 * Apply a substitution to every matching file under `directory`.
 * One result per file; a failure on one file does not stop the others.
 */
export async function replace(
  directory: string,
  request: ReplaceRequest,
  options: EngineOptions = {}
): Promise<CommitResult[]> {
  const { engine, session } = await createReplaceSession(directory, options);
  try {
    if (request.glob !== undefined) {
      session.setGlobQuery(request.glob);
    }
    session.setFromPattern(request.from);
    session.setToTemplate(request.to);

    if ((await session.refresh()).length === 0) {
      return [];
    }
    session.requestCommitAll();
    return await session.confirm();
  } finally {
    await engine.dispose();
  }
}

// Default export for convenient usage
const resub = {
  open,
  openSession,
  filter,
  replace,
};

export default resub;
