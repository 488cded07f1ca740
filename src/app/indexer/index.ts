/**
 * File Indexer
 *
 * Builds the FileIndex: one walk of the tree, then a parallel sniff of
 * every candidate to keep only text files.
 */

import type { FileIndex } from "../../domain/entities";
import { DEFAULT_IGNORE_PATHS, DEFAULT_SNIFF_BYTES } from "../../domain/entities";
import type { FileSystem, Logger } from "../../domain/ports";
import {
  getIoConcurrency,
  isTextContent,
  parallelMap,
} from "../../domain/services";
import { nodeFileSystem } from "../../infrastructure/filesystem";
import { ProgressManager, createSilentLogger } from "../../infrastructure/logger";

/**
 * Decides whether a file belongs in the index.
 * Receives the absolute path; false for anything it cannot open.
 */
export type TextFilePredicate = (filepath: string) => Promise<boolean>;

export interface BuildIndexOptions {
  /** Filesystem adapter (default: Node.js) */
  fileSystem?: FileSystem;
  /** Directory names pruned from the walk */
  ignorePaths?: readonly string[];
  /** Overrides the default NUL-byte sniff */
  isTextFile?: TextFilePredicate;
  /** Bytes read by the default sniff */
  sniffBytes?: number;
  /** Number of files sniffed in parallel (default: auto) */
  concurrency?: number;
  /** Logger for progress reporting (default: silent) */
  logger?: Logger;
}

/**
 * Default predicate: read a bounded prefix and reject it if it holds a NUL.
 */
export function createTextFilePredicate(
  fileSystem: FileSystem,
  sniffBytes: number = DEFAULT_SNIFF_BYTES
): TextFilePredicate {
  return async (filepath) => {
    try {
      return isTextContent(await fileSystem.readPrefix(filepath, sniffBytes));
    } catch {
      // Permission denied, vanished, or a directory behind a symlink
      return false;
    }
  };
}

/**
 * Walk `rootDir` and return its text files.
 *
 * Order is the walk order, stable within one build but not sorted. Entries
 * that fail to open are left out; the build itself only fails when the
 * root cannot be walked at all.
 */
export async function buildFileIndex(
  rootDir: string,
  options: BuildIndexOptions = {}
): Promise<FileIndex> {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const logger = options.logger ?? createSilentLogger();
  const absoluteRoot = fileSystem.resolve(rootDir);
  const isTextFile =
    options.isTextFile ?? createTextFilePredicate(fileSystem, options.sniffBytes);
  const concurrency = options.concurrency ?? getIoConcurrency();

  const startTime = Date.now();
  const candidates = await fileSystem.listFiles(
    absoluteRoot,
    options.ignorePaths ?? DEFAULT_IGNORE_PATHS
  );
  logger.debug(`Found ${candidates.length} candidate files in ${absoluteRoot}`);

  const progress = new ProgressManager(logger);
  progress.start(candidates.length, "Sniffing files");

  const verdicts = await parallelMap(
    candidates,
    async (candidate) => {
      try {
        return await isTextFile(fileSystem.resolve(absoluteRoot, candidate));
      } finally {
        progress.tick();
      }
    },
    concurrency
  ).finally(() => progress.stop());

  const files = candidates.filter((candidate, i) => {
    const verdict = verdicts[i];
    if (!verdict.success) {
      logger.debug(`Skipping ${candidate}: ${String(verdict.error)}`);
      return false;
    }
    return verdict.value;
  });

  logger.debug(
    `Indexed ${files.length} text files (${candidates.length - files.length} skipped) in ${Date.now() - startTime}ms`
  );

  return {
    rootDir: absoluteRoot,
    files,
    builtAt: new Date().toISOString(),
  };
}
