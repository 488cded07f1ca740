/**
 * Change Watcher
 *
 * Reports files created or modified under a root so the engine can drop
 * their cached content. Deletions and renames are not reported: the index
 * keeps its membership until the next explicit refresh.
 *
 * - Events are forwarded one for one, without debouncing; each event costs
 *   the consumer only a cache eviction.
 * - Failing to start is not fatal: the returned watcher reports
 *   isRunning() === false and the engine keeps working with possibly stale
 *   content until it is refreshed.
 */

import { watch, type FSWatcher } from "chokidar";
import * as path from "path";
import { DEFAULT_IGNORE_PATHS } from "../../domain/entities";
import type { ChangeWatcher, InvalidationSink, Logger } from "../../domain/ports";
import { createSilentLogger } from "../../infrastructure/logger";

export interface WatchOptions {
  /** Directory names whose contents are not watched */
  ignorePaths?: readonly string[];
  /** Logger for watcher diagnostics (default: silent) */
  logger?: Logger;
  /** Callback for errors after the watcher is ready */
  onError?: (error: Error) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Convert an absolute path reported by chokidar to an index path.
 */
export function toIndexPath(rootDir: string, filepath: string): string {
  return path.relative(rootDir, filepath).split(path.sep).join("/");
}

/**
 * Start watching `rootDir` recursively, sending every created or modified
 * file's root-relative path to `sink`.
 */
export async function watchForChanges(
  rootDir: string,
  sink: InvalidationSink,
  options: WatchOptions = {}
): Promise<ChangeWatcher> {
  const logger = options.logger ?? createSilentLogger();
  const root = path.resolve(rootDir);
  const ignored = new Set(options.ignorePaths ?? DEFAULT_IGNORE_PATHS);

  let running = false;
  let watcher: FSWatcher | null = null;

  const stopped: ChangeWatcher = {
    stop: async () => {},
    isRunning: () => false,
  };

  function isIgnored(filepath: string): boolean {
    const relative = path.relative(root, filepath);
    if (relative === "") return false;
    return relative.split(path.sep).some((segment) => ignored.has(segment));
  }

  function handleFileEvent(event: "add" | "change", filepath: string): void {
    if (!running) return;

    const relativePath = toIndexPath(root, filepath);
    logger.debug(`[Watch] ${event === "add" ? "+" : "~"} ${relativePath}`);
    sink(relativePath);
  }

  try {
    watcher = watch(root, {
      ignored: isIgnored,
      persistent: true,
      ignoreInitial: true,
      usePolling: false,
      atomic: true,
    });
  } catch (error) {
    logger.warn(`[Watch] Could not watch ${root}: ${toError(error).message}`);
    return stopped;
  }

  const activeWatcher = watcher;

  // Resolve on the first of "ready" and "error"
  const startError = await new Promise<Error | null>((resolve) => {
    activeWatcher.once("ready", () => resolve(null));
    activeWatcher.once("error", (error: unknown) => resolve(toError(error)));
  });

  if (startError) {
    logger.warn(`[Watch] Could not watch ${root}: ${startError.message}`);
    await activeWatcher.close();
    return stopped;
  }

  running = true;
  activeWatcher.on("add", (filepath: string) => handleFileEvent("add", filepath));
  activeWatcher.on("change", (filepath: string) => handleFileEvent("change", filepath));
  activeWatcher.on("error", (error: unknown) => {
    const err = toError(error);
    logger.warn(`[Watch] Watcher error: ${err.message}`);
    options.onError?.(err);
  });

  return {
    stop: async () => {
      running = false;
      if (watcher) {
        await watcher.close();
        watcher = null;
      }
    },
    isRunning: () => running,
  };
}
