/**
 * Configuration Loader
 *
 * Infrastructure adapter for finding and loading a resub config file.
 * The file is looked up in the root directory and then in each ancestor;
 * the nearest one wins.
 */

import * as path from "path";
import * as fs from "fs/promises";
import type { Config } from "../../domain/entities";
import { CONFIG_FILE_NAMES, createDefaultConfig } from "../../domain/entities";
import type { Logger } from "../../domain/ports";
import {
  resolveConfig,
  formatValidationIssues,
} from "../../domain/services/configValidator";

// ============================================================================
// Discovery
// ============================================================================

/**
 * Directories searched for a config file, nearest first.
 */
export function getConfigSearchDirs(rootDir: string): string[] {
  const dirs: string[] = [];
  let current = path.resolve(rootDir);

  while (true) {
    dirs.push(current);
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return dirs;
}

async function isFile(filepath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filepath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Find the nearest config file at or above `rootDir`.
 *
 * @returns Absolute path of the file, or null when there is none
 */
export async function findConfigFile(rootDir: string): Promise<string | null> {
  for (const dir of getConfigSearchDirs(rootDir)) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (await isFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

// ============================================================================
// Config I/O
// ============================================================================

export interface LoadedConfig {
  config: Config;
  /** File the config came from; null when defaults were used */
  source: string | null;
}

/**
 * Load the nearest config file or return the defaults.
 *
 * An unreadable or invalid file never fails the load: the problem is logged
 * as a warning and the defaults are used for whatever could not be read.
 */
export async function loadConfig(
  rootDir: string,
  logger?: Logger
): Promise<LoadedConfig> {
  const source = await findConfigFile(rootDir);
  if (!source) {
    return { config: createDefaultConfig(), source: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(source, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger?.warn(`Ignoring config ${source}: ${reason}`);
    return { config: createDefaultConfig(), source: null };
  }

  const { config, validation } = resolveConfig(raw);
  if (validation.issues.length > 0) {
    logger?.warn(`Config ${source}:\n${formatValidationIssues(validation.issues)}`);
  }
  logger?.debug(`Loaded config from ${source}`);

  return { config, source };
}
