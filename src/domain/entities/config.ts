/**
 * Config Entity
 *
 * Configuration for resub indexing, filtering and replacing.
 */

/**
 * Options read from the `files` section of a project config file.
 */
export interface FilesConfig {
  /** Glob clauses joined with "," to seed the initial glob query */
  globFilter: string[];
}

/**
 * Main resub configuration.
 */
export interface Config {
  /** Glob query clauses applied when a session starts */
  files: FilesConfig;

  /** Directory names pruned from the walk and the watcher */
  ignorePaths: string[];

  /** Number of leading bytes read when deciding whether a file is text */
  sniffBytes: number;
}

/**
 * Default directory names skipped during indexing.
 */
export const DEFAULT_IGNORE_PATHS = [".git", "node_modules"];

/** Prefix read by the binary sniff (a NUL byte in it marks a binary file) */
export const DEFAULT_SNIFF_BYTES = 4096;

/**
 * Config file names searched for in the root and each of its ancestors,
 * in order of precedence within one directory.
 */
export const CONFIG_FILE_NAMES = ["resub.config.json", ".resub.config.json"];

/**
 * Create a default configuration.
 */
export function createDefaultConfig(): Config {
  return {
    files: { globFilter: [] },
    ignorePaths: [...DEFAULT_IGNORE_PATHS],
    sniffBytes: DEFAULT_SNIFF_BYTES,
  };
}

/**
 * Glob query a config seeds a session with.
 */
export function initialGlobQuery(config: Config): string {
  return config.files.globFilter.join(",");
}
