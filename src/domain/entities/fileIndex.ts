/**
 * FileIndex Entity
 *
 * Snapshot of the eligible text files under a root directory.
 */

/**
 * Result of one directory walk.
 *
 * Membership is fixed until the next build; file changes only invalidate
 * cached content.
 */
export interface FileIndex {
  /** Absolute path of the walked root */
  rootDir: string;

  /** Paths relative to rootDir, "/"-separated, in walk order */
  files: readonly string[];

  /** ISO timestamp of when the walk finished */
  builtAt: string;
}

/**
 * Index used before the first walk completes.
 */
export function createEmptyFileIndex(rootDir: string): FileIndex {
  return { rootDir, files: [], builtAt: new Date(0).toISOString() };
}
