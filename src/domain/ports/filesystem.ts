/**
 * FileSystem Port
 *
 * Abstract interface for the filesystem operations the engine performs.
 * This keeps the domain independent of the actual filesystem implementation
 * and lets tests swap in an in-memory one.
 */

/**
 * Abstract filesystem interface.
 *
 * Methods reject with the underlying system error (carrying its `code`);
 * callers translate that into FileReadError / FileWriteError.
 */
export interface FileSystem {
  /**
   * Read a file's full content as UTF-8. Invalid UTF-8 is an error, not
   * replacement characters.
   */
  readFile(filepath: string): Promise<string>;

  /**
   * Read at most `length` bytes from the start of a file.
   */
  readPrefix(filepath: string, length: number): Promise<Uint8Array>;

  /**
   * Overwrite a file's content in full.
   */
  writeFile(filepath: string, content: string): Promise<void>;

  /**
   * List regular files under a directory, relative to it and
   * "/"-separated, skipping directories whose name is in `ignoreDirs`.
   * Unreadable entries are left out rather than failing the listing.
   */
  listFiles(rootDir: string, ignoreDirs: readonly string[]): Promise<string[]>;

  /**
   * Resolve to absolute path
   */
  resolve(...segments: string[]): string;

  /**
   * Get relative path from one path to another
   */
  relative(from: string, to: string): string;
}
