/**
 * Node.js FileSystem Adapter
 *
 * Implements the FileSystem port using Node.js fs/promises, path and fdir.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { fdir } from "fdir";
import type { FileSystem } from "../../domain/ports";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  async readFile(filepath: string): Promise<string> {
    const bytes = await fs.readFile(filepath);
    // Throws a TypeError with code ERR_ENCODING_INVALID_ENCODED_DATA
    return utf8.decode(bytes);
  }

  async readPrefix(filepath: string, length: number): Promise<Uint8Array> {
    const handle = await fs.open(filepath, "r");
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  async writeFile(filepath: string, content: string): Promise<void> {
    await fs.writeFile(filepath, content, "utf-8");
  }

  async listFiles(rootDir: string, ignoreDirs: readonly string[]): Promise<string[]> {
    const ignored = new Set(ignoreDirs);

    const root = await fs.stat(rootDir);
    if (!root.isDirectory()) {
      throw Object.assign(new Error(`ENOTDIR: not a directory, scandir '${rootDir}'`), {
        code: "ENOTDIR",
      });
    }

    // Entries below the root that fail to open are dropped by fdir
    const files = await new fdir()
      .withRelativePaths()
      .exclude((dirName) => ignored.has(dirName))
      .crawl(rootDir)
      .withPromise();

    return path.sep === "/" ? files : files.map((file) => file.split(path.sep).join("/"));
  }

  resolve(...segments: string[]): string {
    return path.resolve(...segments);
  }

  relative(from: string, to: string): string {
    return path.relative(from, to);
  }
}

/**
 * Default singleton instance
 */
export const nodeFileSystem = new NodeFileSystem();
