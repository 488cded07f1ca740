/**
 * Content Cache
 *
 * Read-through map from file path to its last-read text.
 *
 * Each path has its own entry state: at most one shared read, and a
 * generation counter that invalidate() bumps while reads are in flight. Concurrent misses on one path
 * share that read, while different paths never wait on each other. A read
 * that completes after its path was invalidated is returned to its callers
 * but not stored, so the cache never holds text older than the last change
 * it was told about. A path with no read in flight keeps no counter.
 */

import { toFileReadError } from "../../domain/entities";

type ContentReader = (path: string) => Promise<string>;

interface PendingRead {
  generation: number;
  promise: Promise<string>;
}

export class ContentCache {
  private entries = new Map<string, string>();
  private pending = new Map<string, PendingRead>();
  private generations = new Map<string, number>();
  private readsInFlight = new Map<string, number>();
  private reader: ContentReader;

  /**
   * @param reader - Loads a file's full text; rejections become FileReadError
   */
  constructor(reader: ContentReader) {
    this.reader = reader;
  }

  /**
   * Cached text for `path`, reading it on a miss.
   *
   * @throws FileReadError when the file cannot be read; nothing is stored
   */
  async get(path: string): Promise<string> {
    const cached = this.entries.get(path);
    if (cached !== undefined) {
      return cached;
    }

    const generation = this.generationOf(path);
    const inFlight = this.pending.get(path);
    if (inFlight && inFlight.generation === generation) {
      return inFlight.promise;
    }

    const promise: Promise<string> = this.load(path, generation).finally(() => {
      if (this.pending.get(path)?.promise === promise) {
        this.pending.delete(path);
      }
    });
    this.pending.set(path, { generation, promise });
    return promise;
  }

  /**
   * Drop the entry for `path`. Safe to call for unknown paths.
   */
  invalidate(path: string): void {
    this.entries.delete(path);
    if (this.readsInFlight.has(path)) {
      this.generations.set(path, this.generationOf(path) + 1);
    } else {
      this.generations.delete(path);
    }
  }

  /**
   * Drop every entry.
   */
  invalidateAll(): void {
    for (const path of new Set([...this.entries.keys(), ...this.pending.keys()])) {
      this.invalidate(path);
    }
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Paths holding a generation counter */
  get trackedPaths(): number {
    return this.generations.size;
  }

  private generationOf(path: string): number {
    return this.generations.get(path) ?? 0;
  }

  private async load(path: string, generation: number): Promise<string> {
    this.readsInFlight.set(path, (this.readsInFlight.get(path) ?? 0) + 1);
    try {
      const content = await this.reader(path);
      if (this.generationOf(path) === generation) {
        this.entries.set(path, content);
      }
      return content;
    } catch (error) {
      throw toFileReadError(path, error);
    } finally {
      this.endRead(path);
    }
  }

  private endRead(path: string): void {
    const remaining = (this.readsInFlight.get(path) ?? 1) - 1;
    if (remaining > 0) {
      this.readsInFlight.set(path, remaining);
    } else {
      this.readsInFlight.delete(path);
      this.generations.delete(path);
    }
  }
}
