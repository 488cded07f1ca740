/**
 * Replace Engine
 *
 * Owns one root's FileIndex and every cache derived from it, and exposes
 * the operations a front end drives: build the index, set the query, filter,
 * preview and commit.
 *
 * Cache mutation happens only here. A watcher never touches the caches; it
 * sends paths into the InvalidationChannel, which the engine drains before
 * each query and on the tick after a send.
 */

import type {
  CommitResult,
  Config,
  FileIndex,
  PreviewResult,
  Query,
} from "../../domain/entities";
import {
  EMPTY_QUERY,
  createDefaultConfig,
  createEmptyFileIndex,
  isBlankQuery,
} from "../../domain/entities";
import type {
  ChangeWatcher,
  CompiledRegex,
  FileSystem,
  GlobCompiler,
  InvalidationSink,
  Logger,
} from "../../domain/ports";
import { getIoConcurrency } from "../../domain/services";
import {
  commitSubstitution,
  commitSubstitutions,
  filterFiles,
  previewContent,
  type CommitDependencies,
} from "../../domain/usecases";
import {
  ContentCache,
  FilterMemo,
  InvalidationChannel,
  RegexCache,
} from "../../infrastructure/cache";
import { loadConfig } from "../../infrastructure/config";
import { nodeFileSystem } from "../../infrastructure/filesystem";
import { compileMinimatchGlob } from "../../infrastructure/glob";
import { createSilentLogger } from "../../infrastructure/logger";
import { regexOrNull } from "../../infrastructure/regex";
import { buildFileIndex, type TextFilePredicate } from "../indexer";
import { watchForChanges, type WatchOptions } from "../indexer/watcher";

export interface EngineOptions {
  /** Use this config instead of discovering a config file */
  config?: Config;
  /** Filesystem adapter (default: Node.js) */
  fileSystem?: FileSystem;
  /** Glob clause compiler (default: minimatch) */
  compileGlob?: GlobCompiler;
  /** Overrides the NUL-byte sniff used when building the index */
  isTextFile?: TextFilePredicate;
  /** Files read or written in parallel (default: auto) */
  concurrency?: number;
  /** Logger (default: silent) */
  logger?: Logger;
  /** Starts a watcher; replaced in tests (default: chokidar) */
  startWatcher?: (
    rootDir: string,
    sink: InvalidationSink,
    options: WatchOptions
  ) => Promise<ChangeWatcher>;
}

export interface EngineStats {
  indexedFiles: number;
  cachedContents: number;
  compiledPatterns: number;
  memoized: boolean;
  watching: boolean;
}

export class ReplaceEngine {
  readonly rootDir: string;
  readonly config: Config;

  private fileSystem: FileSystem;
  private compileGlob: GlobCompiler;
  private isTextFile: TextFilePredicate | undefined;
  private concurrency: number;
  private logger: Logger;
  private startWatcher: NonNullable<EngineOptions["startWatcher"]>;

  private index: FileIndex;
  private currentQuery: Query = EMPTY_QUERY;
  private contentCache: ContentCache;
  private regexes = new RegexCache();
  private memo = new FilterMemo();
  private channel = new InvalidationChannel();
  private watcher: ChangeWatcher | null = null;
  private changeListeners = new Set<(paths: readonly string[]) => void>();

  constructor(rootDir: string, options: EngineOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.rootDir = this.fileSystem.resolve(rootDir);
    this.config = options.config ?? createDefaultConfig();
    this.compileGlob = options.compileGlob ?? compileMinimatchGlob;
    this.isTextFile = options.isTextFile;
    this.concurrency = options.concurrency ?? getIoConcurrency();
    this.logger = options.logger ?? createSilentLogger();
    this.startWatcher = options.startWatcher ?? watchForChanges;

    this.index = createEmptyFileIndex(this.rootDir);
    this.contentCache = new ContentCache((key) =>
      this.fileSystem.readFile(this.absolutePath(key))
    );
    this.channel.onMessage(() => this.applyInvalidations());
  }

  /**
   * Create an engine, loading the nearest config file unless one is given.
   */
  static async create(rootDir: string, options: EngineOptions = {}): Promise<ReplaceEngine> {
    if (options.config) {
      return new ReplaceEngine(rootDir, options);
    }
    const { config } = await loadConfig(rootDir, options.logger);
    return new ReplaceEngine(rootDir, { ...options, config });
  }

  // ==========================================================================
  // Index
  // ==========================================================================

  /**
   * Walk the root and replace the index wholesale.
   */
  async buildIndex(): Promise<FileIndex> {
    this.index = await buildFileIndex(this.rootDir, {
      fileSystem: this.fileSystem,
      ignorePaths: this.config.ignorePaths,
      isTextFile: this.isTextFile,
      sniffBytes: this.config.sniffBytes,
      concurrency: this.concurrency,
      logger: this.logger,
    });
    this.memo.invalidate();
    this.logger.debug(`Index holds ${this.index.files.length} files`);
    return this.index;
  }

  /**
   * Rebuild the index and drop all cached content.
   */
  async refresh(): Promise<FileIndex> {
    this.contentCache.invalidateAll();
    return this.buildIndex();
  }

  get fileIndex(): FileIndex {
    return this.index;
  }

  // ==========================================================================
  // Query and filter
  // ==========================================================================

  setQuery(glob: string, content: string): void {
    this.currentQuery = { glob, content };
  }

  get query(): Query {
    return this.currentQuery;
  }

  /**
   * Files of the index that match the current query, in index order.
   *
   * A blank query returns the index's own list. Otherwise an unchanged query
   * with no invalidation in between returns the same array as last time.
   */
  async filter(): Promise<readonly string[]> {
    this.applyInvalidations();

    const query = this.currentQuery;
    if (isBlankQuery(query)) {
      return this.index.files;
    }

    const memoized = this.memo.lookup(query);
    if (memoized) {
      return memoized;
    }

    const epoch = this.memo.epoch;
    const files = await filterFiles(this.index.files, query, {
      compileGlob: this.compileGlob,
      compileContent: (source) => this.regexes.compile(source),
      readContent: (file) => this.contentCache.get(file),
      concurrency: this.concurrency,
      onPatternError: (message) => this.logger.debug(message),
    });

    if (!this.memo.store(query, files, epoch)) {
      this.logger.debug("Filter result not memoized: files changed while filtering");
    }
    return files;
  }

  /**
   * Current text of an indexed file, through the content cache.
   *
   * @throws FileReadError when the file cannot be read
   */
  async read(path: string): Promise<string> {
    this.applyInvalidations();
    return this.contentCache.get(this.indexPath(path));
  }

  /**
   * The pattern compiled through the engine's regex cache, or null when it
   * is malformed. Filters, substitutions and highlighting share it.
   */
  compiledRegex(source: string): CompiledRegex | null {
    const compiled = this.regexes.compile(source);
    if (!compiled.success) {
      this.logger.debug(`Invalid pattern '${source}': ${compiled.error.message}`);
    }
    return regexOrNull(compiled);
  }

  // ==========================================================================
  // Substitution
  // ==========================================================================

  /**
   * Substitution result and diff for one file, without writing it.
   *
   * @throws FileReadError when the file cannot be read
   */
  async preview(path: string, from: string, to: string): Promise<PreviewResult> {
    this.applyInvalidations();

    const key = this.indexPath(path);
    const content = await this.contentCache.get(key);
    return previewContent(key, content, this.compiledRegex(from), to);
  }

  /**
   * Apply the substitution to one file on disk.
   */
  async commitOne(path: string, from: string, to: string): Promise<CommitResult> {
    return commitSubstitution(
      this.indexPath(path),
      this.compiledRegex(from),
      to,
      this.commitDependencies()
    );
  }

  /**
   * Apply the substitution to every path independently. A failure on one
   * file never stops the others.
   */
  async commitAll(
    paths: readonly string[],
    from: string,
    to: string
  ): Promise<CommitResult[]> {
    const results = await commitSubstitutions(
      paths.map((path) => this.indexPath(path)),
      this.compiledRegex(from),
      to,
      this.commitDependencies(),
      this.concurrency
    );

    for (const result of results) {
      if (!result.success) {
        this.logger.debug(result.error.message);
      }
    }
    return results;
  }

  // ==========================================================================
  // Watching
  // ==========================================================================

  /**
   * Sink a watcher sends changed paths to.
   */
  get invalidationSink(): InvalidationSink {
    return this.channel.send;
  }

  /**
   * Start the background watcher. Calling it again returns the running one.
   */
  async startWatch(options: Pick<WatchOptions, "onError"> = {}): Promise<ChangeWatcher> {
    if (this.watcher?.isRunning()) {
      return this.watcher;
    }

    this.watcher = await this.startWatcher(this.rootDir, this.channel.send, {
      ignorePaths: this.config.ignorePaths,
      logger: this.logger,
      onError: options.onError,
    });
    if (!this.watcher.isRunning()) {
      this.logger.warn("File watching unavailable; run a refresh to pick up changes");
    }
    return this.watcher;
  }

  /**
   * Register a listener called with each batch of invalidated paths.
   *
   * @returns Function that removes the listener
   */
  onChange(listener: (paths: readonly string[]) => void): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  async stopWatch(): Promise<void> {
    if (this.watcher) {
      await this.watcher.stop();
      this.watcher = null;
    }
  }

  /**
   * Stop watching and drop queued notifications.
   */
  async dispose(): Promise<void> {
    await this.stopWatch();
    this.channel.close();
    this.changeListeners.clear();
  }

  stats(): EngineStats {
    return {
      indexedFiles: this.index.files.length,
      cachedContents: this.contentCache.size,
      compiledPatterns: this.regexes.size,
      memoized: !this.memo.isEmpty,
      watching: this.watcher?.isRunning() ?? false,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Evict every path the channel has queued, then the filter memo.
   */
  private applyInvalidations(): void {
    const paths = this.channel.drain();
    if (paths.length === 0) return;

    for (const path of paths) {
      this.contentCache.invalidate(path);
    }
    this.memo.invalidate();
    this.logger.debug(`Invalidated ${paths.length} changed file(s)`);

    for (const listener of this.changeListeners) {
      listener(paths);
    }
  }

  private commitDependencies(): CommitDependencies {
    return {
      read: (key) => this.fileSystem.readFile(this.absolutePath(key)),
      write: (key, content) => this.fileSystem.writeFile(this.absolutePath(key), content),
      onWritten: (key) => {
        this.contentCache.invalidate(key);
        this.memo.invalidate();
      },
    };
  }

  /**
   * Index form of a path: relative to the root, "/"-separated.
   */
  private indexPath(path: string): string {
    const relative = this.fileSystem.relative(this.rootDir, this.fileSystem.resolve(this.rootDir, path));
    return relative.split("\\").join("/");
  }

  private absolutePath(key: string): string {
    return this.fileSystem.resolve(this.rootDir, key);
  }
}

