/**
 * Domain Entities
 *
 * Core data structures with no external dependencies.
 */

// Config - Application configuration
export type { Config, FilesConfig } from "./config";
export {
  DEFAULT_IGNORE_PATHS,
  DEFAULT_SNIFF_BYTES,
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  initialGlobQuery,
} from "./config";

// FileIndex - Snapshot of eligible files
export type { FileIndex } from "./fileIndex";
export { createEmptyFileIndex } from "./fileIndex";

// Query - Glob and content filters
export type { Query, ParsedGlobQuery } from "./query";
export { EMPTY_QUERY, isBlankQuery } from "./query";

// Diff - Preview output
export type { DiffLine, DiffLineKind, PreviewResult } from "./diff";

// Commit - Write outcomes
export type { CommitResult, ConfirmState } from "./commit";

// Errors
export type { FileReadErrorCode, FileWriteErrorCode } from "./errors";
export {
  ResubError,
  FileReadError,
  FileWriteError,
  getErrorCode,
  toFileReadError,
  toFileWriteError,
} from "./errors";
