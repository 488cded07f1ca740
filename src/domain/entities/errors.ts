/**
 * Error Entities
 *
 * Typed failures returned for file I/O. Pattern failures are never thrown;
 * they travel as CompileResult values instead.
 */

export type FileReadErrorCode = "not-found" | "permission" | "encoding" | "io";
export type FileWriteErrorCode = "not-found" | "permission" | "io";

/**
 * Base class for errors raised on behalf of a single file.
 */
export class ResubError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResubError";
    this.path = path;
  }
}

export class FileReadError extends ResubError {
  readonly code: FileReadErrorCode;

  constructor(path: string, code: FileReadErrorCode, options?: { cause?: unknown }) {
    super(`Cannot read ${path} (${code})`, path, options);
    this.name = "FileReadError";
    this.code = code;
  }
}

export class FileWriteError extends ResubError {
  readonly code: FileWriteErrorCode;

  constructor(path: string, code: FileWriteErrorCode, options?: { cause?: unknown }) {
    super(`Cannot write ${path} (${code})`, path, options);
    this.name = "FileWriteError";
    this.code = code;
  }
}

/**
 * Extract the `code` of a Node.js system error, if it has one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toFileReadError(path: string, error: unknown): FileReadError {
  if (error instanceof FileReadError) {
    return error;
  }

  switch (getErrorCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return new FileReadError(path, "not-found", { cause: error });
    case "EACCES":
    case "EPERM":
      return new FileReadError(path, "permission", { cause: error });
    case "ERR_ENCODING_INVALID_ENCODED_DATA":
      return new FileReadError(path, "encoding", { cause: error });
    default:
      return new FileReadError(path, "io", { cause: error });
  }
}

export function toFileWriteError(path: string, error: unknown): FileWriteError {
  if (error instanceof FileWriteError) {
    return error;
  }

  switch (getErrorCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return new FileWriteError(path, "not-found", { cause: error });
    case "EACCES":
    case "EPERM":
    case "EROFS":
      return new FileWriteError(path, "permission", { cause: error });
    default:
      return new FileWriteError(path, "io", { cause: error });
  }
}
