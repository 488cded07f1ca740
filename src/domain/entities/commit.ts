/**
 * Commit Entity
 *
 * Outcome of writing a substitution back to one file.
 */

import type { FileReadError, FileWriteError } from "./errors";

export type CommitResult =
  | {
      path: string;
      success: true;
      /** False when the substitution left the text as it was */
      changed: boolean;
    }
  | {
      path: string;
      success: false;
      error: FileReadError | FileWriteError;
    };

/**
 * Pending confirmation held by a session before a commit runs.
 */
export type ConfirmState =
  | { kind: "none" }
  | { kind: "one"; path: string }
  | { kind: "all"; paths: string[] };
