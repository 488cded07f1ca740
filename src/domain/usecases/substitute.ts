/**
 * Substitute Use Case
 *
 * Preview and commit a regex substitution for one file or a batch. Both
 * modes call applySubstitution with the same compiled pattern, so the
 * preview always shows what a commit would write.
 */

import type { CommitResult, PreviewResult } from "../entities";
import { toFileReadError, toFileWriteError } from "../entities";
import type { CompiledRegex } from "../ports";
import { applySubstitution } from "../services/substitution";
import { computeLineDiff } from "../services/lineDiff";
import { parallelMap } from "../services/parallelMap";

/**
 * Build a preview from already-loaded content.
 *
 * @param regex - Compiled pattern, or null when it was malformed
 */
export function previewContent(
  path: string,
  content: string,
  regex: CompiledRegex | null,
  template: string
): PreviewResult {
  const replaced = applySubstitution(content, regex, template);
  const diff = computeLineDiff(content, replaced);
  return {
    path,
    original: content,
    replaced,
    diff,
    changed: replaced !== content,
  };
}

/**
 * I/O a commit needs, plus the hook that keeps caches consistent.
 */
export interface CommitDependencies {
  read: (path: string) => Promise<string>;
  write: (path: string, content: string) => Promise<void>;
  /** Runs after a successful write */
  onWritten: (path: string) => void;
}

/**
 * Read, substitute and overwrite one file. Never rejects: read and write
 * failures come back as an unsuccessful CommitResult.
 */
export async function commitSubstitution(
  path: string,
  regex: CompiledRegex | null,
  template: string,
  deps: CommitDependencies
): Promise<CommitResult> {
  let content: string;
  try {
    content = await deps.read(path);
  } catch (error) {
    return { path, success: false, error: toFileReadError(path, error) };
  }

  const replaced = applySubstitution(content, regex, template);

  try {
    await deps.write(path, replaced);
  } catch (error) {
    return { path, success: false, error: toFileWriteError(path, error) };
  }

  deps.onWritten(path);
  return { path, success: true, changed: replaced !== content };
}

/**
 * Commit every path independently. One result per path, in input order.
 */
export async function commitSubstitutions(
  paths: readonly string[],
  regex: CompiledRegex | null,
  template: string,
  deps: CommitDependencies,
  concurrency: number
): Promise<CommitResult[]> {
  const settled = await parallelMap(
    paths,
    (path) => commitSubstitution(path, regex, template, deps),
    concurrency
  );

  return settled.map((result, i): CommitResult => {
    if (result.success) return result.value;
    // commitSubstitution does not reject; this covers a throwing onWritten hook
    return { path: paths[i], success: false, error: toFileWriteError(paths[i], result.error) };
  });
}
