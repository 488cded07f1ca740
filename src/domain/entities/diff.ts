/**
 * Diff Entity
 *
 * Tagged lines of a positional, line-by-line comparison.
 */

export type DiffLineKind = "unchanged" | "removed" | "added";

export interface DiffLine {
  kind: DiffLineKind;
  /** Line text without its terminator */
  text: string;
}

/**
 * Substitution computed for one file without writing it.
 */
export interface PreviewResult {
  path: string;
  original: string;
  replaced: string;
  diff: DiffLine[];
  /** Whether the substitution altered the text at all */
  changed: boolean;
}
