/**
 * Text output for the resub CLI.
 */

import type { CommitResult, PreviewResult } from "../../domain/entities";
import type { CompiledRegex } from "../../domain/ports";
import { formatDiffLine, highlightMatches, splitLines } from "../../domain/services";

const HIGHLIGHT_START = "\x1b[1;31m";
const HIGHLIGHT_END = "\x1b[0m";

/**
 * A changed file: its path, then the removed and added lines.
 */
export function formatPreview(preview: PreviewResult): string {
  const lines = [preview.path];
  for (const line of preview.diff) {
    if (line.kind !== "unchanged") {
      lines.push(formatDiffLine(line));
    }
  }
  return lines.join("\n");
}

/**
 * One line with its matches highlighted (ANSI bold red) when `color` is set.
 */
export function highlightLine(text: string, regex: CompiledRegex | null, color: boolean): string {
  if (!color) return text;
  return highlightMatches(text, regex)
    .map((segment) =>
      segment.matched ? `${HIGHLIGHT_START}${segment.text}${HIGHLIGHT_END}` : segment.text
    )
    .join("");
}

/**
 * A filtered file for --list: its path, then each matching line with its
 * 1-based line number.
 */
export function formatListEntry(
  path: string,
  content: string,
  regex: CompiledRegex | null,
  color: boolean
): string {
  if (!regex) return path;
  const lines = [path];

  splitLines(content).forEach((line, i) => {
    if (regex.test(line)) {
      lines.push(`  ${i + 1}: ${highlightLine(line, regex, color)}`);
    }
  });

  return lines.join("\n");
}

export function formatCommitResult(result: CommitResult): string {
  if (!result.success) {
    return `  ✗ ${result.path}: ${result.error.message}`;
  }
  return result.changed ? `  ✓ ${result.path}` : `  ✓ ${result.path} (unchanged)`;
}

/**
 * Closing line after --apply.
 */
export function formatCommitSummary(results: readonly CommitResult[]): string {
  const failed = results.filter((r) => !r.success).length;
  const changed = results.filter((r) => r.success && r.changed).length;
  const parts = [`${changed} changed`];
  if (failed > 0) parts.push(`${failed} failed`);
  return `Applied to ${results.length} file${results.length === 1 ? "" : "s"}: ${parts.join(", ")}`;
}
