/**
 * Line Diff Service
 *
 * Positional line comparison for substitution previews. Line i of the
 * original is paired with line i of the replacement; there is no
 * alignment, so an inserted line shifts every later pair.
 */

import type { DiffLine } from "../entities";

/**
 * Split text into lines.
 *
 * Lines end at "\n"; a "\r" before it is dropped. A final terminator does
 * not start an extra empty line, and empty text has no lines.
 */
export function splitLines(text: string): string[] {
  if (text === "") {
    return [];
  }

  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Compare two texts line by line.
 *
 * Equal pairs are unchanged; differing pairs give a removed line followed
 * by an added line; lines past the end of the shorter side are removed
 * (original longer) or added (replacement longer).
 */
export function computeLineDiff(original: string, replaced: string): DiffLine[] {
  const left = splitLines(original);
  const right = splitLines(replaced);
  const diff: DiffLine[] = [];

  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const hasLeft = i < left.length;
    const hasRight = i < right.length;

    if (hasLeft && hasRight) {
      if (left[i] === right[i]) {
        diff.push({ kind: "unchanged", text: left[i] });
      } else {
        diff.push({ kind: "removed", text: left[i] });
        diff.push({ kind: "added", text: right[i] });
      }
    } else if (hasLeft) {
      diff.push({ kind: "removed", text: left[i] });
    } else {
      diff.push({ kind: "added", text: right[i] });
    }
  }

  return diff;
}

/**
 * Render a diff line the way the preview pane shows it.
 */
export function formatDiffLine(line: DiffLine): string {
  switch (line.kind) {
    case "removed":
      return `- ${line.text}`;
    case "added":
      return `+ ${line.text}`;
    case "unchanged":
      return line.text;
  }
}
