/**
 * Match Highlighting
 *
 * Splits a line into matched and unmatched segments so a front end can
 * style the parts a regex hit.
 */

import type { CompiledRegex } from "../ports";

export interface HighlightSegment {
  text: string;
  matched: boolean;
}

/**
 * Segment `text` around every non-empty, non-overlapping match of `regex`.
 * A null regex or a line without matches gives one unmatched segment.
 */
export function highlightMatches(
  text: string,
  regex: CompiledRegex | null
): HighlightSegment[] {
  if (!regex) {
    return [{ text, matched: false }];
  }

  const segments: HighlightSegment[] = [];
  let lastEnd = 0;

  for (const match of regex.matchAll(text)) {
    if (match.start === match.end) continue;

    if (match.start > lastEnd) {
      segments.push({ text: text.slice(lastEnd, match.start), matched: false });
    }
    segments.push({ text: text.slice(match.start, match.end), matched: true });
    lastEnd = match.end;
  }

  if (lastEnd < text.length || segments.length === 0) {
    segments.push({ text: text.slice(lastEnd), matched: false });
  }

  return segments;
}
