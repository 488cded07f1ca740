/**
 * Regex Port
 *
 * The pattern engine behind content filters, substitutions and
 * highlighting. Patterns are typed by hand, so an adapter must match in
 * time linear in the text: a half-written pattern can never stall a
 * keystroke.
 */

export interface RegexMatch {
  /** Offset of the match in the searched text */
  start: number;
  end: number;
  /** Group 0 is the whole match; null for a group that took no part */
  groups: ReadonlyArray<string | null>;
}

export interface CompiledRegex {
  /** Pattern text exactly as typed */
  readonly source: string;

  /** True when the pattern matches anywhere in `text` */
  test(text: string): boolean;

  /**
   * Non-overlapping matches, leftmost first. An empty match that starts
   * where the previous match ended is skipped.
   */
  matchAll(text: string): Iterable<RegexMatch>;
}

export type CompileResult =
  | { success: true; regex: CompiledRegex }
  | { success: false; error: Error };

/**
 * Compile pattern text. Never throws: a malformed pattern is a failed result.
 */
export type RegexCompiler = (source: string) => CompileResult;
