/**
 * RE2 Regex Adapter
 *
 * Compiles patterns with re2js, a pure JavaScript port of RE2. Matching is
 * linear in the text with no backtracking, and the syntax is RE2's: Perl
 * classes, non-greedy repetition and inline flags, but no lookaround or
 * backreferences.
 */

import { RE2JS } from "re2js";
import type { CompiledRegex, CompileResult, RegexMatch } from "../../domain/ports";

class Re2Regex implements CompiledRegex {
  readonly source: string;
  private pattern: RE2JS;

  constructor(source: string, pattern: RE2JS) {
    this.source = source;
    this.pattern = pattern;
  }

  test(text: string): boolean {
    return this.pattern.matcher(text).find();
  }

  *matchAll(text: string): Iterable<RegexMatch> {
    const matcher = this.pattern.matcher(text);
    const groupCount = matcher.groupCount();
    let lastEnd = -1;

    while (matcher.find()) {
      const start = matcher.start();
      const end = matcher.end();
      if (start === end && start === lastEnd) continue;

      const groups: Array<string | null> = [];
      for (let group = 0; group <= groupCount; group++) {
        groups.push(matcher.group(group));
      }
      lastEnd = end;
      yield { start, end, groups };
    }
  }
}

/**
 * Compile `source` as typed. Syntax errors come back as a failed result.
 */
export function compilePattern(source: string): CompileResult {
  try {
    return { success: true, regex: new Re2Regex(source, RE2JS.compile(source)) };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * The compiled regex, or null for a pattern that matches nothing.
 */
export function regexOrNull(result: CompileResult): CompiledRegex | null {
  return result.success ? result.regex : null;
}
