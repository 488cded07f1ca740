/**
 * Filter Files Use Case
 *
 * Narrows a file list by a glob query and a content regex. Memoization is
 * the caller's concern; this function always recomputes.
 */

import type { Query } from "../entities";
import type { CompiledRegex, GlobCompiler, RegexCompiler } from "../ports";
import { compileGlobQuery, parseGlobQuery } from "../services/globQuery";
import { parallelMap } from "../services/parallelMap";

/**
 * Dependencies injected by the engine.
 */
export interface FilterDependencies {
  /** Compiles one glob clause (e.g., minimatch) */
  compileGlob: GlobCompiler;

  /** Compiles the content query, usually through a RegexCache */
  compileContent: RegexCompiler;

  /** Reads a file's text, usually through a ContentCache */
  readContent: (path: string) => Promise<string>;

  /** Maximum number of files evaluated at once */
  concurrency: number;

  /** Called once per clause or regex that could not be compiled */
  onPatternError?: (message: string) => void;
}

/**
 * Evaluate every file against the query, independently and in parallel.
 *
 * - A file must pass the glob test (include/exclude clauses).
 * - With a non-empty content query it must also contain a match; a file
 *   that cannot be read does not match.
 * - A malformed content regex matches nothing.
 *
 * @returns Matching paths in the order of `files`
 */
export async function filterFiles(
  files: readonly string[],
  query: Query,
  deps: FilterDependencies
): Promise<string[]> {
  const matcher = compileGlobQuery(parseGlobQuery(query.glob), deps.compileGlob);
  if (matcher.skipped > 0) {
    deps.onPatternError?.(`Skipped ${matcher.skipped} malformed glob clause(s) in '${query.glob}'`);
  }

  let contentRegex: CompiledRegex | null = null;
  if (query.content.length > 0) {
    const compiled = deps.compileContent(query.content);
    if (!compiled.success) {
      deps.onPatternError?.(`Invalid content regex '${query.content}': ${compiled.error.message}`);
      return [];
    }
    contentRegex = compiled.regex;
  }

  const verdicts = await parallelMap(
    files,
    async (file) => {
      if (!matcher.matches(file)) return false;
      if (!contentRegex) return true;

      const content = await deps.readContent(file);
      return contentRegex.test(content);
    },
    deps.concurrency
  );

  // Unreadable files settle as failures and drop out with the non-matches
  return files.filter((_, i) => {
    const verdict = verdicts[i];
    return verdict.success && verdict.value;
  });
}
