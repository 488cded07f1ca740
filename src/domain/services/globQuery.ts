/**
 * Glob Query Service
 *
 * Parses the comma-separated glob query and combines its clauses into a
 * single path test. Clause compilation is injected (see GlobCompiler) so
 * this stays free of any matching library.
 */

import type { ParsedGlobQuery } from "../entities";
import type { GlobCompiler, GlobTest } from "../ports";

/**
 * Combined include/exclude test for one glob query.
 */
export interface PathMatcher {
  /** True when at least one include clause was written */
  hasInclude: boolean;
  /** Number of clauses skipped because they did not compile */
  skipped: number;
  matches(path: string): boolean;
}

/**
 * Split a glob query into include and exclude clauses.
 *
 * @example
 * parseGlobQuery("*.rs, !mod.rs") // { include: ["*.rs"], exclude: ["mod.rs"] }
 */
export function parseGlobQuery(query: string): ParsedGlobQuery {
  const include: string[] = [];
  const exclude: string[] = [];

  for (const raw of query.split(",")) {
    const clause = raw.trim();
    if (clause === "") continue;

    if (clause.startsWith("!")) {
      exclude.push(clause.slice(1));
    } else {
      include.push(clause);
    }
  }

  return { include, exclude };
}

/**
 * Compile parsed clauses into a PathMatcher.
 *
 * A path passes when it matches at least one include clause (vacuously true
 * when none was written) and no exclude clause. Malformed clauses are
 * skipped; if every include clause was malformed, nothing passes.
 */
export function compileGlobQuery(
  parsed: ParsedGlobQuery,
  compileGlob: GlobCompiler
): PathMatcher {
  let skipped = 0;

  const compileAll = (patterns: string[]): GlobTest[] => {
    const tests: GlobTest[] = [];
    for (const pattern of patterns) {
      const test = compileGlob(pattern);
      if (test) {
        tests.push(test);
      } else {
        skipped++;
      }
    }
    return tests;
  };

  const includes = compileAll(parsed.include);
  const excludes = compileAll(parsed.exclude);
  const hasInclude = parsed.include.length > 0;

  return {
    hasInclude,
    skipped,
    matches(path: string): boolean {
      const included = hasInclude ? includes.some((test) => test(path)) : true;
      if (!included) return false;
      return !excludes.some((test) => test(path));
    },
  };
}
