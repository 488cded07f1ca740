/**
 * Minimatch Glob Adapter
 *
 * Implements the GlobCompiler port with minimatch.
 *
 * - Dotfiles match like any other name.
 * - A pattern without "/" is matched against the basename, so "*.rs" and
 *   "mod.rs" both match "src/mod.rs".
 * - A pattern with "/" is matched against the whole relative path.
 */

import { Minimatch } from "minimatch";
import type { GlobCompiler } from "../../domain/ports";

export const compileMinimatchGlob: GlobCompiler = (pattern) => {
  let matcher: Minimatch;
  try {
    matcher = new Minimatch(pattern, {
      dot: true,
      matchBase: !pattern.includes("/"),
    });
  } catch {
    // minimatch throws on patterns it refuses outright (e.g. over-long ones)
    return null;
  }

  if (matcher.makeRe() === false) {
    return null;
  }

  return (filepath) => matcher.match(filepath);
};
