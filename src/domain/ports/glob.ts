/**
 * Glob Port
 *
 * Compiles one glob clause into a path test. The domain decides how
 * clauses combine; the adapter decides what a clause means.
 */

/** Tests a "/"-separated relative path */
export type GlobTest = (path: string) => boolean;

/**
 * Compile a single glob pattern. Returns null when the pattern is malformed.
 */
export type GlobCompiler = (pattern: string) => GlobTest | null;
