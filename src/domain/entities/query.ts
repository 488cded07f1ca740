/**
 * Query Entity
 *
 * The pair of strings a user edits to narrow the index.
 */

export interface Query {
  /** Comma-separated glob clauses; "!"-prefixed clauses exclude */
  glob: string;

  /** Regex a file's full text must match */
  content: string;
}

/**
 * Glob query split into its clauses.
 */
export interface ParsedGlobQuery {
  /** Include patterns, in the order written */
  include: string[];

  /** Exclude patterns with the "!" prefix removed */
  exclude: string[];
}

export const EMPTY_QUERY: Query = { glob: "", content: "" };

/**
 * Whether neither part of the query constrains the index.
 */
export function isBlankQuery(query: Query): boolean {
  return query.glob.trim() === "" && query.content.trim() === "";
}
