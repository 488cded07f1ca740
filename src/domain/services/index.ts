/**
 * Domain Services
 *
 * Pure algorithms and business logic with no external dependencies.
 * These services operate only on domain entities and primitive data.
 */

// Glob query parsing and matching
export { parseGlobQuery, compileGlobQuery, type PathMatcher } from "./globQuery";

// Substitution
export { applySubstitution, expandTemplate } from "./substitution";

// Line diff
export { splitLines, computeLineDiff, formatDiffLine } from "./lineDiff";

// Match highlighting
export { highlightMatches, type HighlightSegment } from "./highlight";

// Text sniffing
export { isTextContent } from "./textSniff";

// Parallel processing
export {
  parallelMap,
  getIoConcurrency,
  type Settled,
} from "./parallelMap";

// Configuration validation
export {
  resolveConfig,
  formatValidationIssues,
  type ValidationIssue,
  type ValidationResult,
  type ResolvedConfig,
} from "./configValidator";
