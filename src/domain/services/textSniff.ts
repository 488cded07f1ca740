/**
 * Text Sniffing
 *
 * One-time heuristic deciding whether a file belongs in the index.
 */

/**
 * A file is text when its leading bytes contain no NUL byte.
 */
export function isTextContent(prefix: Uint8Array): boolean {
  return !prefix.includes(0);
}
