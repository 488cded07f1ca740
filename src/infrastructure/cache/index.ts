/**
 * Cache Infrastructure
 *
 * In-memory state owned by one engine instance.
 */

export { ContentCache } from "./contentCache";
export { RegexCache } from "./regexCache";
export { FilterMemo } from "./filterMemo";
export { InvalidationChannel } from "./invalidationChannel";
