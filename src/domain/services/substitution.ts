/**
 * Substitution Service
 *
 * Regex replace with "$N" capture-group tokens. Preview and commit both go
 * through applySubstitution, so what is shown is exactly what is written.
 */

import type { CompiledRegex } from "../ports";

/**
 * Expand `$1`..`$N` in a template for one match.
 *
 * Tokens are replaced textually, group 1 first, every occurrence of each
 * token at a time. A group that did not participate expands to "".
 * `$0`, `$&` and `$$` are left as written.
 */
export function expandTemplate(
  template: string,
  groups: ReadonlyArray<string | null>
): string {
  let replaced = template;
  for (let group = 1; group < groups.length; group++) {
    replaced = replaced.split(`$${group}`).join(groups[group] ?? "");
  }
  return replaced;
}

/**
 * Replace every non-overlapping match of `regex` in `content`.
 *
 * A null regex stands for a malformed pattern and leaves the content as it
 * is. An empty match right after another match is not replaced.
 *
 * @param content - Full text to rewrite
 * @param template - Replacement text with optional `$N` tokens
 */
export function applySubstitution(
  content: string,
  regex: CompiledRegex | null,
  template: string
): string {
  if (!regex) {
    return content;
  }

  let result = "";
  let lastEnd = 0;
  for (const match of regex.matchAll(content)) {
    result += content.slice(lastEnd, match.start);
    result += expandTemplate(template, match.groups);
    lastEnd = match.end;
  }

  return result + content.slice(lastEnd);
}
