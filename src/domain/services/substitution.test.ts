/**
 * Tests for Substitution Service
 */

import { describe, test, expect } from "vitest";
import { applySubstitution, expandTemplate } from "./substitution";
import { compilePattern, regexOrNull } from "../../infrastructure/regex";

function substitute(content: string, pattern: string, template: string): string {
  return applySubstitution(content, regexOrNull(compilePattern(pattern)), template);
}

describe("applySubstitution", () => {
  test("swaps capture groups", () => {
    expect(substitute("alice@example", "(\\w+)@(\\w+)", "$2-$1")).toBe("example-alice");
  });

  test("replaces every non-overlapping match", () => {
    expect(substitute("foo bar foo", "foo", "baz")).toBe("baz bar baz");
    expect(substitute("aaaa", "aa", "b")).toBe("bb");
  });

  test("malformed pattern leaves content unchanged", () => {
    expect(substitute("keep (this)", "(", "x")).toBe("keep (this)");
    expect(substitute("", "[", "$1")).toBe("");
  });

  test("no match leaves content unchanged", () => {
    expect(substitute("hello world", "xyz", "abc")).toBe("hello world");
  });

  test("non-participating group expands to empty string", () => {
    expect(substitute("ab", "(a)|(b)", "[$1$2]")).toBe("[a][b]");
  });

  test("$0 is not a backreference", () => {
    expect(substitute("abc", "(b)", "$0$1")).toBe("a$0bc");
  });

  test("template is literal apart from $N tokens", () => {
    expect(substitute("x", "x", "$&")).toBe("$&");
    expect(substitute("x", "(x)", "$$1")).toBe("$x");
  });

  test("group tokens above the group count stay literal", () => {
    expect(substitute("key=value", "(\\w+)=(\\w+)", "$2:$3")).toBe("value:$3");
  });

  test("empty matches insert at every position", () => {
    expect(substitute("abc", "x*", "-")).toBe("-a-b-c-");
  });

  test("no empty match is replaced right after a match", () => {
    expect(substitute("xab", "x*", "-")).toBe("-a-b-");
    expect(substitute("aXXb", "X*", "_")).toBe("_a_b_");
  });

  test("escaped punctuation is literal", () => {
    expect(substitute("a-b a_b", "a\\-b", "ok")).toBe("ok a_b");
  });

  test("works across lines", () => {
    expect(substitute("let a = 1;\nlet b = 2;\n", "let (\\w)", "const $1")).toBe(
      "const a = 1;\nconst b = 2;\n"
    );
  });

  test("null regex is identity", () => {
    expect(applySubstitution("unchanged", null, "x")).toBe("unchanged");
  });
});

describe("expandTemplate", () => {
  test("substitutes group 1 before later groups", () => {
    expect(expandTemplate("$1$2$10", ["ab", "a", "b"])).toBe("aba0");
  });

  test("replaces repeated tokens", () => {
    expect(expandTemplate("$1-$1", ["x", "x"])).toBe("x-x");
  });

  test("a group that took no part expands to nothing", () => {
    expect(expandTemplate("<$1>", ["", null])).toBe("<>");
  });
});
