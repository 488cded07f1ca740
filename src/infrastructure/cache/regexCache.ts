/**
 * Regex Cache
 *
 * Compiled patterns keyed by their exact source text, so the same content
 * query typed again (or re-evaluated on every keystroke) reuses one regex.
 */

import type { CompiledRegex, CompileResult, RegexCompiler } from "../../domain/ports";
import { compilePattern } from "../regex";

export class RegexCache {
  private compiled = new Map<string, CompiledRegex>();
  private compiler: RegexCompiler;

  /**
   * @param compiler - Pattern engine (default: RE2)
   */
  constructor(compiler: RegexCompiler = compilePattern) {
    this.compiler = compiler;
  }

  /**
   * Compile `source`, or return the regex compiled for it before.
   * Failures are returned and never cached.
   */
  compile(source: string): CompileResult {
    const cached = this.compiled.get(source);
    if (cached) {
      return { success: true, regex: cached };
    }

    const result = this.compiler(source);
    if (result.success) {
      this.compiled.set(source, result.regex);
    }
    return result;
  }

  clear(): void {
    this.compiled.clear();
  }

  get size(): number {
    return this.compiled.size;
  }
}
