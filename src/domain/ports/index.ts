/**
 * Domain Ports
 *
 * Interfaces defining what the domain needs from external systems.
 * These are implemented by infrastructure adapters.
 */

export type { FileSystem } from "./filesystem";
export type { GlobCompiler, GlobTest } from "./glob";
export type { ChangeWatcher, InvalidationSink } from "./watcher";
export type { Logger, LoggerFactory } from "./logger";
export type { CompiledRegex, CompileResult, RegexCompiler, RegexMatch } from "./regex";
