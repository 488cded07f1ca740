/**
 * Logger Implementations
 *
 * - ConsoleLogger: plain console output (default for library use)
 * - InlineProgressLogger: diagnostics and progress on stderr, progress
 *   overwriting one line (for the CLI, whose stdout carries diffs)
 * - SilentLogger: no output (library default, tests)
 */

import type { Logger } from "../../domain/ports";

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
}

/**
 * The part of a writable TTY stream the inline logger uses.
 */
export interface OutputStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

/**
 * Standard console logger.
 * Logs messages normally without inline replacement.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }

  progress(message: string): void {
    console.log(message);
  }

  clearProgress(): void {
    // Nothing is ever drawn in place
  }
}

/**
 * CLI logger with inline progress replacement.
 *
 * Everything goes to stderr so that piping the CLI's stdout captures only
 * file lists and diffs. Progress is redrawn in place on a TTY and dropped
 * otherwise.
 */
export class InlineProgressLogger implements Logger {
  private verbose: boolean;
  private stream: OutputStream;
  private lastProgressLength = 0;
  private hasProgress = false;

  constructor(options?: LoggerOptions & { stream?: OutputStream }) {
    this.verbose = options?.verbose ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  info(message: string): void {
    this.write(message);
  }

  warn(message: string): void {
    this.write(`warning: ${message}`);
  }

  error(message: string): void {
    this.write(`error: ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write(message);
    }
  }

  progress(message: string): void {
    if (!this.stream.isTTY) {
      return;
    }

    // Carriage return, then pad over what the previous update left behind
    const padding = Math.max(0, this.lastProgressLength - message.length);
    this.stream.write(`\r${message}${" ".repeat(padding)}`);
    this.lastProgressLength = message.length;
    this.hasProgress = true;
  }

  clearProgress(): void {
    if (this.hasProgress && this.lastProgressLength > 0) {
      this.stream.write("\r" + " ".repeat(this.lastProgressLength) + "\r");
      this.lastProgressLength = 0;
      this.hasProgress = false;
    }
  }

  private write(message: string): void {
    this.clearProgress();
    this.stream.write(`${message}\n`);
  }
}

/**
 * Silent logger that produces no output.
 */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
  progress(): void {}
  clearProgress(): void {}
}

/**
 * Create a standard console logger.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

/**
 * Create an inline progress logger for CLI usage.
 */
export function createInlineLogger(options?: LoggerOptions): Logger {
  return new InlineProgressLogger(options);
}

/**
 * Create a silent logger.
 */
export function createSilentLogger(): Logger {
  return new SilentLogger();
}
