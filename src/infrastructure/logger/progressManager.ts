/**
 * Progress Manager
 *
 * Collects progress from parallel workers and redraws it on a fixed
 * interval, so hundreds of completions per second become one line update
 * every PROGRESS_UPDATE_INTERVAL_MS.
 */

import type { Logger } from "../../domain/ports";

interface ProgressState {
  completed: number;
  total: number;
  message: string;
}

const PROGRESS_UPDATE_INTERVAL_MS = 50;

export class ProgressManager {
  private logger: Logger;
  private state: ProgressState = { completed: 0, total: 0, message: "" };
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private dirty = false;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  start(total: number, message: string): void {
    this.state = { completed: 0, total, message };
    this.dirty = true;

    if (this.intervalId) {
      return;
    }

    this.intervalId = setInterval(() => {
      this.writeProgress();
    }, PROGRESS_UPDATE_INTERVAL_MS);
    // Never keep the process alive just to draw progress
    this.intervalId.unref();
  }

  /**
   * Record one finished item.
   */
  tick(): void {
    this.state.completed++;
    this.dirty = true;
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    this.logger.clearProgress();
  }

  get completed(): number {
    return this.state.completed;
  }

  private writeProgress(): void {
    if (!this.dirty) return;
    this.dirty = false;

    const { completed, total, message } = this.state;
    this.logger.progress(`  [${completed}/${total}] ${message}`);
  }
}
