/**
 * Invalidation Channel
 *
 * Queue between a change watcher and the engine that owns the caches. The
 * watcher only sends paths; the engine drains them and mutates its caches
 * itself.
 */

import type { InvalidationSink } from "../../domain/ports";

export class InvalidationChannel {
  private queue: string[] = [];
  private listener: (() => void) | null = null;
  private scheduled: ReturnType<typeof setImmediate> | null = null;

  /**
   * Sink to hand to a watcher.
   */
  readonly send: InvalidationSink = (path: string) => {
    this.queue.push(path);
    this.schedule();
  };

  /**
   * Register the consumer notified (on a later tick) when paths arrive.
   * There is one consumer; registering again replaces it.
   */
  onMessage(listener: () => void): void {
    this.listener = listener;
  }

  /**
   * Take every queued path, oldest first.
   */
  drain(): string[] {
    const paths = this.queue;
    this.queue = [];
    return paths;
  }

  get pending(): number {
    return this.queue.length;
  }

  close(): void {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = null;
    }
    this.listener = null;
    this.queue = [];
  }

  private schedule(): void {
    if (this.scheduled || !this.listener) return;

    this.scheduled = setImmediate(() => {
      this.scheduled = null;
      this.listener?.();
    });
  }
}
