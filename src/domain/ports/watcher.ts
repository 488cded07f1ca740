/**
 * Watcher Port
 *
 * Background listener that reports changed paths. A watcher owns no cache;
 * it only sends paths to a sink.
 */

/** Receives the root-relative path of a created or modified file */
export type InvalidationSink = (path: string) => void;

export interface ChangeWatcher {
  /** Stop watching and clean up */
  stop: () => Promise<void>;
  /** Whether the watcher is currently delivering events */
  isRunning: () => boolean;
}
