/**
 * Replace Session
 *
 * Front-end state over one ReplaceEngine: the three query strings, the
 * selected row of the filtered list and a pending confirmation. It renders
 * nothing; a terminal UI or the CLI drives it.
 *
 * The engine's content query is the substitution pattern itself, so the
 * list only shows files the pattern would touch.
 */

import type { CommitResult, ConfirmState, PreviewResult } from "../../domain/entities";
import { initialGlobQuery } from "../../domain/entities";
import type { ReplaceEngine } from "../engine";

export class ReplaceSession {
  private engine: ReplaceEngine;

  private glob: string;
  private from = "";
  private to = "";
  private files: readonly string[] = [];
  private selectedIndex = 0;
  private pending: ConfirmState = { kind: "none" };

  constructor(engine: ReplaceEngine) {
    this.engine = engine;
    this.glob = initialGlobQuery(engine.config);
  }

  get globQuery(): string {
    return this.glob;
  }

  get fromPattern(): string {
    return this.from;
  }

  get toTemplate(): string {
    return this.to;
  }

  get selected(): number {
    return this.selectedIndex;
  }

  get confirmState(): ConfirmState {
    return this.pending;
  }

  /** Filtered list as of the last refresh() */
  get filteredFiles(): readonly string[] {
    return this.files;
  }

  /**
   * Changing the path filter moves the cursor back to the first row.
   */
  setGlobQuery(glob: string): void {
    this.glob = glob;
    this.selectedIndex = 0;
  }

  setFromPattern(pattern: string): void {
    this.from = pattern;
  }

  setToTemplate(template: string): void {
    this.to = template;
  }

  /**
   * Push the queries into the engine and re-filter.
   */
  async refresh(): Promise<readonly string[]> {
    this.engine.setQuery(this.glob, this.from);
    this.files = await this.engine.filter();
    this.selectedIndex = this.clamp(this.selectedIndex);
    return this.files;
  }

  moveSelection(delta: number): number {
    this.selectedIndex = this.clamp(this.selectedIndex + delta);
    return this.selectedIndex;
  }

  selectedFile(): string | undefined {
    return this.files[this.selectedIndex];
  }

  async previewSelected(): Promise<PreviewResult | undefined> {
    const file = this.selectedFile();
    if (file === undefined) return undefined;
    return this.engine.preview(file, this.from, this.to);
  }

  requestCommitSelected(): ConfirmState {
    const file = this.selectedFile();
    this.pending = file === undefined ? { kind: "none" } : { kind: "one", path: file };
    return this.pending;
  }

  requestCommitAll(): ConfirmState {
    this.pending =
      this.files.length === 0 ? { kind: "none" } : { kind: "all", paths: [...this.files] };
    return this.pending;
  }

  cancel(): void {
    this.pending = { kind: "none" };
  }

  /**
   * Run the pending commit(s) and clear the confirmation.
   */
  async confirm(): Promise<CommitResult[]> {
    const pending = this.pending;
    this.pending = { kind: "none" };

    switch (pending.kind) {
      case "none":
        return [];
      case "one":
        return [await this.engine.commitOne(pending.path, this.from, this.to)];
      case "all":
        return this.engine.commitAll(pending.paths, this.from, this.to);
    }
  }

  private clamp(index: number): number {
    if (this.files.length === 0) return 0;
    return Math.min(Math.max(index, 0), this.files.length - 1);
  }
}
