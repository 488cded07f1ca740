/**
 * Tests for the chokidar change watcher
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { toIndexPath, watchForChanges } from "./watcher";
import type { ChangeWatcher } from "../../domain/ports";

describe("toIndexPath", () => {
  test("makes paths root-relative with '/' separators", () => {
    const root = path.resolve("/work/project");
    expect(toIndexPath(root, path.join(root, "src", "main.rs"))).toBe("src/main.rs");
  });
});

describe("watchForChanges", () => {
  let rootDir: string;
  let watcher: ChangeWatcher | null = null;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "resub-watch-"));
    await fs.mkdir(path.join(rootDir, "src"));
    await fs.writeFile(path.join(rootDir, "src", "main.rs"), "fn main() {}\n");
  });

  afterEach(async () => {
    await watcher?.stop();
    watcher = null;
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  test("sends modified and created files to the sink", async () => {
    const sent: string[] = [];
    watcher = await watchForChanges(rootDir, (p) => sent.push(p));
    expect(watcher.isRunning()).toBe(true);

    await fs.writeFile(path.join(rootDir, "src", "main.rs"), "fn main() { run(); }\n");
    await fs.writeFile(path.join(rootDir, "new.txt"), "hello\n");

    await vi.waitFor(
      () => {
        expect(sent).toContain("src/main.rs");
        expect(sent).toContain("new.txt");
      },
      { timeout: 5000, interval: 50 }
    );
  });

  test("stop ends delivery", async () => {
    const sink = vi.fn();
    watcher = await watchForChanges(rootDir, sink);

    await watcher.stop();
    expect(watcher.isRunning()).toBe(false);

    await fs.writeFile(path.join(rootDir, "after-stop.txt"), "x\n");
    await new Promise((resolve) => setTimeout(resolve, 200));
    expect(sink).not.toHaveBeenCalled();
  });
});
