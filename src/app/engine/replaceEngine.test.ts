/**
 * Tests for ReplaceEngine
 */

import { beforeEach, describe, expect, test, vi } from "vitest";
import { ReplaceEngine } from "./replaceEngine";
import { FileReadError, FileWriteError, createDefaultConfig } from "../../domain/entities";
import type { ChangeWatcher, InvalidationSink } from "../../domain/ports";
import { MemoryFileSystem } from "../../tests/memoryFileSystem";

const ROOT = "/mem/root";

function createFixture() {
  return new MemoryFileSystem(ROOT, {
    "src/main.rs": "fn main() {}\nlet x = foo;\n",
    "src/mod.rs": "pub mod foo;\n",
    "README.md": "foo bar\n",
    "bin/data.bin": new Uint8Array([1, 0, 2]),
    ".git/HEAD": "ref: refs/heads/main\n",
  });
}

function createEngine(fileSystem: MemoryFileSystem) {
  return new ReplaceEngine(ROOT, {
    fileSystem,
    config: createDefaultConfig(),
    concurrency: 4,
  });
}

describe("ReplaceEngine", () => {
  let fileSystem: MemoryFileSystem;
  let engine: ReplaceEngine;

  beforeEach(async () => {
    fileSystem = createFixture();
    engine = createEngine(fileSystem);
    await engine.buildIndex();
  });

  describe("buildIndex", () => {
    test("keeps text files and skips binaries and ignored directories", () => {
      expect([...engine.fileIndex.files].sort()).toEqual([
        "README.md",
        "src/main.rs",
        "src/mod.rs",
      ]);
      expect(engine.fileIndex.rootDir).toBe(ROOT);
    });

    test("filter is empty before the first build", async () => {
      const fresh = createEngine(createFixture());
      expect(await fresh.filter()).toEqual([]);

      fresh.setQuery("*.rs", "foo");
      expect(await fresh.filter()).toEqual([]);
    });

    test("refresh picks up files created since the last build", async () => {
      fileSystem.put("src/new.rs", "fn new() {}\n");
      engine.setQuery("*.rs", "");
      expect(await engine.filter()).not.toContain("src/new.rs");

      await engine.refresh();
      expect(await engine.filter()).toContain("src/new.rs");
    });
  });

  describe("filter", () => {
    test("blank query returns the whole index", async () => {
      engine.setQuery("  ", "");
      expect(await engine.filter()).toBe(engine.fileIndex.files);
    });

    test("exclusion wins over inclusion", async () => {
      engine.setQuery("*.rs,!mod.rs", "");
      expect(await engine.filter()).toEqual(["src/main.rs"]);
    });

    test("content query keeps files with a match, in index order", async () => {
      engine.setQuery("", "let \\w+");
      expect(await engine.filter()).toEqual(["src/main.rs"]);
    });

    test("malformed content regex matches nothing", async () => {
      engine.setQuery("", "(");
      expect(await engine.filter()).toEqual([]);
    });

    test("unchanged query returns the memoized list without reading again", async () => {
      engine.setQuery("*.rs", "foo");
      const first = await engine.filter();
      const second = await engine.filter();

      expect(first).toEqual(["src/main.rs", "src/mod.rs"]);
      expect(second).toBe(first);
      expect(fileSystem.readCount("src/main.rs")).toBe(1);
      expect(fileSystem.readCount("src/mod.rs")).toBe(1);
    });

    test("an invalidated path is read again on the next filter", async () => {
      engine.setQuery("*.rs", "foo");
      await engine.filter();

      fileSystem.put("src/main.rs", "fn main() {}\n");
      engine.invalidationSink("src/main.rs");

      expect(await engine.filter()).toEqual(["src/mod.rs"]);
      expect(fileSystem.readCount("src/main.rs")).toBe(2);
      expect(fileSystem.readCount("src/mod.rs")).toBe(1);
    });

    test("without an invalidation the cached content is used", async () => {
      engine.setQuery("", "foo");
      const first = await engine.filter();

      fileSystem.put("README.md", "nothing here\n");
      engine.setQuery("", "bar");
      engine.setQuery("", "foo");

      expect(await engine.filter()).toBe(first);
    });

    test("unreadable files drop out of content results", async () => {
      fileSystem.readFailures.set(`${ROOT}/src/mod.rs`, "EACCES");
      engine.setQuery("", "foo");

      expect(await engine.filter()).toEqual(["src/main.rs", "README.md"]);
    });
  });

  describe("preview", () => {
    test("returns the substituted text and a positional diff", async () => {
      const preview = await engine.preview("src/main.rs", "foo", "bar");

      expect(preview.path).toBe("src/main.rs");
      expect(preview.replaced).toBe("fn main() {}\nlet x = bar;\n");
      expect(preview.changed).toBe(true);
      expect(preview.diff).toEqual([
        { kind: "unchanged", text: "fn main() {}" },
        { kind: "removed", text: "let x = foo;" },
        { kind: "added", text: "let x = bar;" },
      ]);
    });

    test("accepts absolute paths under the root", async () => {
      const preview = await engine.preview(`${ROOT}/README.md`, "(\\w+) (\\w+)", "$2 $1");

      expect(preview.path).toBe("README.md");
      expect(preview.replaced).toBe("bar foo\n");
    });

    test("malformed pattern previews no change", async () => {
      const preview = await engine.preview("README.md", "[", "x");

      expect(preview.changed).toBe(false);
      expect(preview.diff).toEqual([{ kind: "unchanged", text: "foo bar" }]);
    });

    test("rejects with FileReadError for a missing file", async () => {
      const error = await engine.preview("gone.txt", "a", "b").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileReadError);
      expect(error).toMatchObject({ path: "gone.txt", code: "not-found" });
    });

    test("does not write anything", async () => {
      await engine.preview("README.md", "foo", "baz");
      expect(fileSystem.text("README.md")).toBe("foo bar\n");
    });
  });

  describe("commit", () => {
    test("commitOne writes the file and refreshes cached state", async () => {
      engine.setQuery("", "foo");
      expect(await engine.filter()).toEqual(["src/main.rs", "src/mod.rs", "README.md"]);

      const result = await engine.commitOne("README.md", "foo", "baz");

      expect(result).toEqual({ path: "README.md", success: true, changed: true });
      expect(fileSystem.text("README.md")).toBe("baz bar\n");
      expect(await engine.filter()).toEqual(["src/main.rs", "src/mod.rs"]);
    });

    test("commitOne reports an unchanged file", async () => {
      const result = await engine.commitOne("README.md", "absent", "x");
      expect(result).toEqual({ path: "README.md", success: true, changed: false });
    });

    test("commitAll isolates a failing file", async () => {
      fileSystem.writeFailures.set(`${ROOT}/src/mod.rs`, "EACCES");

      const results = await engine.commitAll(
        ["src/main.rs", "src/mod.rs", "README.md"],
        "foo",
        "qux"
      );

      expect(results.map((r) => r.path)).toEqual(["src/main.rs", "src/mod.rs", "README.md"]);
      expect(results[0].success).toBe(true);
      expect(results[2].success).toBe(true);

      const failed = results[1];
      expect(failed.success).toBe(false);
      if (!failed.success) {
        expect(failed.error).toBeInstanceOf(FileWriteError);
        expect(failed.error.code).toBe("permission");
      }

      expect(fileSystem.text("src/main.rs")).toBe("fn main() {}\nlet x = qux;\n");
      expect(fileSystem.text("src/mod.rs")).toBe("pub mod foo;\n");
      expect(fileSystem.text("README.md")).toBe("qux bar\n");
    });

    test("commit reads the disk, not the cache", async () => {
      engine.setQuery("", "foo");
      await engine.filter();

      fileSystem.put("README.md", "foo foo\n");
      await engine.commitOne("README.md", "foo", "x");

      expect(fileSystem.text("README.md")).toBe("x x\n");
    });
  });

  describe("watching", () => {
    function fakeWatcher() {
      let sink: InvalidationSink | null = null;
      let running = true;
      const watcher: ChangeWatcher = {
        stop: vi.fn(async () => {
          running = false;
        }),
        isRunning: () => running,
      };
      const startWatcher = vi.fn(async (_root: string, s: InvalidationSink) => {
        sink = s;
        return watcher;
      });
      const send = (path: string) => sink?.(path);
      return { watcher, startWatcher, send };
    }

    test("events from the watcher invalidate the changed path", async () => {
      const fake = fakeWatcher();
      const watched = new ReplaceEngine(ROOT, {
        fileSystem,
        config: createDefaultConfig(),
        startWatcher: fake.startWatcher,
      });
      await watched.buildIndex();

      await watched.startWatch();
      expect(fake.startWatcher).toHaveBeenCalledTimes(1);
      expect(fake.startWatcher.mock.calls[0][0]).toBe(ROOT);
      expect(watched.stats().watching).toBe(true);

      watched.setQuery("", "foo");
      expect(await watched.filter()).toEqual(["src/main.rs", "src/mod.rs", "README.md"]);

      fileSystem.put("README.md", "nothing\n");
      fake.send("README.md");

      expect(await watched.filter()).toEqual(["src/main.rs", "src/mod.rs"]);
      await watched.dispose();
    });

    test("startWatch returns the running watcher when called twice", async () => {
      const fake = fakeWatcher();
      const watched = new ReplaceEngine(ROOT, {
        fileSystem,
        config: createDefaultConfig(),
        startWatcher: fake.startWatcher,
      });

      const first = await watched.startWatch();
      const second = await watched.startWatch();

      expect(second).toBe(first);
      expect(fake.startWatcher).toHaveBeenCalledTimes(1);

      await watched.stopWatch();
      expect(fake.watcher.stop).toHaveBeenCalledTimes(1);
      expect(watched.stats().watching).toBe(false);
    });

    test("queued notifications are applied on a later tick", async () => {
      engine.setQuery("", "foo");
      await engine.filter();
      expect(engine.stats().cachedContents).toBe(3);

      engine.invalidationSink("README.md");
      await new Promise((resolve) => setImmediate(resolve));

      expect(engine.stats().cachedContents).toBe(2);
      expect(engine.stats().memoized).toBe(false);
    });
  });

  test("read returns cached content by index or absolute path", async () => {
    expect(await engine.read("README.md")).toBe("foo bar\n");
    expect(await engine.read(`${ROOT}/README.md`)).toBe("foo bar\n");
    expect(fileSystem.readCount("README.md")).toBe(1);
  });

  test("change listeners receive each drained batch", async () => {
    const batches: string[][] = [];
    const remove = engine.onChange((paths) => batches.push([...paths]));

    engine.invalidationSink("a.txt");
    engine.invalidationSink("b.txt");
    await engine.filter();

    remove();
    engine.invalidationSink("c.txt");
    await engine.filter();

    expect(batches).toEqual([["a.txt", "b.txt"]]);
  });

  test("compiledRegex reuses the pattern the filter compiled", async () => {
    engine.setQuery("", "foo");
    await engine.filter();

    const regex = engine.compiledRegex("foo");
    expect(regex?.source).toBe("foo");
    expect(engine.compiledRegex("foo")).toBe(regex);
    expect(engine.compiledRegex("(")).toBeNull();
    expect(engine.stats().compiledPatterns).toBe(1);
  });

  test("stats reports index and cache sizes", async () => {
    engine.setQuery("*.rs", "foo");
    await engine.filter();
    await engine.preview("README.md", "bar", "baz");

    expect(engine.stats()).toEqual({
      indexedFiles: 3,
      cachedContents: 3,
      compiledPatterns: 2,
      memoized: true,
      watching: false,
    });
  });
});
