/**
 * Tests for ReplaceSession
 */

import { beforeEach, describe, expect, test } from "vitest";
import { ReplaceSession } from "./replaceSession";
import { ReplaceEngine } from "../engine";
import { createDefaultConfig } from "../../domain/entities";
import { MemoryFileSystem } from "../../tests/memoryFileSystem";

const ROOT = "/mem/project";

describe("ReplaceSession", () => {
  let fileSystem: MemoryFileSystem;
  let session: ReplaceSession;

  beforeEach(async () => {
    fileSystem = new MemoryFileSystem(ROOT, {
      "a.ts": "const oldName = 1;\n",
      "b.ts": "export { oldName };\n",
      "c.md": "oldName in docs\n",
      "d.ts": "unrelated\n",
    });
    const config = createDefaultConfig();
    config.files.globFilter = ["*.ts"];

    const engine = new ReplaceEngine(ROOT, { fileSystem, config });
    await engine.buildIndex();
    session = new ReplaceSession(engine);
  });

  test("seeds the glob query from the config", () => {
    expect(session.globQuery).toBe("*.ts");
  });

  test("filters by glob and by the substitution pattern", async () => {
    session.setFromPattern("oldName");
    expect(await session.refresh()).toEqual(["a.ts", "b.ts"]);

    session.setGlobQuery("");
    expect(await session.refresh()).toEqual(["a.ts", "b.ts", "c.md"]);
  });

  test("selection clamps to the list", async () => {
    session.setFromPattern("oldName");
    await session.refresh();

    expect(session.moveSelection(5)).toBe(1);
    expect(session.selectedFile()).toBe("b.ts");
    expect(session.moveSelection(-3)).toBe(0);
    expect(session.selectedFile()).toBe("a.ts");
  });

  test("changing the glob query resets the selection", async () => {
    session.setFromPattern("oldName");
    await session.refresh();
    session.moveSelection(1);

    session.setGlobQuery("*.md");
    expect(session.selected).toBe(0);
    expect(await session.refresh()).toEqual(["c.md"]);
  });

  test("selection is clamped when the list shrinks", async () => {
    session.setGlobQuery("");
    await session.refresh();
    session.moveSelection(3);
    expect(session.selectedFile()).toBe("d.ts");

    session.setFromPattern("oldName");
    await session.refresh();
    expect(session.selected).toBe(2);
    expect(session.selectedFile()).toBe("c.md");
  });

  test("previews the selected file", async () => {
    session.setFromPattern("old(Name)");
    session.setToTemplate("new$1");
    await session.refresh();
    session.moveSelection(1);

    const preview = await session.previewSelected();
    expect(preview?.path).toBe("b.ts");
    expect(preview?.replaced).toBe("export { newName };\n");
  });

  test("nothing to preview or commit on an empty list", async () => {
    session.setFromPattern("absent");
    expect(await session.refresh()).toEqual([]);

    expect(session.selectedFile()).toBeUndefined();
    expect(await session.previewSelected()).toBeUndefined();
    expect(session.requestCommitSelected()).toEqual({ kind: "none" });
    expect(session.requestCommitAll()).toEqual({ kind: "none" });
    expect(await session.confirm()).toEqual([]);
  });

  test("commits the selected file after confirmation", async () => {
    session.setFromPattern("oldName");
    session.setToTemplate("newName");
    await session.refresh();

    expect(session.requestCommitSelected()).toEqual({ kind: "one", path: "a.ts" });
    expect(fileSystem.text("a.ts")).toBe("const oldName = 1;\n");

    const results = await session.confirm();
    expect(results).toEqual([{ path: "a.ts", success: true, changed: true }]);
    expect(fileSystem.text("a.ts")).toBe("const newName = 1;\n");
    expect(session.confirmState).toEqual({ kind: "none" });

    expect(await session.refresh()).toEqual(["b.ts"]);
  });

  test("commits every filtered file after confirmation", async () => {
    session.setFromPattern("oldName");
    session.setToTemplate("newName");
    await session.refresh();

    expect(session.requestCommitAll()).toEqual({ kind: "all", paths: ["a.ts", "b.ts"] });

    const results = await session.confirm();
    expect(results.map((r) => r.success)).toEqual([true, true]);
    expect(fileSystem.text("b.ts")).toBe("export { newName };\n");
    expect(fileSystem.text("c.md")).toBe("oldName in docs\n");
  });

  test("cancel drops the pending commit", async () => {
    session.setFromPattern("oldName");
    session.setToTemplate("newName");
    await session.refresh();

    session.requestCommitAll();
    session.cancel();

    expect(await session.confirm()).toEqual([]);
    expect(fileSystem.text("a.ts")).toBe("const oldName = 1;\n");
  });
});
