import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { CANCELLED_MESSAGE, executeFileOperations } from "../src/fileops/executor.js";
import { planFileOperations } from "../src/fileops/planner.js";
import type { AssistantEvent } from "../src/runtime/events.js";
import { layout, makeTempDir, scriptedConsole, snapshotTree } from "./helpers/fakes.js";

const setup = async (entries: Record<string, string | null> = {}) => {
  const root = await makeTempDir("exec");
  await layout(root, entries);
  return { root, paths: { cwd: root, home: root } };
};

describe("executeFileOperations", () => {
  test("runs every plan after one confirmation", async () => {
    const { root, paths } = await setup({ x: null });
    const { plans } = await planFileOperations(["新建文件夹|~/x|a", "新建文件夹|~/x|b"], { paths });
    const operator = scriptedConsole(["y"]);

    const result = await executeFileOperations(plans, { console: operator.console });

    expect(operator.questions).toEqual(["Run all of the above? (y/n)"]);
    expect(operator.printed).toEqual([
      "File operations (2):",
      `  1. Create folder: ${join(root, "x", "a")}`,
      `  2. Create folder: ${join(root, "x", "b")}`
    ]);
    expect(result.report).toBe(
      ["✓ Task 1: Created folder: a", "✓ Task 2: Created folder: b", "Batch complete: 2/2 succeeded"].join("\n")
    );
    expect(await snapshotTree(root)).toEqual({ x: "<dir>", "x/a": "<dir>", "x/b": "<dir>" });
  });

  test("a missing parent fails each plan with the same message", async () => {
    const { root, paths } = await setup();
    const { plans } = await planFileOperations(["新建文件夹|~/x|a", "新建文件夹|~/x|b"], { paths });

    const result = await executeFileOperations(plans, { console: scriptedConsole(["y"]).console });

    expect(result.successCount).toBe(0);
    expect(result.outcomes.map((outcome) => outcome.message)).toEqual([
      `Directory not found: ${join(root, "x")}`,
      `Directory not found: ${join(root, "x")}`
    ]);
    expect(result.report.split("\n").at(-1)).toBe("Batch complete: 0/2 succeeded");
  });

  test("declining changes nothing and yields one cancellation outcome", async () => {
    const { root, paths } = await setup({ "a.txt": "keep", sub: null });
    const { plans } = await planFileOperations(["删除|~/a.txt", "新建文件夹|~|new"], { paths });
    const before = await snapshotTree(root);
    const events: AssistantEvent[] = [];

    const result = await executeFileOperations(plans, {
      console: scriptedConsole(["n"]).console,
      onEvent: (event) => events.push(event)
    });

    expect(result.cancelled).toBe(true);
    expect(result.outcomes).toEqual([{ planIndex: -1, success: false, message: CANCELLED_MESSAGE }]);
    expect(result.report).toBe(CANCELLED_MESSAGE);
    expect(events).toEqual([{ type: "batch_done", successCount: 0, total: 2, cancelled: true }]);
    expect(await snapshotTree(root)).toEqual(before);
  });

  test("accepts Chinese and padded affirmative answers", async () => {
    for (const answer of ["是", " YES ", "确认"]) {
      const { paths } = await setup();
      const { plans } = await planFileOperations(["新建文件|~/a.txt"], { paths });
      const result = await executeFileOperations(plans, { console: scriptedConsole([answer]).console });
      expect(result.successCount).toBe(1);
    }
  });

  test("an empty plan list asks nothing", async () => {
    const operator = scriptedConsole(["y"]);
    const result = await executeFileOperations([], { console: operator.console });

    expect(operator.questions).toEqual([]);
    expect(result.report).toBe("No valid file operations to run");
  });

  test("repeated copies never overwrite", async () => {
    const { root, paths } = await setup({ "a.txt": "original" });
    const copyTwice = ["复制|~/a.txt|~/a.txt", "复制|~/a.txt|~/a.txt"];

    const first = await planFileOperations(copyTwice, { paths });
    await executeFileOperations(first.plans, { console: scriptedConsole(["y"]).console });
    const second = await planFileOperations(["复制|~/a.txt|~/a.txt"], { paths });
    const result = await executeFileOperations(second.plans, { console: scriptedConsole(["y"]).console });

    expect(result.report).toBe(["✓ Task 1: Copied file: a.txt -> a_copy3.txt", "Batch complete: 1/1 succeeded"].join("\n"));
    expect(await snapshotTree(root)).toEqual({
      "a.txt": "original",
      "a_copy.txt": "original",
      "a_copy2.txt": "original",
      "a_copy3.txt": "original"
    });
  });

  test("a folder copied onto its own name lands beside it", async () => {
    const { root, paths } = await setup({ "proj/src/main.ts": "code" });
    const { plans } = await planFileOperations(["复制|~/proj|proj"], { paths });

    const result = await executeFileOperations(plans, { console: scriptedConsole(["y"]).console });

    expect(result.report).toBe(["✓ Task 1: Copied folder: proj -> proj_copy", "Batch complete: 1/1 succeeded"].join("\n"));
    expect(await snapshotTree(root)).toEqual({
      proj: "<dir>",
      "proj/src": "<dir>",
      "proj/src/main.ts": "code",
      proj_copy: "<dir>",
      "proj_copy/src": "<dir>",
      "proj_copy/src/main.ts": "code"
    });
  });

  test("write_file stores content with pipes and creates parent folders", async () => {
    const { root, paths } = await setup();
    const { plans } = await planFileOperations(["write_file|~/notes/today.md|line1|line2"], { paths });

    const result = await executeFileOperations(plans, { console: scriptedConsole(["y"]).console });

    const target = join(root, "notes", "today.md");
    expect(result.outcomes[0]).toEqual({ planIndex: 0, success: true, message: `Wrote today.md (0.0 KB) at ${target}` });
    expect(await readFile(target, "utf8")).toBe("line1|line2");
  });

  test("write_file rejects unsupported extensions", async () => {
    const { paths } = await setup();
    const { plans } = await planFileOperations(["write_file|~/run.exe|echo"], { paths });

    const result = await executeFileOperations(plans, { console: scriptedConsole(["y"]).console });
    expect(result.outcomes[0]?.message).toBe("Unsupported file format: .exe; supported: .txt, .md, .markdown, .text");
  });

  test("a failing plan does not stop later plans", async () => {
    const { root, paths } = await setup({ "a.txt": "x", "b.txt": "y" });
    const { plans } = await planFileOperations(["新建文件|~/a.txt", "重命名|~/a.txt|b.txt", "删除|~/b.txt"], { paths });

    const result = await executeFileOperations(plans, { console: scriptedConsole(["y"]).console });

    expect(result.outcomes.map((outcome) => [outcome.success, outcome.message])).toEqual([
      [false, `File already exists: ${join(root, "a.txt")}`],
      [false, `Target already exists: ${join(root, "b.txt")}`],
      [true, "Deleted file: b.txt"]
    ]);
    expect(await snapshotTree(root)).toEqual({ "a.txt": "x" });
  });

  test("moves and recursively deletes folders", async () => {
    const { root, paths } = await setup({ "docs/a.txt": "x", archive: null });
    const { plans } = await planFileOperations(["移动|~/docs|~/archive", "删除|~/archive"], { paths });

    const result = await executeFileOperations(plans, { console: scriptedConsole(["y"]).console });

    expect(result.outcomes.map((outcome) => outcome.message)).toEqual([
      `Moved: docs -> ${join(root, "archive", "docs")}`,
      "Deleted folder: archive"
    ]);
    expect(await snapshotTree(root)).toEqual({});
  });
});
