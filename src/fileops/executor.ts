import { constants } from "node:fs";
import { copyFile, cp, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { confirmWith, type OperatorConsole } from "../runtime/console.js";
import { noopSink, type EventSink } from "../runtime/events.js";
import { WRITABLE_EXTENSIONS } from "./actions.js";
import { FileOpError, errorCode, errorMessage } from "./errors.js";
import { isDirectory, pathExists, statOrNull } from "./paths.js";
import type { BatchResult, FileOperationPlan, OperationOutcome } from "./types.js";

export type ExecutorOptions = {
  console: OperatorConsole;
  onEvent?: EventSink;
  writableExtensions?: readonly string[];
};

export const CANCELLED_MESSAGE = "Batch cancelled; nothing was changed";

export const describePlan = (plan: FileOperationPlan): string => {
  switch (plan.action) {
    case "create_file":
      return `Create file: ${plan.sourcePath}`;
    case "create_dir":
      return `Create folder: ${plan.sourcePath}`;
    case "delete":
      return `Delete: ${plan.sourcePath}`;
    case "rename":
      return `Rename: ${plan.sourcePath} -> ${basename(plan.targetPath)}`;
    case "copy":
      return `Copy: ${plan.sourcePath} -> ${plan.targetPath}`;
    case "move":
      return `Move: ${plan.sourcePath} -> ${plan.targetPath}`;
    case "write_file":
      return `Write file: ${plan.sourcePath} (${plan.content.length} chars)`;
    default: {
      const exhaustive: never = plan;
      throw new Error(`Unsupported plan ${JSON.stringify(exhaustive)}`);
    }
  }
};

const requireMissing = async (path: string, label: string): Promise<void> => {
  if (await pathExists(path)) {
    throw new FileOpError("precondition", `${label} already exists: ${path}`);
  }
};

const requireParent = async (parentDir: string): Promise<void> => {
  if (!(await isDirectory(parentDir))) {
    throw new FileOpError("precondition", `Directory not found: ${parentDir}`);
  }
};

const movePath = async (source: string, target: string): Promise<void> => {
  try {
    await rename(source, target);
  } catch (error) {
    if (errorCode(error) !== "EXDEV") throw error;
    await cp(source, target, { recursive: true, errorOnExist: true, force: false });
    await rm(source, { recursive: true, force: true });
  }
};

const runPlan = async (plan: FileOperationPlan, writableExtensions: readonly string[]): Promise<string> => {
  switch (plan.action) {
    case "create_file": {
      await requireParent(plan.parentDir);
      await requireMissing(plan.sourcePath, "File");
      await writeFile(plan.sourcePath, "", { encoding: "utf8", flag: "wx" });
      return `Created file: ${basename(plan.sourcePath)}`;
    }
    case "create_dir": {
      await requireParent(plan.parentDir);
      await requireMissing(plan.sourcePath, "Folder");
      await mkdir(plan.sourcePath);
      return `Created folder: ${basename(plan.sourcePath)}`;
    }
    case "delete": {
      const info = await statOrNull(plan.sourcePath);
      if (!info) {
        throw new FileOpError("precondition", `Path not found: ${plan.sourcePath}`);
      }
      await rm(plan.sourcePath, { recursive: info.isDirectory() });
      return `Deleted ${info.isDirectory() ? "folder" : "file"}: ${basename(plan.sourcePath)}`;
    }
    case "rename": {
      if (!(await pathExists(plan.sourcePath))) {
        throw new FileOpError("precondition", `Path not found: ${plan.sourcePath}`);
      }
      await requireMissing(plan.targetPath, "Target");
      await rename(plan.sourcePath, plan.targetPath);
      return `Renamed: ${basename(plan.sourcePath)} -> ${basename(plan.targetPath)}`;
    }
    case "copy": {
      const info = await statOrNull(plan.sourcePath);
      if (!info) {
        throw new FileOpError("precondition", `Source not found: ${plan.resolution?.literal ?? plan.sourcePath}`);
      }
      let target = plan.targetPath;
      if (await isDirectory(target)) {
        target = join(target, basename(plan.sourcePath));
      }
      await requireMissing(target, "Target");
      if (info.isDirectory()) {
        await cp(plan.sourcePath, target, { recursive: true, errorOnExist: true, force: false });
      } else {
        await copyFile(plan.sourcePath, target, constants.COPYFILE_EXCL);
      }
      return `Copied ${info.isDirectory() ? "folder" : "file"}: ${basename(plan.sourcePath)} -> ${basename(target)}`;
    }
    case "move": {
      if (!(await pathExists(plan.sourcePath))) {
        throw new FileOpError("precondition", `Source not found: ${plan.sourcePath}`);
      }
      let target = plan.targetPath;
      if (await isDirectory(target)) {
        target = join(target, basename(plan.sourcePath));
      }
      await requireMissing(target, "Target");
      await movePath(plan.sourcePath, target);
      return `Moved: ${basename(plan.sourcePath)} -> ${target}`;
    }
    case "write_file": {
      const ext = extname(plan.sourcePath).toLowerCase();
      if (!writableExtensions.includes(ext)) {
        throw new FileOpError(
          "format",
          `Unsupported file format: ${ext || "(none)"}; supported: ${writableExtensions.join(", ")}`
        );
      }
      await mkdir(dirname(plan.sourcePath), { recursive: true });
      await writeFile(plan.sourcePath, plan.content, "utf8");
      const { size } = await stat(plan.sourcePath);
      return `Wrote ${basename(plan.sourcePath)} (${(size / 1024).toFixed(1)} KB) at ${plan.sourcePath}`;
    }
    default: {
      const exhaustive: never = plan;
      throw new Error(`Unsupported plan ${JSON.stringify(exhaustive)}`);
    }
  }
};

const formatOutcome = (outcome: OperationOutcome): string =>
  `${outcome.success ? "✓" : "✗"} Task ${outcome.planIndex + 1}: ${outcome.message}`;

/**
 * Run a batch after one confirmation covering every plan. Plans run in order;
 * a failing plan is recorded and the rest still run.
 */
export const executeFileOperations = async (
  plans: readonly FileOperationPlan[],
  options: ExecutorOptions
): Promise<BatchResult> => {
  const onEvent = options.onEvent ?? noopSink;
  const writableExtensions = options.writableExtensions ?? WRITABLE_EXTENSIONS;

  if (plans.length === 0) {
    return { outcomes: [], successCount: 0, total: 0, cancelled: false, report: "No valid file operations to run" };
  }

  options.console.print([
    `File operations (${plans.length}):`,
    ...plans.map((plan, index) => `  ${index + 1}. ${describePlan(plan)}`)
  ]);

  if (!(await confirmWith(options.console, "Run all of the above? (y/n)"))) {
    onEvent({ type: "batch_done", successCount: 0, total: plans.length, cancelled: true });
    return {
      outcomes: [{ planIndex: -1, success: false, message: CANCELLED_MESSAGE }],
      successCount: 0,
      total: plans.length,
      cancelled: true,
      report: CANCELLED_MESSAGE
    };
  }

  const outcomes: OperationOutcome[] = [];
  for (const [planIndex, plan] of plans.entries()) {
    try {
      outcomes.push({ planIndex, success: true, message: await runPlan(plan, writableExtensions) });
    } catch (error) {
      outcomes.push({ planIndex, success: false, message: errorMessage(error) });
    }
  }

  const successCount = outcomes.filter((outcome) => outcome.success).length;
  onEvent({ type: "batch_done", successCount, total: plans.length, cancelled: false });

  const report = [
    ...outcomes.map(formatOutcome),
    `Batch complete: ${successCount}/${plans.length} succeeded`
  ].join("\n");
  return { outcomes, successCount, total: plans.length, cancelled: false, report };
};
