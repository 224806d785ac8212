import { mkdir, mkdtemp, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, relative } from "node:path";
import type { ActionResult, OpenTarget, OsActions, OsRequest } from "../../src/os/actions.js";
import type { OperatorConsole } from "../../src/runtime/console.js";

export type ScriptedConsole = {
  console: OperatorConsole;
  printed: string[];
  questions: string[];
};

/** Answers questions from `answers` in order; an exhausted script declines. */
export const scriptedConsole = (answers: string[] = []): ScriptedConsole => {
  const queue = [...answers];
  const printed: string[] = [];
  const questions: string[] = [];
  return {
    printed,
    questions,
    console: {
      print: (lines) => {
        printed.push(...lines);
      },
      ask: async (question) => {
        questions.push(question);
        return queue.shift() ?? "n";
      }
    }
  };
};

export type OsCall =
  | { method: "open"; target: OpenTarget }
  | { method: "power"; action: string }
  | { method: "control"; action: string; param: string }
  | { method: "clean" };

/** Runs nothing; `unsupported` decides which requests the host refuses. */
export const recordingOs = (
  unsupported: (request: OsRequest) => string | null = () => null
): { os: OsActions; calls: OsCall[] } => {
  const calls: OsCall[] = [];
  const ok = (message: string): ActionResult => ({ ok: true, message });
  return {
    calls,
    os: {
      open: async (target) => {
        calls.push({ method: "open", target });
        return ok(`Opened ${target.kind === "builtin" ? target.name : target.path}`);
      },
      power: async (action) => {
        calls.push({ method: "power", action });
        return ok(`Power ${action}`);
      },
      control: async (action, param) => {
        calls.push({ method: "control", action, param });
        return ok(`Control ${action} ${param}`);
      },
      clean: async () => {
        calls.push({ method: "clean" });
        return ok("Cleaned");
      },
      unsupported
    }
  };
};

export const makeTempDir = async (prefix: string): Promise<string> => mkdtemp(join(tmpdir(), `deskpilot-${prefix}-`));

/** Create files (string content) and directories (`null`) under `root`. */
export const layout = async (root: string, entries: Record<string, string | null>): Promise<void> => {
  for (const [path, content] of Object.entries(entries)) {
    const full = join(root, path);
    if (content === null) {
      await mkdir(full, { recursive: true });
    } else {
      await mkdir(dirname(full), { recursive: true });
      await writeFile(full, content, "utf8");
    }
  }
};

/** Relative path -> file content (or "<dir>") for every entry under `root`. */
export const snapshotTree = async (root: string): Promise<Record<string, string>> => {
  const out: Record<string, string> = {};
  const walk = async (dir: string): Promise<void> => {
    for (const name of (await readdir(dir)).sort()) {
      const full = join(dir, name);
      const rel = relative(root, full);
      if ((await stat(full)).isDirectory()) {
        out[rel] = "<dir>";
        await walk(full);
      } else {
        out[rel] = await readFile(full, "utf8");
      }
    }
  };
  await walk(root);
  return out;
};
