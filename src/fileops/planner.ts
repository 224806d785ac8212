import { basename, dirname, extname, join } from "node:path";
import { matchName } from "../resolver/nameMatcher.js";
import { buildDirectoryIndex } from "../resolver/resourceIndex.js";
import { FILE_STOP_WORDS } from "../resolver/tiers.js";
import type { MatcherOptions } from "../resolver/types.js";
import { noopSink, type EventSink } from "../runtime/events.js";
import { parseFileOpAction } from "./actions.js";
import { FileOpError } from "./errors.js";
import { defaultPathContext, expandPath, hasDirectoryComponent, isDirectory, pathExists, type PathContext } from "./paths.js";
import type { FileOperationPlan, PlanningResult, SourceResolution } from "./types.js";

export type PlannerOptions = {
  paths?: PathContext;
  /** Appended to the stem of a copy whose target is taken, e.g. `_copy` or `_副本`. */
  copySuffix?: string;
  matcher?: Partial<MatcherOptions>;
  onEvent?: EventSink;
};

type PlannerContext = {
  paths: PathContext;
  copySuffix: string;
  matcher: Partial<MatcherOptions>;
  onEvent: EventSink;
  /** Paths that earlier plans of this batch will create. */
  reserved: Set<string>;
};

type ResolvedSource = {
  path: string;
  resolution?: SourceResolution;
};

const COPY_MARKERS = ["副本", "copy"];

const requirePart = (parts: string[], index: number, label: string): string => {
  const value = (parts[index] ?? "").trim();
  if (value.length === 0) {
    throw new FileOpError("format", `missing ${label}`);
  }
  return value;
};

const splitStem = (fileName: string): { stem: string; ext: string } => {
  const ext = extname(fileName);
  return { stem: fileName.slice(0, fileName.length - ext.length), ext };
};

/**
 * A source the model echoed slightly wrong is looked up among its siblings.
 * Only runs when the literal path is missing, no earlier plan creates it,
 * and its parent exists.
 */
const resolveSource = async (raw: string, ctx: PlannerContext): Promise<ResolvedSource> => {
  const literal = expandPath(raw, ctx.paths);
  if (ctx.reserved.has(literal) || (await pathExists(literal))) return { path: literal };

  const parent = dirname(literal);
  if (!(await isDirectory(parent))) return { path: literal };

  const siblings = await buildDirectoryIndex(parent, ctx.onEvent);
  const match = matchName(basename(literal), siblings, {
    ...ctx.matcher,
    stopWords: FILE_STOP_WORDS,
    keywordStripsExtension: true
  });
  if (!match) {
    const names = Array.from(new Set(siblings.map((candidate) => basename(candidate.path)))).slice(0, 5);
    ctx.onEvent({ type: "source_unresolved", literal, siblings: names });
    return { path: literal };
  }

  ctx.onEvent({ type: "source_resolved", literal, resolved: match.path, matchKind: match.matchKind });
  return { path: match.path, resolution: { literal, matchKind: match.matchKind } };
};

const isTaken = async (path: string, ctx: PlannerContext): Promise<boolean> =>
  ctx.reserved.has(path) || (await pathExists(path));

/** `a.txt` -> `a_copy.txt`, then `a_copy2.txt`, `a_copy3.txt`, ... */
const freeCopyPath = async (target: string, ctx: PlannerContext): Promise<string> => {
  if (!(await isTaken(target, ctx))) return target;
  const dir = dirname(target);
  const { stem, ext } = splitStem(basename(target));
  for (let counter = 1; ; counter += 1) {
    const candidate = join(dir, `${stem}${ctx.copySuffix}${counter > 1 ? counter : ""}${ext}`);
    if (!(await isTaken(candidate, ctx))) return candidate;
  }
};

/** `test.txt副本` or `test_copy` (missing the source extension) becomes `test<suffix>.txt`. */
const correctCopyName = (source: string, target: string, copySuffix: string): string => {
  const { stem, ext } = splitStem(basename(source));
  const targetName = basename(target);
  if (ext.length === 0 || !targetName.startsWith(stem) || targetName.endsWith(ext)) return target;

  const lowered = targetName.toLowerCase();
  const markers = [...COPY_MARKERS, copySuffix.replace(/^[_\-\s]+/, "").toLowerCase()].filter((marker) => marker.length > 0);
  if (!markers.some((marker) => lowered.endsWith(marker))) return target;
  return join(dirname(target), `${stem}${copySuffix}${ext}`);
};

const planCopyTarget = async (source: string, rawTarget: string, ctx: PlannerContext): Promise<string> => {
  let target = hasDirectoryComponent(rawTarget) ? expandPath(rawTarget, ctx.paths) : join(dirname(source), rawTarget);
  // A folder copied onto its own name gets a numbered sibling, never a copy inside itself.
  if (target !== source) {
    target = (await isDirectory(target)) ? join(target, basename(source)) : correctCopyName(source, target, ctx.copySuffix);
  }
  return freeCopyPath(target, ctx);
};

const producedPath = (plan: FileOperationPlan): string | undefined => {
  switch (plan.action) {
    case "create_file":
    case "create_dir":
    case "write_file":
      return plan.sourcePath;
    case "rename":
    case "copy":
    case "move":
      return plan.targetPath;
    case "delete":
      return undefined;
    default: {
      const exhaustive: never = plan;
      return exhaustive;
    }
  }
};

const planCreate = (
  action: "create_file" | "create_dir",
  parts: string[],
  ctx: PlannerContext
): FileOperationPlan => {
  const location = requirePart(parts, 1, "target directory");
  const name = (parts[2] ?? "").trim();
  if (action === "create_dir" && name.length === 0) {
    throw new FileOpError("format", "missing folder name");
  }

  // create_file also takes a single full path.
  const sourcePath = name.length > 0 ? join(expandPath(location, ctx.paths), name) : expandPath(location, ctx.paths);
  return { action, parentDir: dirname(sourcePath), sourcePath };
};

const planOne = async (payload: string, ctx: PlannerContext): Promise<FileOperationPlan> => {
  const parts = payload.split("|");
  if (parts.length < 2) {
    throw new FileOpError("format", "expected action|path[|argument]");
  }

  const action = parseFileOpAction(parts[0] ?? "");
  if (!action) {
    throw new FileOpError("format", `unknown action '${(parts[0] ?? "").trim()}'`);
  }

  switch (action) {
    case "create_file":
    case "create_dir":
      return planCreate(action, parts, ctx);
    case "delete": {
      const source = await resolveSource(requirePart(parts, 1, "path"), ctx);
      return { action, sourcePath: source.path, resolution: source.resolution };
    }
    case "rename": {
      const rawSource = requirePart(parts, 1, "source path");
      const newName = basename(requirePart(parts, 2, "new name").replace(/[\\/]+$/, ""));
      const source = await resolveSource(rawSource, ctx);
      return { action, sourcePath: source.path, targetPath: join(dirname(source.path), newName), resolution: source.resolution };
    }
    case "copy": {
      const rawSource = requirePart(parts, 1, "source path");
      const rawTarget = requirePart(parts, 2, "target path");
      const source = await resolveSource(rawSource, ctx);
      const targetPath = await planCopyTarget(source.path, rawTarget, ctx);
      return { action, sourcePath: source.path, targetPath, resolution: source.resolution };
    }
    case "move": {
      const rawSource = requirePart(parts, 1, "source path");
      const rawTarget = requirePart(parts, 2, "target path");
      const source = await resolveSource(rawSource, ctx);
      let targetPath = expandPath(rawTarget, ctx.paths);
      if (await isDirectory(targetPath)) {
        targetPath = join(targetPath, basename(source.path));
      }
      return { action, sourcePath: source.path, targetPath, resolution: source.resolution };
    }
    case "write_file": {
      // Only the first two separators delimit; the content keeps any further `|`.
      const rest = payload.slice(payload.indexOf("|") + 1);
      const idx = rest.indexOf("|");
      if (idx < 0) {
        throw new FileOpError("format", "expected write_file|path|content");
      }
      const rawPath = rest.slice(0, idx).trim();
      if (rawPath.length === 0) {
        throw new FileOpError("format", "missing file path");
      }
      return { action, sourcePath: expandPath(rawPath, ctx.paths), content: rest.slice(idx + 1).trim() };
    }
    default: {
      const exhaustive: never = action;
      throw new FileOpError("format", `unsupported action ${String(exhaustive)}`);
    }
  }
};

/**
 * Turn raw `action|arg|...` payloads into resolved plans. Only reads the
 * filesystem; malformed payloads are reported in `skipped` and do not affect
 * their siblings.
 */
export const planFileOperations = async (
  rawPayloads: readonly string[],
  options: PlannerOptions = {}
): Promise<PlanningResult> => {
  const ctx: PlannerContext = {
    paths: options.paths ?? defaultPathContext(),
    copySuffix: options.copySuffix ?? "_copy",
    matcher: options.matcher ?? {},
    onEvent: options.onEvent ?? noopSink,
    reserved: new Set<string>()
  };

  const result: PlanningResult = { plans: [], skipped: [] };
  for (const payload of rawPayloads) {
    try {
      const plan = await planOne(payload, ctx);
      const produced = producedPath(plan);
      if (produced !== undefined) ctx.reserved.add(produced);
      result.plans.push(plan);
    } catch (error) {
      if (!(error instanceof FileOpError) || error.kind !== "format") throw error;
      result.skipped.push({ payload, reason: error.message });
    }
  }
  return result;
};
