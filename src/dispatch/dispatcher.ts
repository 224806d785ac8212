import { parseDirectives, groupByKind } from "../directives/parse.js";
import { DIRECTIVE_KINDS, type Directive, type DirectiveKind } from "../directives/types.js";
import { errorMessage } from "../fileops/errors.js";
import { defaultPathContext } from "../fileops/paths.js";
import { loadBuiltinApps } from "../os/actions.js";
import { defaultShortcutRoots } from "../resolver/roots.js";
import { noopSink } from "../runtime/events.js";
import type { HandlerContext } from "./context.js";
import { runFileBatch } from "./handlers/fileOps.js";
import { listDirectory, systemInfo } from "./handlers/info.js";
import { openApp } from "./handlers/openApp.js";
import { listShortcuts, searchApps } from "./handlers/shortcuts.js";
import { cleanSystem, powerAction, systemControl } from "./handlers/system.js";

export type DispatcherDeps = Pick<HandlerContext, "console" | "os"> &
  Partial<Omit<HandlerContext, "console" | "os">>;

export type TaskDispatcher = {
  dispatch: (text: string) => Promise<string>;
};

const eachPayload = async (
  directives: readonly Directive[],
  run: (payload: string) => Promise<string> | string
): Promise<string[]> => {
  const out: string[] = [];
  for (const directive of directives) {
    out.push(await run(directive.payload));
  }
  return out;
};

const handleKind = async (
  kind: DirectiveKind,
  groups: Map<DirectiveKind, Directive[]>,
  ctx: HandlerContext
): Promise<string[]> => {
  const directives = groups.get(kind) ?? [];
  switch (kind) {
    case "OPEN_APP":
      return eachPayload(directives, (payload) => openApp(payload, ctx));
    case "SYSTEM_INFO":
      return [systemInfo(ctx)];
    case "LIST_DIR":
      return eachPayload(directives, (payload) => listDirectory(payload, ctx));
    case "POWER_ACTION":
      return eachPayload(directives, (payload) => powerAction(payload, ctx));
    case "SEARCH_APPS":
      return eachPayload(directives, (payload) => searchApps(payload, ctx));
    case "LIST_SHORTCUTS":
      return [await listShortcuts(ctx)];
    case "FILE_OP":
      return [await runFileBatch([...directives, ...(groups.get("WRITE_FILE") ?? [])], ctx)];
    case "WRITE_FILE":
      // Pooled into the FILE_OP batch.
      return [];
    case "CLEAN_SYSTEM":
      return [await cleanSystem(ctx)];
    case "SYSTEM_CONTROL":
      return eachPayload(directives, (payload) => systemControl(payload, ctx));
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unhandled directive kind ${String(exhaustive)}`);
    }
  }
};

/** Kinds that run this turn; WRITE_FILE alone still opens the FILE_OP batch. */
const activeKinds = (groups: Map<DirectiveKind, Directive[]>): DirectiveKind[] =>
  DIRECTIVE_KINDS.filter((kind) => {
    if (kind === "FILE_OP") return groups.has("FILE_OP") || groups.has("WRITE_FILE");
    if (kind === "WRITE_FILE") return false;
    return groups.has(kind);
  });

const FAILURE_LINE = /^✗/m;

const countFor = (kind: DirectiveKind, groups: Map<DirectiveKind, Directive[]>): number =>
  (groups.get(kind)?.length ?? 0) + (kind === "FILE_OP" ? (groups.get("WRITE_FILE")?.length ?? 0) : 0);

export const createTaskDispatcher = (deps: DispatcherDeps): TaskDispatcher => {
  const platform = deps.platform ?? process.platform;
  const ctx: HandlerContext = {
    console: deps.console,
    os: deps.os,
    builtinApps: deps.builtinApps ?? loadBuiltinApps(platform),
    shortcutRoots: deps.shortcutRoots ?? (() => defaultShortcutRoots(process.env, undefined, platform)),
    paths: deps.paths ?? defaultPathContext(),
    platform,
    copySuffix: deps.copySuffix ?? "_copy",
    matcher: deps.matcher ?? {},
    onEvent: deps.onEvent ?? noopSink,
    now: deps.now ?? (() => new Date())
  };

  return {
    /**
     * Run every directive in `text` and join the handler reports in kind
     * order. Text without directives yields "".
     */
    dispatch: async (text) => {
      const groups = groupByKind(parseDirectives(text));
      const reports: string[] = [];

      for (const kind of activeKinds(groups)) {
        ctx.onEvent({ type: "directive_start", kind, count: countFor(kind, groups) });
        let lines: string[];
        try {
          lines = await handleKind(kind, groups, ctx);
        } catch (error) {
          lines = [`✗ ${kind} failed: ${errorMessage(error)}`];
        }
        ctx.onEvent({ type: "directive_end", kind, ok: !lines.some((line) => FAILURE_LINE.test(line)) });
        reports.push(...lines);
      }

      return reports.join("\n");
    }
  };
};
