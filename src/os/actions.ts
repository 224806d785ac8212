import { basename, extname } from "node:path";
import { z } from "zod";
import { readDataFile } from "../config/dataFiles.js";
import { runCmd, spawnDetached, type CmdResult, type CmdRunner } from "../runner/runCmd.js";

export type ActionResult = {
  ok: boolean;
  message: string;
};

export type OpenTarget =
  | { kind: "builtin"; name: string; commandLine: string }
  | { kind: "path"; path: string; isDirectory: boolean };

/** A request served from the command table, checked before the operator is asked. */
export type OsRequest =
  | { kind: "power"; action: string }
  | { kind: "control"; action: string; param: string }
  | { kind: "clean" };

export interface OsActions {
  open(target: OpenTarget): Promise<ActionResult>;
  power(action: string): Promise<ActionResult>;
  control(action: string, param: string): Promise<ActionResult>;
  clean(): Promise<ActionResult>;
  /** The failure message `request` would produce without running anything, or null when it can run. */
  unsupported(request: OsRequest): string | null;
}

const commandEntrySchema = z.object({
  command: z.string().min(1),
  message: z.string()
});

const platformTableSchema = z.record(z.string(), z.record(z.string(), commandEntrySchema));

export const osCommandsSchema = z.object({
  powerAliases: z.record(z.string(), z.string()),
  power: platformTableSchema,
  controlAliases: z.record(z.string(), z.string()),
  control: platformTableSchema,
  clean: z.record(z.string(), commandEntrySchema)
});

export type OsCommands = z.infer<typeof osCommandsSchema>;

type CommandEntry = z.infer<typeof commandEntrySchema>;

type Resolved = { entry: CommandEntry; label: string } | { error: string };

export const builtinAppsSchema = z.record(z.string(), z.record(z.string(), z.string()));

export const loadOsCommands = (): OsCommands => readDataFile("os_commands.json", osCommandsSchema);

/** Builtin name -> command line for one platform. */
export const loadBuiltinApps = (platform: NodeJS.Platform = process.platform): Map<string, string> => {
  const table = readDataFile("builtin_apps.json", builtinAppsSchema);
  return new Map(Object.entries(table[platform] ?? {}));
};

export type OsActionsOptions = {
  platform?: NodeJS.Platform;
  commands?: OsCommands;
  runCmdImpl?: CmdRunner;
  spawnDetachedImpl?: CmdRunner;
};

const lookup = <T>(table: Record<string, T> | undefined, key: string): T | undefined =>
  table && Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;

const failure = (message: string): ActionResult => ({ ok: false, message });

const fromCmd = (result: CmdResult, success: string, label: string): ActionResult =>
  result.ok ? { ok: true, message: success } : failure(`${label} failed: ${result.stderr.trim() || `exit code ${result.code}`}`);

const openerFor = (platform: NodeJS.Platform, path: string, isDirectory: boolean): { cmd: string; args: string[] } => {
  if (platform === "win32") {
    return isDirectory ? { cmd: "explorer", args: [path] } : { cmd: "cmd", args: ["/c", "start", "", path] };
  }
  if (platform === "darwin") {
    return { cmd: "open", args: [path] };
  }
  if (extname(path).toLowerCase() === ".desktop") {
    return { cmd: "gtk-launch", args: [basename(path, extname(path))] };
  }
  return { cmd: "xdg-open", args: [path] };
};

export const createOsActions = (options: OsActionsOptions = {}): OsActions => {
  const platform = options.platform ?? process.platform;
  const run = options.runCmdImpl ?? runCmd;
  const launch = options.spawnDetachedImpl ?? spawnDetached;
  let commands = options.commands;
  const table = (): OsCommands => {
    commands ??= loadOsCommands();
    return commands;
  };

  const resolve = (request: OsRequest): Resolved => {
    switch (request.kind) {
      case "power": {
        const canonical = lookup(table().powerAliases, request.action.trim().toLowerCase());
        if (!canonical) return { error: `Unsupported power action: ${request.action}` };
        const entry = lookup(table().power[platform], canonical);
        if (!entry) return { error: `Power action '${canonical}' is not supported on ${platform}` };
        return { entry, label: `Power action '${canonical}'` };
      }
      case "control": {
        const aliases = table().controlAliases;
        const name = lookup(aliases, request.action.trim().toLowerCase());
        const value = lookup(aliases, request.param.trim().toLowerCase());
        if (!name || !value) return { error: `Unsupported system control: ${request.action}|${request.param}` };
        const entry = lookup(table().control[platform], `${name}:${value}`);
        if (!entry) return { error: `System control '${name} ${value}' is not supported on ${platform}` };
        return { entry, label: `System control '${name} ${value}'` };
      }
      case "clean": {
        const entry = lookup(table().clean, platform);
        if (!entry) return { error: `System cleanup is not supported on ${platform}` };
        return { entry, label: "System cleanup" };
      }
      default: {
        const exhaustive: never = request;
        return exhaustive;
      }
    }
  };

  const execute = async (request: OsRequest, runner: CmdRunner): Promise<ActionResult> => {
    const resolved = resolve(request);
    if ("error" in resolved) return failure(resolved.error);
    const result = await runner(resolved.entry.command, [], { shell: true });
    return fromCmd(result, resolved.entry.message, resolved.label);
  };

  return {
    open: async (target) => {
      if (target.kind === "builtin") {
        const result = await launch(target.commandLine, [], { shell: true });
        return fromCmd(result, `Opened system item: ${target.name}`, `Opening ${target.name}`);
      }
      const { cmd, args } = openerFor(platform, target.path, target.isDirectory);
      const label = target.isDirectory ? "folder" : "app";
      const name = basename(target.path, extname(target.path));
      const result = await launch(cmd, args);
      return fromCmd(result, `Opened ${label}: ${name}`, `Opening ${target.path}`);
    },

    power: async (action) => execute({ kind: "power", action }, launch),

    control: async (action, param) => execute({ kind: "control", action, param }, run),

    clean: async () => execute({ kind: "clean" }, launch),

    unsupported: (request) => {
      const resolved = resolve(request);
      return "error" in resolved ? resolved.error : null;
    }
  };
};
