import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export type PathContext = {
  cwd: string;
  home: string;
};

export const defaultPathContext = (): PathContext => ({ cwd: process.cwd(), home: homedir() });

/** Expand a leading `~` and make the path absolute against `cwd`. */
export const expandPath = (raw: string, ctx: PathContext): string => {
  const trimmed = raw.trim();
  if (trimmed === "~") return ctx.home;
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return join(ctx.home, trimmed.slice(2));
  }
  return resolve(ctx.cwd, trimmed);
};

export const hasDirectoryComponent = (raw: string): boolean => {
  const trimmed = raw.trim();
  return trimmed.startsWith("~") || trimmed.includes("/") || trimmed.includes("\\");
};

export const statOrNull = async (path: string): Promise<Stats | null> => {
  try {
    return await stat(path);
  } catch {
    return null;
  }
};

export const pathExists = async (path: string): Promise<boolean> => (await statOrNull(path)) !== null;

export const isDirectory = async (path: string): Promise<boolean> => (await statOrNull(path))?.isDirectory() ?? false;
