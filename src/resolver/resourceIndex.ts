import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { basename, extname, join } from "node:path";
import { noopSink, type EventSink } from "../runtime/events.js";
import { BUNDLE_EXTENSIONS, SHORTCUT_EXTENSIONS, type ShortcutRoot } from "./roots.js";
import type { Candidate, CandidateOrigin } from "./types.js";

const isHidden = (name: string): boolean => name.startsWith(".");

const byName = (left: Dirent, right: Dirent): number => left.name.localeCompare(right.name);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const shortcutName = (fileName: string, extensions: readonly string[]): string | null => {
  const ext = extname(fileName).toLowerCase();
  if (!extensions.includes(ext)) return null;
  return fileName.slice(0, fileName.length - ext.length);
};

/**
 * Keys are not unique. A later entry replaces the path of an earlier one but
 * keeps the earlier key's position in iteration order.
 */
class CandidateTable {
  private readonly byKey = new Map<string, Candidate>();

  add(candidate: Candidate): void {
    this.byKey.set(candidate.key, candidate);
  }

  toArray(): Candidate[] {
    return Array.from(this.byKey.values());
  }
}

export type DirectoryLister = (dir: string) => Promise<Dirent[]>;

const listEntries: DirectoryLister = (dir) => readdir(dir, { withFileTypes: true });

type Walk = {
  origin: CandidateOrigin;
  table: CandidateTable;
  list: DirectoryLister;
  onEvent: EventSink;
};

const walkRoot = async (dir: string, includeFolders: boolean, walk: Walk): Promise<void> => {
  const { origin, table } = walk;
  const entries = (await walk.list(dir)).sort(byName);
  const subdirs: string[] = [];

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      const bundle = shortcutName(entry.name, BUNDLE_EXTENSIONS);
      if (bundle !== null) {
        table.add({ key: bundle.toLowerCase(), path: full, isDirectory: false, origin });
        continue;
      }
      if (isHidden(entry.name)) continue;
      subdirs.push(full);
      continue;
    }
    const name = shortcutName(entry.name, SHORTCUT_EXTENSIONS);
    if (name !== null) {
      table.add({ key: name.toLowerCase(), path: full, isDirectory: false, origin });
    }
  }

  if (includeFolders) {
    for (const sub of subdirs) {
      table.add({ key: basename(sub).toLowerCase(), path: sub, isDirectory: true, origin });
    }
  }

  for (const sub of subdirs) {
    try {
      await walkRoot(sub, false, walk);
    } catch (error) {
      walk.onEvent({ type: "index_root_failed", root: sub, message: errorMessage(error) });
    }
  }
};

/**
 * Scan shortcut roots recursively. Desktop roots also contribute their top-level folders.
 * A root or subfolder that cannot be read is reported and skipped.
 */
export const buildShortcutIndex = async (
  roots: readonly ShortcutRoot[],
  onEvent: EventSink = noopSink,
  list: DirectoryLister = listEntries
): Promise<Candidate[]> => {
  onEvent({ type: "index_start", scope: "shortcuts" });
  const table = new CandidateTable();

  for (const root of roots) {
    const origin: CandidateOrigin = root.kind === "desktop" ? "desktop" : "start-menu";
    try {
      await walkRoot(root.path, root.kind === "desktop", { origin, table, list, onEvent });
    } catch (error) {
      onEvent({ type: "index_root_failed", root: root.path, message: errorMessage(error) });
    }
  }

  const candidates = table.toArray();
  onEvent({ type: "index_built", scope: "shortcuts", count: candidates.length });
  return candidates;
};

/**
 * Immediate entries of one directory, keyed by original-case and lowercased
 * name. Both keys point at the same path. A missing directory yields [].
 */
export const buildDirectoryIndex = async (dir: string, onEvent: EventSink = noopSink): Promise<Candidate[]> => {
  onEvent({ type: "index_start", scope: "directory", root: dir });
  const table = new CandidateTable();

  let entries: Dirent[] = [];
  try {
    entries = (await readdir(dir, { withFileTypes: true })).sort(byName);
  } catch (error) {
    onEvent({ type: "index_root_failed", root: dir, message: errorMessage(error) });
    return [];
  }

  for (const entry of entries) {
    const candidate = { path: join(dir, entry.name), isDirectory: entry.isDirectory(), origin: "directory" as const };
    table.add({ ...candidate, key: entry.name.toLowerCase() });
    table.add({ ...candidate, key: entry.name });
  }

  const candidates = table.toArray();
  onEvent({ type: "index_built", scope: "directory", count: candidates.length });
  return candidates;
};

export type DesktopListing = {
  roots: string[];
  folders: string[];
  shortcuts: string[];
  files: string[];
};

const sortedUnique = (values: string[]): string[] =>
  Array.from(new Set(values)).sort((left, right) => left.toLowerCase().localeCompare(right.toLowerCase()));

export const scanDesktop = async (
  roots: readonly ShortcutRoot[],
  onEvent: EventSink = noopSink
): Promise<DesktopListing> => {
  const desktopRoots = roots.filter((root) => root.kind === "desktop").map((root) => root.path);
  const folders: string[] = [];
  const shortcuts: string[] = [];
  const files: string[] = [];

  for (const root of desktopRoots) {
    try {
      const entries = await readdir(root, { withFileTypes: true });
      for (const entry of entries) {
        if (isHidden(entry.name)) continue;
        const bundle = entry.isDirectory() ? shortcutName(entry.name, BUNDLE_EXTENSIONS) : null;
        const shortcut = entry.isFile() ? shortcutName(entry.name, SHORTCUT_EXTENSIONS) : null;
        if (bundle !== null) shortcuts.push(bundle);
        else if (entry.isDirectory()) folders.push(entry.name);
        else if (shortcut !== null) shortcuts.push(shortcut);
        else if (entry.isFile()) files.push(entry.name);
      }
    } catch (error) {
      onEvent({ type: "index_root_failed", root, message: errorMessage(error) });
    }
  }

  return {
    roots: desktopRoots,
    folders: sortedUnique(folders),
    shortcuts: sortedUnique(shortcuts),
    files: sortedUnique(files)
  };
};
