import { existsSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export type RootKind = "desktop" | "start-menu";

export type ShortcutRoot = {
  path: string;
  kind: RootKind;
};

export const DESKTOP_FOLDER_NAMES = ["Desktop", "桌面", "desktop"] as const;

export const SHORTCUT_EXTENSIONS: readonly string[] = [".lnk", ".url", ".desktop"];

/** macOS application bundles are directories; they are indexed as one entry. */
export const BUNDLE_EXTENSIONS: readonly string[] = [".app"];

const isDirectory = (path: string): boolean => {
  try {
    return existsSync(path) && statSync(path).isDirectory();
  } catch {
    return false;
  }
};

export const defaultShortcutRoots = (
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
  platform: NodeJS.Platform = process.platform
): ShortcutRoot[] => {
  const roots: ShortcutRoot[] = DESKTOP_FOLDER_NAMES.map((name) => ({ path: join(home, name), kind: "desktop" }));

  if (platform === "win32") {
    if (env.PUBLIC) roots.push({ path: join(env.PUBLIC, "Desktop"), kind: "desktop" });
    if (env.ALLUSERSPROFILE) roots.push({ path: join(env.ALLUSERSPROFILE, "Desktop"), kind: "desktop" });
    if (env.APPDATA) {
      roots.push({ path: join(env.APPDATA, "Microsoft", "Windows", "Start Menu", "Programs"), kind: "start-menu" });
    }
    if (env.PROGRAMDATA) {
      roots.push({ path: join(env.PROGRAMDATA, "Microsoft", "Windows", "Start Menu", "Programs"), kind: "start-menu" });
    }
  } else if (platform === "darwin") {
    roots.push({ path: "/Applications", kind: "start-menu" });
    roots.push({ path: join(home, "Applications"), kind: "start-menu" });
  } else {
    roots.push({ path: join(home, ".local", "share", "applications"), kind: "start-menu" });
    roots.push({ path: "/usr/share/applications", kind: "start-menu" });
  }

  // Case-insensitive filesystems resolve Desktop and desktop to the same folder.
  const seen = new Set<string>();
  return roots.filter((root) => {
    if (!isDirectory(root.path)) return false;
    const marker = platform === "linux" ? root.path : root.path.toLowerCase();
    if (seen.has(marker)) return false;
    seen.add(marker);
    return true;
  });
};
