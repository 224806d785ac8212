import { basename, extname } from "node:path";
import { buildShortcutIndex, scanDesktop } from "../../resolver/resourceIndex.js";
import type { Candidate, CandidateOrigin } from "../../resolver/types.js";
import { SEARCH_LIMIT, type HandlerContext } from "../context.js";

const LOCATION_LABELS: Record<CandidateOrigin, string> = {
  desktop: "desktop",
  "start-menu": "start menu",
  directory: "folder"
};

const displayName = (candidate: Candidate): string =>
  candidate.isDirectory ? basename(candidate.path) : basename(candidate.path, extname(candidate.path));

const numbered = (index: number, text: string): string => `  ${String(index + 1).padStart(2, " ")}. ${text}`;

export const searchApps = async (keyword: string, ctx: HandlerContext): Promise<string> => {
  const needle = keyword.trim().toLowerCase();
  const candidates = await buildShortcutIndex(ctx.shortcutRoots(), ctx.onEvent);
  if (candidates.length === 0) return "✗ No application shortcuts found";

  const hits = candidates
    .filter((candidate) => needle.length === 0 || candidate.key.includes(needle))
    .sort((left, right) => left.key.localeCompare(right.key));
  if (hits.length === 0) return `✗ No applications contain '${keyword.trim()}'`;

  const heading = needle.length > 0 ? `Applications matching '${keyword.trim()}':` : "Applications found:";
  const lines = [
    heading,
    ...hits
      .slice(0, SEARCH_LIMIT)
      .map((candidate, index) => numbered(index, `${displayName(candidate)} (${LOCATION_LABELS[candidate.origin]})`))
  ];
  if (hits.length > SEARCH_LIMIT) {
    lines.push(`  ... ${hits.length - SEARCH_LIMIT} more`);
  }
  return lines.join("\n");
};

const FILE_PREVIEW_LIMIT = 10;

export const listShortcuts = async (ctx: HandlerContext): Promise<string> => {
  const listing = await scanDesktop(ctx.shortcutRoots(), ctx.onEvent);
  const lines = ["Desktop contents:"];

  const section = (title: string, items: string[], limit = items.length): void => {
    if (items.length === 0) return;
    lines.push("", `${title} (${items.length}):`, ...items.slice(0, limit).map((item, index) => numbered(index, item)));
    if (items.length > limit) {
      lines.push(`  ... ${items.length - limit} more`);
    }
  };

  section("Folders", listing.folders);
  section("Shortcuts", listing.shortcuts);
  section("Files", listing.files, FILE_PREVIEW_LIMIT);

  if (listing.folders.length + listing.shortcuts.length + listing.files.length === 0) {
    lines.push("✗ Nothing found on the desktop");
    lines.push(`  Checked: ${listing.roots.length > 0 ? listing.roots.join(", ") : "(no desktop folder)"}`);
  }
  return lines.join("\n");
};
