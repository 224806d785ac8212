import { matchName, describeMatch } from "../../resolver/nameMatcher.js";
import { buildShortcutIndex } from "../../resolver/resourceIndex.js";
import { HINT_LIMIT, type HandlerContext } from "../context.js";

const findBuiltin = (query: string, builtins: ReadonlyMap<string, string>): [string, string] | null => {
  const lowered = query.toLowerCase();
  for (const [name, commandLine] of builtins) {
    if (name === query || name.toLowerCase() === lowered) return [name, commandLine];
  }
  for (const [name, commandLine] of builtins) {
    const key = name.toLowerCase();
    if (key.includes(lowered) || lowered.includes(key)) return [name, commandLine];
  }
  return null;
};

/**
 * Builtin items win over shortcuts; the shortcut index is rebuilt from the
 * current roots on every call.
 */
export const openApp = async (name: string, ctx: HandlerContext): Promise<string> => {
  const query = name.trim();
  if (query.length === 0) return "✗ No application name given";

  const builtin = findBuiltin(query, ctx.builtinApps);
  if (builtin) {
    const [builtinName, commandLine] = builtin;
    const result = await ctx.os.open({ kind: "builtin", name: builtinName, commandLine });
    return `${result.ok ? "✓" : "✗"} ${result.message}`;
  }

  const candidates = await buildShortcutIndex(ctx.shortcutRoots(), ctx.onEvent);
  if (candidates.length === 0) {
    return "✗ No shortcuts or folders found; check the desktop and start menu locations";
  }

  const match = matchName(query, candidates, ctx.matcher);
  if (!match) {
    const hint = candidates
      .slice(0, HINT_LIMIT)
      .map((candidate) => candidate.key)
      .join(", ");
    const more = candidates.length > HINT_LIMIT ? ", ..." : "";
    return `✗ Nothing matches '${query}'\n  Available items include: ${hint}${more}`;
  }

  const result = await ctx.os.open({ kind: "path", path: match.path, isDirectory: match.isDirectory });
  return result.ok ? `✓ ${result.message} (${describeMatch(match)})` : `✗ ${result.message}`;
};
