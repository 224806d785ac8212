import type { PathContext } from "../fileops/paths.js";
import type { OsActions } from "../os/actions.js";
import type { ShortcutRoot } from "../resolver/roots.js";
import type { MatcherOptions } from "../resolver/types.js";
import type { OperatorConsole } from "../runtime/console.js";
import type { EventSink } from "../runtime/events.js";

export type HandlerContext = {
  console: OperatorConsole;
  os: OsActions;
  /** Builtin item name -> command line for the current platform. */
  builtinApps: ReadonlyMap<string, string>;
  /** Re-evaluated on every request so the index reflects the current desktop. */
  shortcutRoots: () => ShortcutRoot[];
  paths: PathContext;
  platform: NodeJS.Platform;
  copySuffix: string;
  matcher: Partial<MatcherOptions>;
  onEvent: EventSink;
  now: () => Date;
};

export const LIST_DIR_LIMIT = 20;
export const SEARCH_LIMIT = 30;
export const HINT_LIMIT = 10;
