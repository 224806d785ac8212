import type { DirectiveKind } from "../directives/types.js";
import type { MatchKind } from "../resolver/types.js";

export type AssistantEvent =
  | { type: "index_start"; scope: "shortcuts" | "directory"; root?: string }
  | { type: "index_root_failed"; root: string; message: string }
  | { type: "index_built"; scope: "shortcuts" | "directory"; count: number }
  | { type: "source_resolved"; literal: string; resolved: string; matchKind: MatchKind }
  | { type: "source_unresolved"; literal: string; siblings: string[] }
  | { type: "directive_start"; kind: DirectiveKind; count: number }
  | { type: "directive_end"; kind: DirectiveKind; ok: boolean }
  | { type: "batch_done"; successCount: number; total: number; cancelled: boolean };

export type EventSink = (event: AssistantEvent) => void;

export const noopSink: EventSink = () => undefined;
