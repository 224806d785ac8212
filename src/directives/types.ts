/** Handling order of directive kinds; reports follow this order, not emission order. */
export const DIRECTIVE_KINDS = [
  "OPEN_APP",
  "SYSTEM_INFO",
  "LIST_DIR",
  "POWER_ACTION",
  "SEARCH_APPS",
  "LIST_SHORTCUTS",
  "FILE_OP",
  "WRITE_FILE",
  "CLEAN_SYSTEM",
  "SYSTEM_CONTROL"
] as const;

export type DirectiveKind = (typeof DIRECTIVE_KINDS)[number];

/** Kinds that never carry a payload and are recognised by their empty tag form. */
export const PAYLOADLESS_KINDS: ReadonlySet<DirectiveKind> = new Set<DirectiveKind>([
  "SYSTEM_INFO",
  "LIST_SHORTCUTS",
  "CLEAN_SYSTEM"
]);

/** Kinds whose payload may span several lines. */
export const MULTILINE_KINDS: ReadonlySet<DirectiveKind> = new Set<DirectiveKind>(["WRITE_FILE"]);

export type Directive = Readonly<{
  kind: DirectiveKind;
  payload: string;
  /** Offset of the opening tag in the source text. */
  position: number;
}>;

export const CLOSE_TAG = "[/TASK]";

export const openTag = (kind: DirectiveKind): string => `[TASK:${kind}]`;

export const emptyTag = (kind: DirectiveKind): string => `${openTag(kind)}${CLOSE_TAG}`;
