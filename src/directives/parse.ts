import {
  CLOSE_TAG,
  DIRECTIVE_KINDS,
  MULTILINE_KINDS,
  PAYLOADLESS_KINDS,
  emptyTag,
  openTag,
  type Directive,
  type DirectiveKind
} from "./types.js";

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// A payload stops at the first close tag and may not run into another opening tag,
// so an unterminated tag is dropped instead of swallowing the next directive.
const patternFor = (kind: DirectiveKind): RegExp => {
  const body = MULTILINE_KINDS.has(kind) ? "(?:(?!\\[TASK:)[\\s\\S])*?" : "(?:(?!\\[TASK:)[^\\r\\n])*?";
  return new RegExp(`${escapeRegex(openTag(kind))}(${body})${escapeRegex(CLOSE_TAG)}`, "g");
};

const PATTERNS = new Map<DirectiveKind, RegExp>(DIRECTIVE_KINDS.map((kind) => [kind, patternFor(kind)]));

const extractKind = (text: string, kind: DirectiveKind): Directive[] => {
  if (PAYLOADLESS_KINDS.has(kind)) {
    const position = text.indexOf(emptyTag(kind));
    return position >= 0 ? [{ kind, payload: "", position }] : [];
  }

  const pattern = PATTERNS.get(kind);
  if (!pattern) return [];

  const out: Directive[] = [];
  for (const match of text.matchAll(pattern)) {
    out.push({ kind, payload: (match[1] ?? "").trim(), position: match.index ?? 0 });
  }
  return out;
};

/**
 * Extract every directive tag from a model reply. Kinds are extracted
 * independently and returned grouped in handling order; within a kind the
 * document order is kept.
 */
export const parseDirectives = (text: string): Directive[] =>
  DIRECTIVE_KINDS.flatMap((kind) => extractKind(text, kind)).map((directive) => Object.freeze(directive));

export const groupByKind = (directives: readonly Directive[]): Map<DirectiveKind, Directive[]> => {
  const groups = new Map<DirectiveKind, Directive[]>();
  directives.forEach((directive) => {
    const bucket = groups.get(directive.kind) ?? [];
    bucket.push(directive);
    groups.set(directive.kind, bucket);
  });
  return groups;
};

/** `path|content` where the content keeps every later `|`. */
export const splitWritePayload = (payload: string): { path: string; content: string } | null => {
  const idx = payload.indexOf("|");
  if (idx < 0) return null;
  const path = payload.slice(0, idx).trim();
  if (path.length === 0) return null;
  return { path, content: payload.slice(idx + 1).trim() };
};
