import { extname } from "node:path";
import type { MatchKind, MatcherOptions } from "./types.js";

export const DEFAULT_STOP_WORDS: readonly string[] = ["ai", "软件", "应用", "文件夹", "服务站", "程序", "工具"];

/** Stop words for directory entries; ordinary file names keep letters like `ai`. */
export const FILE_STOP_WORDS: readonly string[] = ["应用", "软件", "程序", "工具"];

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  rankedThreshold: 0.2,
  charOverlapThreshold: 0.4,
  minWindow: 2,
  stopWords: DEFAULT_STOP_WORDS,
  keywordStripsExtension: false
};

export type TierScore = { kind: MatchKind; score: number };

export type Scorer = (query: string, key: string, options: MatcherOptions) => TierScore | null;

/**
 * One step of the resolution order.
 * - `first`: the first candidate whose score reaches `threshold` wins.
 * - `best`: the strictly highest score wins (ties keep the earlier candidate),
 *   and only if it reaches `threshold`.
 * Scorers inside a tier form an else-if chain: the first non-null score counts.
 */
export type MatchTier = {
  name: string;
  mode: "first" | "best";
  threshold: (options: MatcherOptions) => number;
  scorers: Scorer[];
};

/** Code-point length, so CJK and astral characters count once. */
export const charLength = (value: string): number => Array.from(value).length;

const ratio = (shorter: string, longer: string): number => {
  const longerLength = charLength(longer);
  return longerLength === 0 ? 0 : charLength(shorter) / longerLength;
};

export const stripKeywords = (value: string, options: MatcherOptions): string => {
  let out = value;
  if (options.keywordStripsExtension) {
    const ext = extname(out);
    if (ext.length > 0 && ext.length < out.length) {
      out = out.slice(0, -ext.length);
    }
  }
  for (const word of options.stopWords) {
    out = out.split(word).join("");
  }
  return out.trim();
};

export const exactScorer: Scorer = (query, key) => (query === key ? { kind: "Exact", score: 1 } : null);

export const containsScorer: Scorer = (query, key) =>
  key.includes(query) ? { kind: "Contains", score: ratio(query, key) } : null;

export const reverseContainsScorer: Scorer = (query, key) =>
  query.includes(key) ? { kind: "Contains", score: ratio(key, query) } : null;

export const startsWithScorer: Scorer = (query, key) => {
  if (key.startsWith(query)) return { kind: "StartsWith", score: ratio(query, key) };
  if (query.startsWith(key)) return { kind: "StartsWith", score: ratio(key, query) };
  return null;
};

export const keywordScorer: Scorer = (query, key, options) => {
  const left = stripKeywords(query, options);
  const right = stripKeywords(key, options);
  if (left.length === 0 || right.length === 0) return null;
  if (!left.includes(right) && !right.includes(left)) return null;
  const [shorter, longer] = charLength(left) <= charLength(right) ? [left, right] : [right, left];
  return { kind: "Keyword", score: ratio(shorter, longer) };
};

export const charOverlapScorer: Scorer = (query, key) => {
  const queryChars = new Set(Array.from(query));
  const keyChars = new Set(Array.from(key));
  let common = 0;
  queryChars.forEach((char) => {
    if (keyChars.has(char)) common += 1;
  });
  if (common === 0) return null;
  return { kind: "CharOverlap", score: common / Math.max(queryChars.size, keyChars.size) };
};

// Any longer shared substring contains a shared window of the minimum length,
// so checking windows of exactly `minWindow` characters is enough.
export const substringScorer: Scorer = (query, key, options) => {
  const chars = Array.from(query);
  const size = Math.max(1, options.minWindow);
  for (let start = 0; start + size <= chars.length; start += 1) {
    const window = chars.slice(start, start + size).join("");
    if (key.includes(window)) {
      return { kind: "Substring", score: size / Math.max(chars.length, charLength(key)) };
    }
  }
  return null;
};

export const DEFAULT_TIERS: readonly MatchTier[] = [
  { name: "exact", mode: "first", threshold: () => 1, scorers: [exactScorer] },
  {
    name: "ranked",
    mode: "best",
    threshold: (options) => options.rankedThreshold,
    scorers: [containsScorer, reverseContainsScorer, startsWithScorer, keywordScorer]
  },
  {
    name: "char-overlap",
    mode: "first",
    threshold: (options) => options.charOverlapThreshold,
    scorers: [charOverlapScorer]
  },
  { name: "substring", mode: "first", threshold: () => 0, scorers: [substringScorer] }
];
