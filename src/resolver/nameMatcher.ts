import { DEFAULT_MATCHER_OPTIONS, DEFAULT_TIERS, type MatchTier, type TierScore } from "./tiers.js";
import type { Candidate, MatchResult, MatcherOptions } from "./types.js";

const normalize = (value: string): string => value.trim().toLowerCase();

const scoreCandidate = (tier: MatchTier, query: string, key: string, options: MatcherOptions): TierScore | null => {
  for (const scorer of tier.scorers) {
    const scored = scorer(query, key, options);
    if (scored) return scored;
  }
  return null;
};

const toResult = (candidate: Candidate, scored: TierScore): MatchResult => ({
  path: candidate.path,
  key: candidate.key,
  isDirectory: candidate.isDirectory,
  matchKind: scored.kind,
  score: scored.score
});

const runTier = (
  tier: MatchTier,
  query: string,
  candidates: readonly Candidate[],
  options: MatcherOptions
): MatchResult | null => {
  const threshold = tier.threshold(options);

  if (tier.mode === "first") {
    for (const candidate of candidates) {
      const scored = scoreCandidate(tier, query, normalize(candidate.key), options);
      if (scored && scored.score >= threshold) return toResult(candidate, scored);
    }
    return null;
  }

  let best: { candidate: Candidate; scored: TierScore } | undefined;
  for (const candidate of candidates) {
    const scored = scoreCandidate(tier, query, normalize(candidate.key), options);
    if (!scored || scored.score <= 0) continue;
    if (!best || scored.score > best.scored.score) {
      best = { candidate, scored };
    }
  }
  return best && best.scored.score >= threshold ? toResult(best.candidate, best.scored) : null;
};

/**
 * Resolve `query` to a single candidate. Tiers run from most to least precise
 * and the first tier with a hit decides; within a tier, earlier candidates win ties.
 */
export const matchName = (
  query: string,
  candidates: Iterable<Candidate>,
  options: Partial<MatcherOptions> = {},
  tiers: readonly MatchTier[] = DEFAULT_TIERS
): MatchResult | null => {
  const normalizedQuery = normalize(query);
  const list = Array.from(candidates);
  if (normalizedQuery.length === 0 || list.length === 0) return null;

  const merged: MatcherOptions = { ...DEFAULT_MATCHER_OPTIONS, ...options };
  for (const tier of tiers) {
    const result = runTier(tier, normalizedQuery, list, merged);
    if (result) return result;
  }
  return null;
};

export const describeMatch = (result: MatchResult): string =>
  `${result.matchKind} match on "${result.key}" (${result.isDirectory ? "folder" : "item"}, score ${result.score.toFixed(2)})`;
