export type CandidateOrigin = "desktop" | "start-menu" | "directory";

export type Candidate = {
  key: string;
  path: string;
  isDirectory: boolean;
  origin: CandidateOrigin;
};

export type MatchKind = "Exact" | "Contains" | "StartsWith" | "Keyword" | "CharOverlap" | "Substring";

export type MatchResult = {
  path: string;
  key: string;
  isDirectory: boolean;
  matchKind: MatchKind;
  score: number;
};

export type MatcherOptions = {
  /** Minimum score the ranked tier must reach. */
  rankedThreshold: number;
  /** Minimum distinct-character overlap ratio. */
  charOverlapThreshold: number;
  /** Shortest query window the substring tier looks for. */
  minWindow: number;
  stopWords: readonly string[];
  /** Drop a trailing file extension before keyword comparison. */
  keywordStripsExtension: boolean;
};
