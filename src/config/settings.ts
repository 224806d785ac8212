import { z } from "zod";
import { DEFAULT_STOP_WORDS } from "../resolver/tiers.js";
import type { MatcherOptions } from "../resolver/types.js";

// Blank variables in a .env file count as unset.
const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const envSchema = z.object({
  OLLAMA_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("http://localhost:11434")),
  DESKPILOT_MODEL: z.preprocess(blankToUndefined, z.string().trim().optional()),
  DESKPILOT_MAX_HISTORY: z.preprocess(blankToUndefined, z.coerce.number().int().min(2).default(20)),
  DESKPILOT_MATCH_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0.2)),
  DESKPILOT_CHAR_OVERLAP_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0.4)),
  DESKPILOT_STOP_WORDS: z.preprocess(blankToUndefined, z.string().optional()),
  DESKPILOT_COPY_SUFFIX: z.preprocess(blankToUndefined, z.string().min(1).default("_copy")),
  DESKPILOT_AUDIT_DIR: z.preprocess(blankToUndefined, z.string().trim().optional()),
  DESKPILOT_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(120_000))
});

export type Settings = {
  ollamaBaseUrl: string;
  model?: string;
  maxHistory: number;
  matcher: Pick<MatcherOptions, "rankedThreshold" | "charOverlapThreshold" | "stopWords">;
  copySuffix: string;
  auditDir?: string;
  timeoutMs: number;
};

/** Throws a ZodError listing every invalid variable. */
export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = envSchema.parse(env);
  const stopWords = parsed.DESKPILOT_STOP_WORDS
    ? parsed.DESKPILOT_STOP_WORDS.split(",")
        .map((word) => word.trim().toLowerCase())
        .filter((word) => word.length > 0)
    : [...DEFAULT_STOP_WORDS];

  return {
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    model: parsed.DESKPILOT_MODEL,
    maxHistory: parsed.DESKPILOT_MAX_HISTORY,
    matcher: {
      rankedThreshold: parsed.DESKPILOT_MATCH_THRESHOLD,
      charOverlapThreshold: parsed.DESKPILOT_CHAR_OVERLAP_THRESHOLD,
      stopWords
    },
    copySuffix: parsed.DESKPILOT_COPY_SUFFIX,
    auditDir: parsed.DESKPILOT_AUDIT_DIR,
    timeoutMs: parsed.DESKPILOT_TIMEOUT_MS
  };
};
