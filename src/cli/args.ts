import type { ModelInfo } from "../llm/provider.js";

export type CliOptions = {
  model?: string;
  stream: boolean;
  warmup: boolean;
};

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(["quit", "exit", "退出", "再见"]);
export const CLEAR_COMMANDS: ReadonlySet<string> = new Set(["clear", "清空", "清空历史"]);
export const HISTORY_COMMANDS: ReadonlySet<string> = new Set(["history", "历史", "对话历史"]);

export type ReplCommand = "exit" | "clear" | "history" | "empty" | "turn";

export const classifyInput = (input: string): ReplCommand => {
  const lowered = input.trim().toLowerCase();
  if (lowered.length === 0) return "empty";
  if (EXIT_COMMANDS.has(lowered)) return "exit";
  if (CLEAR_COMMANDS.has(lowered)) return "clear";
  if (HISTORY_COMMANDS.has(lowered)) return "history";
  return "turn";
};

export const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = { stream: true, warmup: true };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--model") {
      options.model = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg?.startsWith("--model=")) {
      options.model = arg.slice("--model=".length);
      continue;
    }
    if (arg === "--no-stream") {
      options.stream = false;
      continue;
    }
    if (arg === "--no-warmup") {
      options.warmup = false;
    }
  }
  return options;
};

/** A 1-based number from the list, or an exact model name. */
export const resolveModelChoice = (answer: string, models: ModelInfo[]): string | null => {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    return models[Number(trimmed) - 1]?.name ?? null;
  }
  return models.find((model) => model.name === trimmed)?.name ?? null;
};
