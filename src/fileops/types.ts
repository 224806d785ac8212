import type { MatchKind } from "../resolver/types.js";

export type FileOpAction = "create_file" | "create_dir" | "delete" | "rename" | "copy" | "move" | "write_file";

/** Set when fuzzy resolution replaced a source path that did not exist. */
export type SourceResolution = {
  literal: string;
  matchKind: MatchKind;
};

export type FileOperationPlan = Readonly<
  | { action: "create_file"; parentDir: string; sourcePath: string }
  | { action: "create_dir"; parentDir: string; sourcePath: string }
  | { action: "delete"; sourcePath: string; resolution?: SourceResolution }
  | { action: "rename"; sourcePath: string; targetPath: string; resolution?: SourceResolution }
  | { action: "copy"; sourcePath: string; targetPath: string; resolution?: SourceResolution }
  | { action: "move"; sourcePath: string; targetPath: string; resolution?: SourceResolution }
  | { action: "write_file"; sourcePath: string; content: string }
>;

export type SkippedPayload = {
  payload: string;
  reason: string;
};

export type PlanningResult = {
  plans: FileOperationPlan[];
  skipped: SkippedPayload[];
};

export type OperationOutcome = {
  /** Index into the plan list; -1 for the batch-level cancellation outcome. */
  planIndex: number;
  success: boolean;
  message: string;
};

export type BatchResult = {
  outcomes: OperationOutcome[];
  successCount: number;
  total: number;
  cancelled: boolean;
  report: string;
};
