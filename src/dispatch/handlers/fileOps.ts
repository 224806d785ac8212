import type { Directive } from "../../directives/types.js";
import { WRITE_FILE_ACTION } from "../../fileops/actions.js";
import { executeFileOperations } from "../../fileops/executor.js";
import { planFileOperations } from "../../fileops/planner.js";
import type { HandlerContext } from "../context.js";

/**
 * FILE_OP and WRITE_FILE directives of one reply form a single batch so the
 * operator confirms once. The batch follows the order of the tags in the reply;
 * WRITE_FILE payloads become `write_file|path|content`.
 */
export const toBatchPayloads = (directives: readonly Directive[]): string[] =>
  [...directives]
    .sort((left, right) => left.position - right.position)
    .map((directive) =>
      directive.kind === "WRITE_FILE" ? `${WRITE_FILE_ACTION}|${directive.payload}` : directive.payload
    );

export const runFileBatch = async (directives: readonly Directive[], ctx: HandlerContext): Promise<string> => {
  const { plans, skipped } = await planFileOperations(toBatchPayloads(directives), {
    paths: ctx.paths,
    copySuffix: ctx.copySuffix,
    matcher: ctx.matcher,
    onEvent: ctx.onEvent
  });

  const lines = skipped.map((entry) => `✗ Skipped '${entry.payload}': ${entry.reason}`);
  const batch = await executeFileOperations(plans, { console: ctx.console, onEvent: ctx.onEvent });
  lines.push(batch.report);
  return lines.join("\n");
};
