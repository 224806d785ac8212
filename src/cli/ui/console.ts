import chalk from "chalk";
import ora from "ora";
import logUpdate from "log-update";
import boxen from "boxen";
import prompts from "prompts";
import type { OperatorConsole } from "../../runtime/console.js";
import type { AssistantEvent } from "../../runtime/events.js";

const truncate = (value: string, max = 200): string => (value.length > max ? `${value.slice(0, max)}...` : value);

const colorLine = (line: string): string => {
  if (line.startsWith("✓")) return chalk.green(line);
  if (line.startsWith("✗")) return chalk.red(line);
  if (line.startsWith("Batch complete")) return chalk.bold(line);
  return line;
};

export type TerminalUI = {
  console: OperatorConsole;
  onEvent: (event: AssistantEvent) => void;
  banner: (lines: string[]) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Next operator line, or null when the prompt was cancelled. */
  readInput: (label: string) => Promise<string | null>;
  /** Render chunks live; returns the full text. */
  renderStream: (chunks: AsyncIterable<string>, label: string) => Promise<string>;
  spin: <T>(text: string, task: () => Promise<T>) => Promise<T>;
};

export const createTerminalUI = (): TerminalUI => {
  let activeSpinner: ReturnType<typeof ora> | undefined;
  // Streamed text not yet persisted by logUpdate.done().
  let live = "";

  const settle = (): void => {
    if (activeSpinner?.isSpinning) {
      activeSpinner.stop();
    }
    activeSpinner = undefined;
    if (live.length > 0) {
      logUpdate.done();
      live = "";
    }
  };

  const operatorConsole: OperatorConsole = {
    print: (lines) => {
      settle();
      lines.forEach((line) => console.log(colorLine(line)));
    },
    ask: async (question) => {
      settle();
      const answer = await prompts({ type: "text", name: "text", message: chalk.yellow(question) });
      return String(answer.text ?? "").trim();
    }
  };

  const onEvent = (event: AssistantEvent): void => {
    switch (event.type) {
      case "index_start":
        if (event.scope === "shortcuts") {
          settle();
          activeSpinner = ora("Scanning shortcuts").start();
        }
        break;
      case "index_built":
        if (event.scope === "shortcuts" && activeSpinner?.isSpinning) {
          activeSpinner.succeed(`Indexed ${event.count} shortcuts and folders`);
          activeSpinner = undefined;
        }
        break;
      case "index_root_failed":
        settle();
        console.log(chalk.gray(`  skipped ${event.root}: ${truncate(event.message)}`));
        break;
      case "source_resolved":
        settle();
        console.log(chalk.yellow(`  ${event.literal} not found; using ${event.resolved} (${event.matchKind})`));
        break;
      case "source_unresolved":
        settle();
        console.log(
          chalk.yellow(`  ${event.literal} not found${event.siblings.length > 0 ? `; nearby: ${event.siblings.join(", ")}` : ""}`)
        );
        break;
      case "directive_start":
        settle();
        console.log(chalk.cyan(`▶ ${event.kind}${event.count > 1 ? ` x${event.count}` : ""}`));
        break;
      case "directive_end":
        if (!event.ok) {
          settle();
          console.log(chalk.red(`✗ ${event.kind} reported failures`));
        }
        break;
      case "batch_done":
        settle();
        if (event.cancelled) {
          console.log(chalk.yellow("Batch cancelled"));
        } else {
          const color = event.successCount === event.total ? chalk.green : chalk.yellow;
          console.log(color(`Batch finished: ${event.successCount}/${event.total}`));
        }
        break;
      default: {
        const exhaustive: never = event;
        throw new Error(`Unknown event ${JSON.stringify(exhaustive)}`);
      }
    }
  };

  const banner = (lines: string[]): void => {
    settle();
    console.log(
      boxen(lines.join("\n"), {
        borderColor: "cyan",
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        margin: { top: 0, bottom: 1 },
        title: "deskpilot",
        titleAlignment: "left"
      })
    );
  };

  const readInput = async (label: string): Promise<string | null> => {
    settle();
    let cancelled = false;
    const answer = await prompts(
      { type: "text", name: "text", message: chalk.bold(label) },
      {
        onCancel: () => {
          cancelled = true;
        }
      }
    );
    return cancelled ? null : String(answer.text ?? "").trim();
  };

  const renderStream = async (chunks: AsyncIterable<string>, label: string): Promise<string> => {
    settle();
    let full = "";
    for await (const chunk of chunks) {
      full += chunk;
      live += chunk;
      // Confirmation prompts may persist earlier output; only the remainder is redrawn.
      logUpdate(`${live === full ? chalk.bold(label) : ""}${live}`);
    }
    if (live.length > 0) {
      logUpdate.done();
      live = "";
    }
    return full;
  };

  const spin = async <T>(text: string, task: () => Promise<T>): Promise<T> => {
    settle();
    const spinner = ora(text).start();
    try {
      const result = await task();
      spinner.succeed();
      return result;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  };

  return {
    console: operatorConsole,
    onEvent,
    banner,
    info: (message) => {
      settle();
      console.log(chalk.cyan(message));
    },
    warn: (message) => {
      settle();
      console.log(chalk.yellow(message));
    },
    error: (message) => {
      settle();
      console.error(chalk.red(message));
    },
    readInput,
    renderStream,
    spin
  };
};
