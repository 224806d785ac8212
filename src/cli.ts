#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev`
 * - `npm run dev -- --model qwen2.5:7b`
 * - `npm run dev -- --no-stream --no-warmup`
 *
 * Environment (or `.env`):
 * - `OLLAMA_BASE_URL=http://localhost:11434`
 * - `DESKPILOT_MODEL=qwen2.5:7b`
 * - `DESKPILOT_COPY_SUFFIX=_副本`
 * - `DESKPILOT_AUDIT_DIR=./logs`
 */
import process from "node:process";
import { ZodError } from "zod";
import { DesktopAssistant } from "./assistant/assistant.js";
import { buildSystemPrompt } from "./assistant/prompts.js";
import { classifyInput, parseArgs, resolveModelChoice, type CliOptions } from "./cli/args.js";
import { createTerminalUI, type TerminalUI } from "./cli/ui/console.js";
import { loadEnvFile } from "./config/loadEnv.js";
import { loadSettings, type Settings } from "./config/settings.js";
import { createTaskDispatcher } from "./dispatch/dispatcher.js";
import { errorMessage } from "./fileops/errors.js";
import { getProviderFromSettings } from "./llm/index.js";
import type { ModelInfo } from "./llm/provider.js";
import { createOsActions } from "./os/actions.js";
import { AuditCollector } from "./runtime/audit.js";

const printValidationErrors = (ui: TerminalUI, error: ZodError): void => {
  ui.error("Configuration validation failed:");
  error.issues.forEach((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    ui.error(`- ${path}: ${issue.message}`);
  });
};

const chooseModel = async (
  ui: TerminalUI,
  models: ModelInfo[],
  preferred: string | undefined
): Promise<string | null> => {
  if (preferred) {
    if (models.some((model) => model.name === preferred)) return preferred;
    ui.warn(`Model '${preferred}' is not installed`);
  }

  ui.console.print(["Available models:", ...models.map((model, index) => `  ${index + 1}. ${model.name}`)]);
  for (;;) {
    const answer = await ui.readInput(`Choose a model (1-${models.length}) or type its name`);
    if (answer === null) return null;
    const choice = resolveModelChoice(answer, models);
    if (choice) return choice;
    ui.warn("No such model; try again");
  }
};

const warmUp = async (ui: TerminalUI, assistant: DesktopAssistant): Promise<void> => {
  try {
    const { reply, durationMs } = await ui.spin("Loading the model with the system prompt", () => assistant.warmUp());
    ui.info(`Model ready in ${(durationMs / 1000).toFixed(1)}s`);
    ui.console.print([`  ${reply.length > 100 ? `${reply.slice(0, 80)}...` : reply}`]);
  } catch (error) {
    ui.warn(`Warm-up failed; continuing anyway: ${errorMessage(error)}`);
  }
};

const runTurn = async (ui: TerminalUI, assistant: DesktopAssistant, input: string, stream: boolean): Promise<void> => {
  if (stream) {
    await ui.renderStream(assistant.processInputStream(input), "Assistant: ");
    return;
  }
  const reply = await ui.spin("Thinking", () => assistant.processInput(input));
  ui.console.print(["Assistant:", ...reply.split("\n")]);
};

const repl = async (ui: TerminalUI, assistant: DesktopAssistant, options: CliOptions, audit?: AuditCollector): Promise<void> => {
  for (;;) {
    const input = await ui.readInput("You");
    if (input === null) return;

    switch (classifyInput(input)) {
      case "empty":
        continue;
      case "exit":
        return;
      case "clear":
        ui.info(assistant.clearHistory());
        continue;
      case "history":
        ui.console.print(assistant.historySummary().split("\n"));
        continue;
      case "turn":
        try {
          await runTurn(ui, assistant, input, options.stream);
        } catch (error) {
          audit?.recordError(errorMessage(error));
          ui.error(`Error: ${errorMessage(error)}`);
        }
        continue;
    }
  }
};

const run = async (ui: TerminalUI, options: CliOptions, settings: Settings): Promise<void> => {
  const provider = getProviderFromSettings(settings);
  let models: ModelInfo[] = [];
  try {
    models = await provider.listModels();
  } catch (error) {
    ui.error(`Cannot reach Ollama at ${settings.ollamaBaseUrl}: ${errorMessage(error)}`);
  }
  if (models.length === 0) {
    ui.error("No models available. Start Ollama and pull at least one model.");
    process.exitCode = 1;
    return;
  }

  const model = await chooseModel(ui, models, options.model ?? settings.model);
  if (!model) return;

  const audit = settings.auditDir ? new AuditCollector() : undefined;
  audit?.recordStart({ model, platform: process.platform });

  const dispatcher = createTaskDispatcher({
    console: ui.console,
    os: createOsActions(),
    copySuffix: settings.copySuffix,
    matcher: settings.matcher,
    onEvent: ui.onEvent
  });
  const assistant = new DesktopAssistant({
    provider,
    dispatcher,
    model,
    systemPrompt: buildSystemPrompt({ platform: process.platform, copySuffix: settings.copySuffix }),
    maxHistory: settings.maxHistory,
    audit
  });

  if (options.warmup) {
    await warmUp(ui, assistant);
  }

  ui.banner([
    `Model: ${model}`,
    "Ask me to open apps or work with files.",
    "`clear` resets the conversation, `history` shows a summary, `quit` exits."
  ]);

  try {
    await repl(ui, assistant, options, audit);
  } finally {
    if (audit && settings.auditDir) {
      ui.info(`Audit log: ${await audit.flush(settings.auditDir)}`);
    }
  }
  ui.info("Bye!");
};

const main = async (): Promise<void> => {
  const ui = createTerminalUI();
  loadEnvFile();
  const options = parseArgs(process.argv.slice(2));

  try {
    await run(ui, options, loadSettings());
  } catch (error) {
    if (error instanceof ZodError) {
      printValidationErrors(ui, error);
      process.exitCode = 1;
      return;
    }

    if (error instanceof Error) {
      ui.error(error.message);
      process.exitCode = 2;
      return;
    }

    ui.error("Unknown error");
    process.exitCode = 2;
  }
};

void main();
