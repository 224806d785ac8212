import { parseDirectives } from "../directives/parse.js";
import type { TaskDispatcher } from "../dispatch/dispatcher.js";
import type { LlmMessage, LlmProvider, ModelInfo } from "../llm/provider.js";
import type { AuditCollector } from "../runtime/audit.js";
import { ConversationHistory, formatHistorySummary } from "./history.js";
import { WARMUP_MESSAGE } from "./prompts.js";

export type DesktopAssistantOptions = {
  provider: LlmProvider;
  dispatcher: TaskDispatcher;
  systemPrompt: string;
  model?: string;
  maxHistory?: number;
  audit?: AuditCollector;
  now?: () => number;
};

export type WarmUpResult = {
  reply: string;
  durationMs: number;
};

export const joinReport = (reply: string, report: string): string =>
  report.length > 0 ? `${reply}\n\n${report}` : reply;

export class DesktopAssistant {
  private readonly provider: LlmProvider;
  private readonly dispatcher: TaskDispatcher;
  private readonly systemPrompt: string;
  private readonly history: ConversationHistory;
  private readonly audit?: AuditCollector;
  private readonly now: () => number;
  private model?: string;

  constructor(options: DesktopAssistantOptions) {
    this.provider = options.provider;
    this.dispatcher = options.dispatcher;
    this.systemPrompt = options.systemPrompt;
    this.history = new ConversationHistory(options.maxHistory ?? 20);
    this.audit = options.audit;
    this.now = options.now ?? Date.now;
    this.model = options.model;
  }

  get currentModel(): string | undefined {
    return this.model;
  }

  async listModels(): Promise<ModelInfo[]> {
    return this.provider.listModels();
  }

  /** Selects `name` when the server has it installed. */
  async selectModel(name: string): Promise<boolean> {
    const models = await this.provider.listModels();
    if (!models.some((model) => model.name === name)) return false;
    this.model = name;
    return true;
  }

  private requireModel(): string {
    if (!this.model) {
      throw new Error("No model selected");
    }
    return this.model;
  }

  private async finishTurn(input: string, reply: string): Promise<string> {
    this.history.append({ role: "assistant", content: reply });
    this.history.trim();

    const report = await this.dispatcher.dispatch(reply);
    this.audit?.recordTurn({
      input,
      reply,
      directives: parseDirectives(reply).map((directive) => directive.kind),
      report
    });
    return report;
  }

  /** One full turn: ask the model, run its directives, return reply plus report. */
  async processInput(input: string): Promise<string> {
    const model = this.requireModel();
    this.history.append({ role: "user", content: input });

    let reply: string;
    try {
      reply = await this.provider.completeText(this.history.all(), { model, system: this.systemPrompt });
    } catch (error) {
      this.history.discardPending();
      throw error;
    }

    return joinReport(reply, await this.finishTurn(input, reply));
  }

  /**
   * Streams reply chunks as they arrive. Directives run only after the reply
   * is complete; their report follows as a final `\n\n<report>` chunk.
   */
  async *processInputStream(input: string): AsyncIterable<string> {
    const model = this.requireModel();
    this.history.append({ role: "user", content: input });

    let reply = "";
    try {
      for await (const chunk of this.provider.stream(this.history.all(), { model, system: this.systemPrompt })) {
        reply += chunk;
        yield chunk;
      }
    } catch (error) {
      this.history.discardPending();
      throw error;
    }

    const report = await this.finishTurn(input, reply);
    if (report.length > 0) {
      yield `\n\n${report}`;
    }
  }

  /** Loads the model with the full system prompt. History is left untouched. */
  async warmUp(): Promise<WarmUpResult> {
    const model = this.requireModel();
    const started = this.now();
    const reply = await this.provider.completeText([{ role: "user", content: WARMUP_MESSAGE }], {
      model,
      system: this.systemPrompt
    });
    return { reply, durationMs: this.now() - started };
  }

  clearHistory(): string {
    this.history.clear();
    return "Conversation history cleared";
  }

  historySummary(): string {
    return formatHistorySummary(this.history.summary());
  }

  historyMessages(): LlmMessage[] {
    return this.history.all();
  }
}
