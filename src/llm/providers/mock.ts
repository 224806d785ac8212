import { BaseLlmProvider, type LlmCallOptions, type LlmMessage, type LlmResponse, type ModelInfo } from "../provider.js";

export type MockCall = { messages: LlmMessage[]; opts?: LlmCallOptions };

/** Replays scripted replies in order and records every request. */
export class MockProvider extends BaseLlmProvider {
  name = "mock";
  readonly calls: MockCall[] = [];
  private readonly outputs: string[];
  private readonly models: ModelInfo[];

  constructor(outputs: string[], models: string[] = ["mock-model"]) {
    super();
    this.outputs = [...outputs];
    this.models = models.map((name) => ({ name }));
  }

  async listModels(): Promise<ModelInfo[]> {
    return [...this.models];
  }

  async complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse> {
    this.calls.push({ messages: [...messages], opts });
    const text = this.outputs.shift();
    if (text === undefined) {
      throw new Error("MockProvider outputs exhausted");
    }
    return { text, model: opts?.model ?? this.models[0]?.name ?? "mock-model", raw: { text } };
  }

  /** Splits the scripted reply on whitespace boundaries to exercise chunked rendering. */
  override async *stream(messages: LlmMessage[], opts?: LlmCallOptions): AsyncIterable<string> {
    const { text } = await this.complete(messages, opts);
    for (const chunk of text.match(/\S+\s*|\s+/g) ?? []) {
      yield chunk;
    }
  }
}
