export type ChatRole = "system" | "user" | "assistant";

export type LlmMessage = { role: ChatRole; content: string };

export type LlmCallOptions = {
  model?: string;
  /** Sent as a leading system message. */
  system?: string;
  temperature?: number;
  signal?: AbortSignal;
};

export type LlmResponse = {
  text: string;
  model: string;
  raw: unknown;
};

export type ModelInfo = {
  name: string;
  sizeBytes?: number;
  modifiedAt?: string;
};

export interface LlmProvider {
  name: string;
  listModels(): Promise<ModelInfo[]>;
  complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse>;
  completeText(messages: LlmMessage[], opts?: LlmCallOptions): Promise<string>;
  /** Incremental text chunks; the concatenation equals the full reply. */
  stream(messages: LlmMessage[], opts?: LlmCallOptions): AsyncIterable<string>;
}

export const withSystem = (messages: LlmMessage[], system?: string): LlmMessage[] =>
  system && system.length > 0 ? [{ role: "system", content: system }, ...messages] : [...messages];

export abstract class BaseLlmProvider implements LlmProvider {
  abstract name: string;
  abstract listModels(): Promise<ModelInfo[]>;
  abstract complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse>;

  async completeText(messages: LlmMessage[], opts?: LlmCallOptions): Promise<string> {
    const response = await this.complete(messages, opts);
    return response.text;
  }

  /** Providers without a streaming endpoint yield the whole reply as one chunk. */
  async *stream(messages: LlmMessage[], opts?: LlmCallOptions): AsyncIterable<string> {
    yield await this.completeText(messages, opts);
  }
}
