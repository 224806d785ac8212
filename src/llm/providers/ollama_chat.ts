import { z } from "zod";
import {
  BaseLlmProvider,
  withSystem,
  type LlmCallOptions,
  type LlmMessage,
  type LlmResponse,
  type ModelInfo
} from "../provider.js";

const tagsSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional()
      })
    )
    .default([])
});

const chatChunkSchema = z.object({
  model: z.string().optional(),
  message: z.object({ role: z.string().optional(), content: z.string().default("") }).optional(),
  done: z.boolean().default(false)
});

export type OllamaChatOptions = {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";

/** Each non-empty line is one JSON object; lines that fail to parse are skipped. */
export const parseChatLine = (line: string): z.infer<typeof chatChunkSchema> | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const parsed = chatChunkSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
};

export class OllamaChatProvider extends BaseLlmProvider {
  name = "ollama_chat";
  private readonly baseUrl: string;
  private readonly defaultModel?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaChatOptions = {}) {
    super();
    this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, "");
    this.defaultModel = options.model;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private resolveModel(opts?: LlmCallOptions): string {
    const model = opts?.model ?? this.defaultModel;
    if (!model) {
      throw new Error("No model selected for the Ollama chat provider");
    }
    return model;
  }

  private async request(path: string, init: RequestInit, controller: AbortController): Promise<Response> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Ollama API error ${response.status} on ${path}: ${text}`);
    }
    return response;
  }

  /** Aborts on the caller's signal or after the configured timeout; `release` clears both. */
  private abortScope(signal?: AbortSignal): { controller: AbortController; release: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`Ollama request timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    const forward = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forward, { once: true });
    return {
      controller,
      release: () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", forward);
      }
    };
  }

  private chatBody(messages: LlmMessage[], opts: LlmCallOptions | undefined, stream: boolean): string {
    return JSON.stringify({
      model: this.resolveModel(opts),
      messages: withSystem(messages, opts?.system),
      stream,
      ...(opts?.temperature !== undefined ? { options: { temperature: opts.temperature } } : {})
    });
  }

  async listModels(): Promise<ModelInfo[]> {
    const { controller, release } = this.abortScope();
    try {
      const response = await this.request("/api/tags", { method: "GET" }, controller);
      const parsed = tagsSchema.parse(await response.json());
      return parsed.models.map((model) => ({ name: model.name, sizeBytes: model.size, modifiedAt: model.modified_at }));
    } finally {
      release();
    }
  }

  async complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse> {
    const body = this.chatBody(messages, opts, false);
    const { controller, release } = this.abortScope(opts?.signal);
    try {
      const response = await this.request(
        "/api/chat",
        { method: "POST", headers: { "Content-Type": "application/json" }, body },
        controller
      );
      const raw: unknown = await response.json();
      const parsed = chatChunkSchema.parse(raw);
      return { text: parsed.message?.content ?? "", model: parsed.model ?? this.resolveModel(opts), raw };
    } finally {
      release();
    }
  }

  override async *stream(messages: LlmMessage[], opts?: LlmCallOptions): AsyncIterable<string> {
    const body = this.chatBody(messages, opts, true);
    const { controller, release } = this.abortScope(opts?.signal);
    try {
      const response = await this.request(
        "/api/chat",
        { method: "POST", headers: { "Content-Type": "application/json" }, body },
        controller
      );
      if (!response.body) {
        throw new Error("Ollama returned an empty stream");
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";
      try {
        for (;;) {
          const { done, value } = await reader.read();
          buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

          const lines = buffer.split("\n");
          buffer = done ? "" : (lines.pop() ?? "");
          for (const line of lines) {
            const chunk = parseChatLine(line);
            if (!chunk) continue;
            const content = chunk.message?.content ?? "";
            if (content.length > 0) yield content;
            if (chunk.done) return;
          }
          if (done) return;
        }
      } finally {
        await reader.cancel();
      }
    } finally {
      release();
    }
  }
}
