import type { Settings } from "../config/settings.js";
import type { LlmProvider } from "./provider.js";
import { OllamaChatProvider } from "./providers/ollama_chat.js";

export const getProviderFromSettings = (settings: Settings, fetchImpl?: typeof fetch): LlmProvider =>
  new OllamaChatProvider({
    baseUrl: settings.ollamaBaseUrl,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
    fetchImpl
  });
