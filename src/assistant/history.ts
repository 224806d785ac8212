import type { LlmMessage } from "../llm/provider.js";

export type HistorySummary = {
  user: number;
  assistant: number;
  total: number;
};

/**
 * Rolling user/assistant transcript. Trimming drops whole pairs from the
 * front so a reply is never left without its question.
 */
export class ConversationHistory {
  private messages: LlmMessage[] = [];
  private readonly maxMessages: number;

  constructor(maxMessages = 20) {
    this.maxMessages = maxMessages;
  }

  append(message: LlmMessage): void {
    this.messages.push(message);
  }

  /** Drops an unanswered trailing user message. */
  discardPending(): void {
    if (this.messages[this.messages.length - 1]?.role === "user") {
      this.messages.pop();
    }
  }

  /** Called once a turn is complete. */
  trim(): void {
    if (this.messages.length <= this.maxMessages) return;
    let excess = this.messages.length - this.maxMessages;
    if (excess % 2 !== 0) excess += 1;
    this.messages = this.messages.slice(excess);
  }

  clear(): void {
    this.messages = [];
  }

  all(): LlmMessage[] {
    return [...this.messages];
  }

  get length(): number {
    return this.messages.length;
  }

  summary(): HistorySummary {
    return {
      user: this.messages.filter((message) => message.role === "user").length,
      assistant: this.messages.filter((message) => message.role === "assistant").length,
      total: this.messages.length
    };
  }
}

export const formatHistorySummary = (summary: HistorySummary): string =>
  summary.total === 0
    ? "No conversation history yet"
    : [
        "Conversation history:",
        `- user messages: ${summary.user}`,
        `- assistant replies: ${summary.assistant}`,
        `- total: ${summary.total}`
      ].join("\n");
