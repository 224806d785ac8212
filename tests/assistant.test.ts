import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { DesktopAssistant, joinReport } from "../src/assistant/assistant.js";
import { WARMUP_MESSAGE, buildSystemPrompt, renderTemplate } from "../src/assistant/prompts.js";
import type { TaskDispatcher } from "../src/dispatch/dispatcher.js";
import { MockProvider } from "../src/llm/providers/mock.js";
import { AuditCollector } from "../src/runtime/audit.js";
import { makeTempDir } from "./helpers/fakes.js";

const fakeDispatcher = (): TaskDispatcher & { seen: string[] } => {
  const seen: string[] = [];
  return {
    seen,
    dispatch: async (text) => {
      seen.push(text);
      return text.includes("[TASK:") ? "✓ done" : "";
    }
  };
};

const collect = async (chunks: AsyncIterable<string>): Promise<string[]> => {
  const out: string[] = [];
  for await (const chunk of chunks) {
    out.push(chunk);
  }
  return out;
};

const assistantWith = (outputs: string[], extra: { maxHistory?: number; audit?: AuditCollector; now?: () => number } = {}) => {
  const provider = new MockProvider(outputs, ["qwen", "llama"]);
  const dispatcher = fakeDispatcher();
  const assistant = new DesktopAssistant({ provider, dispatcher, systemPrompt: "RULES", model: "qwen", ...extra });
  return { provider, dispatcher, assistant };
};

describe("DesktopAssistant", () => {
  test("returns the reply followed by the dispatch report", async () => {
    const { assistant, provider, dispatcher } = assistantWith(["Checking. [TASK:SYSTEM_INFO][/TASK]"]);

    const output = await assistant.processInput("what machine is this?");

    expect(output).toBe("Checking. [TASK:SYSTEM_INFO][/TASK]\n\n✓ done");
    expect(dispatcher.seen).toEqual(["Checking. [TASK:SYSTEM_INFO][/TASK]"]);
    expect(provider.calls[0]).toEqual({
      messages: [{ role: "user", content: "what machine is this?" }],
      opts: { model: "qwen", system: "RULES" }
    });
    expect(assistant.historyMessages()).toEqual([
      { role: "user", content: "what machine is this?" },
      { role: "assistant", content: "Checking. [TASK:SYSTEM_INFO][/TASK]" }
    ]);
  });

  test("a reply without directives is returned as is", async () => {
    const { assistant } = assistantWith(["Hi there"]);
    expect(await assistant.processInput("hello")).toBe("Hi there");
  });

  test("sends prior turns with each request", async () => {
    const { assistant, provider } = assistantWith(["one", "two"]);
    await assistant.processInput("first");
    await assistant.processInput("second");

    expect(provider.calls[1]?.messages.map((message) => message.content)).toEqual(["first", "one", "second"]);
  });

  test("keeps history within the limit", async () => {
    const { assistant } = assistantWith(["one", "two"], { maxHistory: 2 });
    await assistant.processInput("first");
    await assistant.processInput("second");

    expect(assistant.historyMessages()).toEqual([
      { role: "user", content: "second" },
      { role: "assistant", content: "two" }
    ]);
  });

  test("a failed model call leaves history unchanged", async () => {
    const { assistant } = assistantWith([]);
    await expect(assistant.processInput("hello")).rejects.toThrow("MockProvider outputs exhausted");
    expect(assistant.historyMessages()).toEqual([]);
  });

  test("streams chunks, then the report", async () => {
    const { assistant } = assistantWith(["Opening now [TASK:OPEN_APP]记事本[/TASK]"]);

    const chunks = await collect(assistant.processInputStream("open notepad"));

    expect(chunks).toEqual(["Opening ", "now ", "[TASK:OPEN_APP]记事本[/TASK]", "\n\n✓ done"]);
    expect(assistant.historyMessages()[1]).toEqual({
      role: "assistant",
      content: "Opening now [TASK:OPEN_APP]记事本[/TASK]"
    });
  });

  test("requires a model", async () => {
    const provider = new MockProvider(["x"]);
    const assistant = new DesktopAssistant({ provider, dispatcher: fakeDispatcher(), systemPrompt: "RULES" });

    await expect(assistant.processInput("hi")).rejects.toThrow("No model selected");
    expect(await assistant.selectModel("mock-model")).toBe(true);
    expect(assistant.currentModel).toBe("mock-model");
  });

  test("selectModel refuses models that are not installed", async () => {
    const { assistant } = assistantWith([]);
    expect(await assistant.selectModel("mistral")).toBe(false);
    expect(assistant.currentModel).toBe("qwen");
    expect(await assistant.selectModel("llama")).toBe(true);
    expect(assistant.currentModel).toBe("llama");
  });

  test("warm-up uses the system prompt and leaves history alone", async () => {
    const times = [1000, 1250];
    const { assistant, provider } = assistantWith(["Ready"], { now: () => times.shift() ?? 0 });

    expect(await assistant.warmUp()).toEqual({ reply: "Ready", durationMs: 250 });
    expect(provider.calls[0]).toEqual({
      messages: [{ role: "user", content: WARMUP_MESSAGE }],
      opts: { model: "qwen", system: "RULES" }
    });
    expect(assistant.historyMessages()).toEqual([]);
  });

  test("clearing history resets the summary", async () => {
    const { assistant } = assistantWith(["one"]);
    await assistant.processInput("first");

    expect(assistant.historySummary()).toBe(
      ["Conversation history:", "- user messages: 1", "- assistant replies: 1", "- total: 2"].join("\n")
    );
    expect(assistant.clearHistory()).toBe("Conversation history cleared");
    expect(assistant.historySummary()).toBe("No conversation history yet");
  });

  test("records each turn in the audit log", async () => {
    const audit = new AuditCollector(() => 42);
    const { assistant } = assistantWith(["Sure [TASK:LIST_DIR]~[/TASK][TASK:OPEN_APP]x[/TASK]"], { audit });

    await assistant.processInput("do things");

    expect(audit.all()).toEqual([
      {
        kind: "turn",
        ts: 42,
        data: {
          input: "do things",
          reply: "Sure [TASK:LIST_DIR]~[/TASK][TASK:OPEN_APP]x[/TASK]",
          directives: ["OPEN_APP", "LIST_DIR"],
          report: "✓ done"
        }
      }
    ]);
  });
});

describe("joinReport", () => {
  test("separates the report with a blank line", () => {
    expect(joinReport("reply", "")).toBe("reply");
    expect(joinReport("reply", "✓ ok")).toBe("reply\n\n✓ ok");
  });
});

describe("AuditCollector", () => {
  test("flushes entries to a numbered JSON file", async () => {
    const dir = await makeTempDir("audit");
    const audit = new AuditCollector(() => 1000);
    audit.recordStart({ model: "qwen", platform: "linux" });
    audit.recordError("boom");

    const path = await audit.flush(join(dir, "logs"));

    expect(path).toBe(join(dir, "logs", "2_1000.json"));
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual([
      { kind: "session_start", ts: 1000, data: { model: "qwen", platform: "linux" } },
      { kind: "error", ts: 1000, data: { message: "boom" } }
    ]);
  });
});

describe("system prompt", () => {
  test("fills placeholders and leaves unknown ones", () => {
    expect(renderTemplate("{{a}} and {{b}}", { a: "x" })).toBe("x and {{b}}");
  });

  test("documents the tag grammar for the current platform", () => {
    const prompt = buildSystemPrompt({ platform: "linux", copySuffix: "_副本" });
    expect(prompt).toContain("[TASK:OPEN_APP]");
    expect(prompt).toContain("[TASK:WRITE_FILE]");
    expect(prompt).toContain("linux");
    expect(prompt).toContain("_副本");
    expect(prompt).not.toMatch(/\{\{\w+\}\}/);
  });
});
