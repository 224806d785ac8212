import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { DirectiveKind } from "../directives/types.js";

export type TurnRecord = {
  input: string;
  reply: string;
  directives: DirectiveKind[];
  report: string;
};

export type AuditEntry =
  | { kind: "session_start"; ts: number; data: { model: string; platform: NodeJS.Platform } }
  | { kind: "turn"; ts: number; data: TurnRecord }
  | { kind: "error"; ts: number; data: { message: string } };

type EntryData<K extends AuditEntry["kind"]> = Extract<AuditEntry, { kind: K }>["data"];

const truncate = (value: string, max = 50000): string =>
  value.length > max ? `${value.slice(0, max)}...<truncated>` : value;

/** In-memory session log, written once as a numbered JSON file. */
export class AuditCollector {
  private entries: AuditEntry[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  recordStart(data: EntryData<"session_start">): void {
    this.entries.push({ kind: "session_start", ts: this.now(), data });
  }

  recordTurn(data: TurnRecord): void {
    this.entries.push({
      kind: "turn",
      ts: this.now(),
      data: { ...data, reply: truncate(data.reply), report: truncate(data.report) }
    });
  }

  recordError(message: string): void {
    this.entries.push({ kind: "error", ts: this.now(), data: { message: truncate(message) } });
  }

  all(): AuditEntry[] {
    return [...this.entries];
  }

  async flush(dir: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${this.entries.length}_${this.now()}.json`);
    await writeFile(path, JSON.stringify(this.entries, null, 2), "utf8");
    return path;
  }
}
