import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

export type EnvEntry = { key: string; value: string };

const stripQuotes = (value: string): string => {
  const first = value[0];
  if ((first === '"' || first === "'") && value.length >= 2 && value.endsWith(first)) {
    const inner = value.slice(1, -1);
    return first === '"' ? inner.replace(/\\n/g, "\n") : inner;
  }
  // Unquoted values end at an inline comment.
  const hash = value.search(/\s#/);
  return hash >= 0 ? value.slice(0, hash).trimEnd() : value;
};

export const parseEnvLine = (line: string): EnvEntry | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const body = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const idx = body.indexOf("=");
  if (idx <= 0) return null;

  const key = body.slice(0, idx).trim();
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) return null;
  return { key, value: stripQuotes(body.slice(idx + 1).trim()) };
};

/**
 * Copy variables from a dotenv file into `env`. Variables already set win.
 * Returns the keys that were applied.
 */
export const loadEnvFile = (filePath = ".env", env: NodeJS.ProcessEnv = process.env): string[] => {
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return [];

  const applied: string[] = [];
  for (const line of readFileSync(absolute, "utf8").split(/\r?\n/)) {
    const entry = parseEnvLine(line);
    if (!entry || env[entry.key] !== undefined) continue;
    env[entry.key] = entry.value;
    applied.push(entry.key);
  }
  return applied;
};
