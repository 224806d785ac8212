import { readdir } from "node:fs/promises";
import { arch, cpus, freemem, release, totalmem, type } from "node:os";
import { errorMessage } from "../../fileops/errors.js";
import { expandPath } from "../../fileops/paths.js";
import { LIST_DIR_LIMIT, type HandlerContext } from "../context.js";

const gib = (bytes: number): string => `${(bytes / 1024 ** 3).toFixed(1)} GiB`;

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const systemInfo = (ctx: HandlerContext): string => {
  const cpuList = cpus();
  const cpu = cpuList[0]?.model.trim() || arch();
  return [
    "System information:",
    `- OS: ${type()} ${release()} (${ctx.platform})`,
    `- CPU: ${cpu} x${cpuList.length}`,
    `- Memory: ${gib(totalmem() - freemem())} used of ${gib(totalmem())}`,
    `- Node.js: ${process.version}`,
    `- Local time: ${formatTimestamp(ctx.now())}`
  ].join("\n");
};

export const listDirectory = async (rawPath: string, ctx: HandlerContext): Promise<string> => {
  const dir = expandPath(rawPath.length > 0 ? rawPath : ".", ctx.paths);
  let names: string[];
  try {
    names = (await readdir(dir)).sort((left, right) => left.localeCompare(right));
  } catch (error) {
    return `✗ Cannot list ${dir}: ${errorMessage(error)}`;
  }

  const lines = [`Contents of ${dir}:`, ...names.slice(0, LIST_DIR_LIMIT).map((name) => `  - ${name}`)];
  if (names.length > LIST_DIR_LIMIT) {
    lines.push(`  ... ${names.length - LIST_DIR_LIMIT} more`);
  }
  if (names.length === 0) {
    lines.push("  (empty)");
  }
  return lines.join("\n");
};
