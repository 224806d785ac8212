import { readFileSync } from "node:fs";
import { dataFilePath } from "../config/dataFiles.js";

export const WARMUP_MESSAGE = "Startup check: reply briefly to confirm you are ready to help.";

export type PromptVars = {
  platform: NodeJS.Platform;
  copySuffix: string;
};

export const renderTemplate = (template: string, vars: Record<string, string>): string =>
  template.replace(/\{\{(\w+)\}\}/g, (whole, name: string) => vars[name] ?? whole);

/** System prompt teaching the model the task tag grammar. */
export const buildSystemPrompt = (vars: PromptVars): string =>
  renderTemplate(readFileSync(dataFilePath("system_prompt.md"), "utf8"), {
    platform: vars.platform,
    copySuffix: vars.copySuffix
  }).trim();
