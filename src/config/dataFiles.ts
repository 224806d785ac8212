import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";

const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

export const dataFilePath = (name: string): string => join(DATA_DIR, name);

export const readDataFile = <S extends z.ZodTypeAny>(name: string, schema: S): z.output<S> => {
  const raw = readFileSync(dataFilePath(name), "utf8");
  const decoded: unknown = JSON.parse(raw);
  return schema.parse(decoded);
};
