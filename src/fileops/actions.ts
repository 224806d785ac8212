import type { FileOpAction } from "./types.js";

const ALIAS_TABLE: Record<string, FileOpAction> = {
  新建文件: "create_file",
  创建文件: "create_file",
  create_file: "create_file",
  new_file: "create_file",
  touch: "create_file",
  新建文件夹: "create_dir",
  创建文件夹: "create_dir",
  create_dir: "create_dir",
  create_folder: "create_dir",
  new_folder: "create_dir",
  mkdir: "create_dir",
  删除: "delete",
  delete: "delete",
  remove: "delete",
  重命名: "rename",
  rename: "rename",
  复制: "copy",
  copy: "copy",
  剪切: "move",
  移动: "move",
  move: "move",
  cut: "move",
  写入文件: "write_file",
  写入: "write_file",
  write_file: "write_file",
  write: "write_file"
};

const ALIASES = new Map<string, FileOpAction>(Object.entries(ALIAS_TABLE));

export const parseFileOpAction = (raw: string): FileOpAction | null => ALIASES.get(raw.trim().toLowerCase()) ?? null;

/** Action name the dispatcher prefixes to pooled WRITE_FILE payloads. */
export const WRITE_FILE_ACTION = "write_file";

export const WRITABLE_EXTENSIONS: readonly string[] = [".txt", ".md", ".markdown", ".text"];
