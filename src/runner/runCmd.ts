import { spawn } from "node:child_process";

export type CmdResult = {
  ok: boolean;
  code: number;
  stdout: string;
  stderr: string;
};

export type CmdOptions = {
  cwd?: string;
  /** Run `cmd` as a full command line through the platform shell. */
  shell?: boolean;
  timeoutMs?: number;
};

const clamp = (value: string, max = 20000): string =>
  value.length > max ? `${value.slice(0, max)}...<truncated>` : value;

const DEFAULT_TIMEOUT_MS = 30_000;

export const runCmd = async (cmd: string, args: string[], opts: CmdOptions = {}): Promise<CmdResult> =>
  new Promise((resolve) => {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const child = spawn(cmd, args, { cwd: opts.cwd, shell: opts.shell ?? false });
    let stdout = "";
    let stderr = "";
    const timer = setTimeout(() => {
      stderr += `\ncommand timed out after ${timeoutMs}ms`;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.on("data", (chunk) => {
      stdout += String(chunk);
    });

    child.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      const finalCode = code ?? 1;
      resolve({
        ok: finalCode === 0,
        code: finalCode,
        stdout: clamp(stdout),
        stderr: clamp(stderr)
      });
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      resolve({ ok: false, code: 1, stdout: clamp(stdout), stderr: clamp(`${stderr}\n${error.message}`) });
    });
  });

/**
 * Start a process without waiting for it to exit. Resolves once the process
 * has spawned, or with the spawn error.
 */
export const spawnDetached = async (cmd: string, args: string[], opts: CmdOptions = {}): Promise<CmdResult> =>
  new Promise((resolve) => {
    const child = spawn(cmd, args, { cwd: opts.cwd, shell: opts.shell ?? false, detached: true, stdio: "ignore" });

    child.once("spawn", () => {
      child.unref();
      resolve({ ok: true, code: 0, stdout: "", stderr: "" });
    });

    child.once("error", (error) => {
      resolve({ ok: false, code: 1, stdout: "", stderr: error.message });
    });
  });

export type CmdRunner = typeof runCmd;
