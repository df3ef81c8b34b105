// Command execution layer: every package manager command passes through this module.
// Business logic depends only on the Executor interface; LocalExecutor is the real
// child-process implementation and tests substitute an in-process fake.
import { execFile, spawn } from "node:child_process";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  /** Exit status; null when the process never ran or was killed by a signal. */
  readonly exitCode: number | null;
  /** Set when the binary could not be started (missing, not executable). */
  readonly spawnError: string | null;
  readonly durationMs: number;
}

export interface Executor {
  /** Run a command to completion. A timeout of 0 waits indefinitely. */
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Whether the command ran and exited with status 0. */
export function succeeded(result: ExecResult): boolean {
  return result.spawnError === null && result.exitCode === 0;
}

/** Render a command for logs and responses. */
export function formatCommand(command: Command): string {
  return command.argv.join(" ");
}

type ChildError = Error & { code?: string | number | null; errno?: number };

/** Spawn errors carry a string code (ENOENT, EACCES); exit failures a numeric one. */
function classifyError(error: ChildError | null): { exitCode: number | null; spawnError: string | null } {
  if (!error) return { exitCode: 0, spawnError: null };
  if (typeof error.code === "string") return { exitCode: null, spawnError: `${error.code}: ${error.message}` };
  if (typeof error.code === "number") return { exitCode: error.code, spawnError: null };
  return { exitCode: null, spawnError: null };
}

/** Local executor using child_process, without a shell. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "", exitCode: null, spawnError: "empty argv", durationMs: 0 };
    }
    const env = command.env ? { ...process.env, ...command.env } : process.env;
    logger.debug({ command: formatCommand(command) }, "Executing command");
    return command.discardOutput
      ? this.runDiscarding(cmd, args, env, timeoutMs)
      : this.runCapturing(cmd, args, env, timeoutMs);
  }

  private runCapturing(cmd: string, args: string[], env: NodeJS.ProcessEnv, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    return new Promise<ExecResult>((resolve) => {
      execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          // Full package listings run to a few MB on large installs.
          maxBuffer: 64 * 1024 * 1024,
          env,
          shell: false,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          resolve({ stdout: stdout ?? "", stderr: stderr ?? "", ...classifyError(error), durationMs });
        },
      );
    });
  }

  private runDiscarding(cmd: string, args: string[], env: NodeJS.ProcessEnv, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    return new Promise<ExecResult>((resolve) => {
      let settled = false;
      const finish = (result: Omit<ExecResult, "durationMs" | "stdout" | "stderr">): void => {
        if (settled) return;
        settled = true;
        resolve({ stdout: "", stderr: "", ...result, durationMs: Math.round(performance.now() - start) });
      };
      const child = spawn(cmd, args, { env, stdio: "ignore", timeout: timeoutMs || undefined });
      child.on("error", (err: ChildError) => finish(classifyError(err)));
      child.on("close", (code) => finish({ exitCode: code, spawnError: null }));
    });
  }
}
