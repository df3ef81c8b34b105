import type { Executor, ExecResult } from "../../src/execution/executor.js";
import type { Command } from "../../src/types/command.js";

/** Scripted outcome for one argv. */
export type FakeOutcome =
  | { readonly stdout?: string; readonly stderr?: string; readonly exitCode?: number }
  | { readonly spawnError: string }
  | ((command: Command) => FakeOutcome);

/**
 * In-process Executor keyed by the space-joined argv.
 * Any command without a script behaves like a missing binary.
 */
export class FakeExecutor implements Executor {
  readonly calls: Command[] = [];
  private readonly scripts = new Map<string, FakeOutcome>();

  constructor(scripts: Record<string, FakeOutcome> = {}) {
    for (const [argv, outcome] of Object.entries(scripts)) this.scripts.set(argv, outcome);
  }

  on(argv: string, outcome: FakeOutcome): this {
    this.scripts.set(argv, outcome);
    return this;
  }

  /** Joined argv of every executed command, in order. */
  get commandLines(): string[] {
    return this.calls.map((c) => c.argv.join(" "));
  }

  async execute(command: Command): Promise<ExecResult> {
    this.calls.push(command);
    let outcome = this.scripts.get(command.argv.join(" ")) ?? { spawnError: `ENOENT: spawn ${command.argv[0] ?? ""} ENOENT` };
    while (typeof outcome === "function") outcome = outcome(command);
    if ("spawnError" in outcome) {
      return { stdout: "", stderr: "", exitCode: null, spawnError: outcome.spawnError, durationMs: 0 };
    }
    return {
      stdout: outcome.stdout ?? "",
      stderr: outcome.stderr ?? "",
      exitCode: outcome.exitCode ?? 0,
      spawnError: null,
      durationMs: 0,
    };
  }
}

/** Probe scripts marking the given probe binaries as present. */
export function probes(...binaries: string[]): Record<string, FakeOutcome> {
  return Object.fromEntries(binaries.map((b) => [`${b} --version`, { stdout: `${b} 1.0` }]));
}
