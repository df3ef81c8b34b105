import type { Executor } from "../execution/executor.js";
import { formatCommand } from "../execution/executor.js";
import { describeError } from "../shared/errors.js";
import type { ManagerId, PackageName } from "../types/manager.js";
import type { ElevationMethod } from "../config/schema.js";
import { installCommand } from "../managers/registry.js";
import type { DiagnosticListener } from "./diagnostics.js";
import { logger } from "../logger.js";

export interface InstallOptions {
  readonly elevation: ElevationMethod;
  readonly timeoutMs?: number;
}

/**
 * Install one package, elevated when the manager needs it, with the child's
 * output discarded. Returns true only on exit status 0.
 */
export async function installPackage(
  executor: Executor,
  id: ManagerId,
  pkg: PackageName,
  options: InstallOptions,
  onDiagnostic?: DiagnosticListener,
): Promise<boolean> {
  const command = { ...installCommand(id, pkg, options.elevation), discardOutput: true };
  logger.info({ manager: id, package: pkg, command: formatCommand(command) }, "Installing package");

  let spawnError: string | null;
  let exitCode: number | null;
  try {
    ({ spawnError, exitCode } = await executor.execute(command, options.timeoutMs ?? 0));
  } catch (err) {
    spawnError = describeError(err);
    exitCode = null;
  }

  if (spawnError !== null) {
    logger.error({ manager: id, package: pkg, error: spawnError }, "Error executing install command");
    onDiagnostic?.({ manager: id, package: pkg, kind: "spawn_failure", detail: spawnError });
    return false;
  }
  if (exitCode !== 0) {
    const detail = exitCode === null ? "terminated without exit status" : `exit code ${exitCode}`;
    logger.error({ manager: id, package: pkg, exitCode }, "Failed to install package");
    onDiagnostic?.({ manager: id, package: pkg, kind: "non_zero_exit", detail });
    return false;
  }

  logger.info({ manager: id, package: pkg }, "Package installed");
  return true;
}
