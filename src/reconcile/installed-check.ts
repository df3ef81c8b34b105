import type { Executor } from "../execution/executor.js";
import { describeError } from "../shared/errors.js";
import type { ManagerId, PackageName } from "../types/manager.js";
import { getManager } from "../managers/registry.js";
import type { DiagnosticListener } from "./diagnostics.js";
import { logger } from "../logger.js";

/**
 * Ask the manager whether a package is installed. Exit status 0 means yes.
 * A query binary that can't be started also yields false; the cause goes to
 * onDiagnostic so "binary missing" stays distinguishable from "package absent".
 */
export async function isInstalled(
  executor: Executor,
  id: ManagerId,
  pkg: PackageName,
  onDiagnostic?: DiagnosticListener,
  timeoutMs = 0,
): Promise<boolean> {
  let spawnError: string | null;
  let exitCode: number | null;
  try {
    ({ spawnError, exitCode } = await executor.execute(getManager(id).checkInstalled(pkg), timeoutMs));
  } catch (err) {
    spawnError = describeError(err);
    exitCode = null;
  }

  if (spawnError !== null) {
    logger.warn({ manager: id, package: pkg, error: spawnError }, "Installed check could not be executed");
    onDiagnostic?.({ manager: id, package: pkg, kind: "spawn_failure", detail: spawnError });
    return false;
  }
  return exitCode === 0;
}
