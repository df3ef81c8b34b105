import type { Executor, ExecResult } from "../execution/executor.js";
import { formatCommand } from "../execution/executor.js";
import type { ManagerId, PackageName } from "../types/manager.js";
import { SysbakError, SysbakErrorCode, describeError } from "../shared/errors.js";
import { getManager } from "./registry.js";
import { parseListing } from "./parsers.js";
import { logger } from "../logger.js";

/**
 * List the packages a manager reports as installed, in its native order.
 * Lines the manager's rule can't read are dropped; only a failure to start
 * the list command is an error.
 */
export async function listPackages(executor: Executor, id: ManagerId, timeoutMs = 0): Promise<PackageName[]> {
  const entry = getManager(id);
  const command = entry.listInstalled;
  logger.info({ manager: id }, "Listing packages");

  let result: ExecResult;
  try {
    result = await executor.execute(command, timeoutMs);
  } catch (err) {
    throw new SysbakError(SysbakErrorCode.SPAWN_FAILED, `Failed to list ${id} packages: ${describeError(err)}`, {
      manager: id, command: formatCommand(command),
    });
  }

  if (result.spawnError !== null) {
    throw new SysbakError(SysbakErrorCode.SPAWN_FAILED, `Failed to list ${id} packages: ${result.spawnError}`, {
      manager: id, command: formatCommand(command),
    });
  }
  if (result.exitCode !== 0) {
    logger.warn({ manager: id, exitCode: result.exitCode, stderr: result.stderr.trim() }, "List command exited non-zero, parsing its output anyway");
  }

  const packages = parseListing(result.stdout, entry.lineRule);
  logger.info({ manager: id, count: packages.length }, "Listed packages");
  return packages;
}
