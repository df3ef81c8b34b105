import type { Executor } from "../execution/executor.js";
import { succeeded } from "../execution/executor.js";
import { MANAGER_IDS, type AvailabilityMap, type ManagerId } from "../types/manager.js";
import { probeCommand } from "./registry.js";
import { logger } from "../logger.js";

/**
 * Probe every registered manager with `--version`, one at a time.
 * A missing binary and a failing probe both mean "unavailable"; this never throws.
 */
export async function detectManagers(executor: Executor, timeoutMs = 0): Promise<AvailabilityMap> {
  logger.info("Detecting package managers");
  const availability: Record<ManagerId, boolean> = {
    apt: false, yum_dnf: false, portage: false, pacman: false, flatpak: false, snap: false, xbps: false,
  };

  for (const id of MANAGER_IDS) {
    try {
      availability[id] = succeeded(await executor.execute(probeCommand(id), timeoutMs));
    } catch (err) {
      logger.warn({ manager: id, error: err }, "Probe could not be executed");
    }
  }

  logger.info({ availability }, "Package manager detection complete");
  return Object.freeze(availability);
}

/** Managers marked available, in registry order. */
export function availableManagers(availability: AvailabilityMap): ManagerId[] {
  return MANAGER_IDS.filter((id) => availability[id]);
}
