import type { Executor } from "../execution/executor.js";
import type { AvailabilityMap, Catalog, CatalogScan, ManagerId, PackageName } from "../types/manager.js";
import { availableManagers } from "../managers/detector.js";
import { listPackages } from "../managers/lister.js";
import { logger } from "../logger.js";

export const EMPTY_SCAN_MESSAGE = "No package managers detected or no packages listed.";

/**
 * Build a catalog from every available manager's listing.
 * A listing error aborts the whole scan; there is no partial catalog.
 */
export async function aggregateCatalog(executor: Executor, availability: AvailabilityMap, timeoutMs = 0): Promise<CatalogScan> {
  const managers = availableManagers(availability);
  if (managers.length === 0) {
    logger.info("No package managers available, nothing to catalog");
    return { kind: "empty", message: EMPTY_SCAN_MESSAGE };
  }

  const catalog = new Map<ManagerId, readonly PackageName[]>();
  for (const id of managers) {
    catalog.set(id, await listPackages(executor, id, timeoutMs));
  }
  return { kind: "catalog", catalog };
}

/** Number of (package, manager) pairs in a catalog. */
export function countPackages(catalog: Catalog): number {
  let total = 0;
  for (const packages of catalog.values()) total += packages.length;
  return total;
}
