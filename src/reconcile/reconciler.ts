// Reconciler: replays a saved catalog onto this host.
// Detecting → for each (manager, package): Checking → Installed | Installing → Success | Failure → Reporting.
// Pairs are processed one at a time in catalog order; a failed install never stops the run
// and nothing is rolled back.
import type { Executor } from "../execution/executor.js";
import type { AvailabilityMap, Catalog, ManagerId } from "../types/manager.js";
import type { FailedEntry, InstallReport, PackageEntry } from "../types/report.js";
import type { ElevationMethod } from "../config/schema.js";
import { detectManagers } from "../managers/detector.js";
import type { Diagnostic } from "./diagnostics.js";
import { isInstalled } from "./installed-check.js";
import { installPackage } from "./installer.js";
import { logger } from "../logger.js";

export interface ReconcileOptions {
  readonly elevation: ElevationMethod;
  /** Precomputed availability; detected on this host when omitted. */
  readonly availability?: AvailabilityMap;
  /** Check only: packages that are missing go to `pending` instead of being installed. */
  readonly dryRun?: boolean;
  readonly timeoutMs?: number;
}

export async function reconcile(executor: Executor, catalog: Catalog, options: ReconcileOptions): Promise<InstallReport> {
  const timeoutMs = options.timeoutMs ?? 0;
  const dryRun = options.dryRun ?? false;
  const availability = options.availability ?? (await detectManagers(executor, timeoutMs));

  const alreadyInstalled: PackageEntry[] = [];
  const newlyInstalled: PackageEntry[] = [];
  const failed: FailedEntry[] = [];
  const pending: PackageEntry[] = [];
  const skipped: ManagerId[] = [];

  logger.info({ managers: catalog.size, dryRun }, "Starting package installation process");

  for (const [manager, packages] of catalog) {
    if (!availability[manager]) {
      logger.info({ manager }, "Skipping package manager (not detected on this system)");
      skipped.push(manager);
      continue;
    }

    logger.info({ manager, count: packages.length }, "Processing packages");
    for (const pkg of packages) {
      const entry: PackageEntry = { package: pkg, manager };
      if (await isInstalled(executor, manager, pkg, undefined, timeoutMs)) {
        alreadyInstalled.push(entry);
        continue;
      }
      if (dryRun) {
        pending.push(entry);
        continue;
      }

      const diagnostics: Diagnostic[] = [];
      const ok = await installPackage(executor, manager, pkg, { elevation: options.elevation, timeoutMs }, (d) => diagnostics.push(d));
      if (ok) newlyInstalled.push(entry);
      else failed.push({ ...entry, reason: diagnostics.at(-1)?.detail ?? null });
    }
  }

  const report: InstallReport = { alreadyInstalled, newlyInstalled, failed, pending, skipped, dryRun };
  logger.info({
    alreadyInstalled: alreadyInstalled.length,
    newlyInstalled: newlyInstalled.length,
    failed: failed.length,
    pending: pending.length,
    skipped,
  }, "Reconciliation complete");
  return report;
}
