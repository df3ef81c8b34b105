import type { ManagerId, PackageName } from "./manager.js";

/** One (package, manager) pair from a catalog. */
export interface PackageEntry {
  readonly package: PackageName;
  readonly manager: ManagerId;
}

export interface FailedEntry extends PackageEntry {
  /** Spawn error or exit status, when the installer reported one. */
  readonly reason: string | null;
}

/**
 * Outcome of reconciling a host against a catalog.
 * Every pair whose manager is available lands in exactly one of
 * alreadyInstalled, newlyInstalled, failed or (dry run only) pending.
 */
export interface InstallReport {
  readonly alreadyInstalled: readonly PackageEntry[];
  readonly newlyInstalled: readonly PackageEntry[];
  readonly failed: readonly FailedEntry[];
  readonly pending: readonly PackageEntry[];
  /** Managers whose whole group was skipped because they are unavailable here. */
  readonly skipped: readonly ManagerId[];
  readonly dryRun: boolean;
}
