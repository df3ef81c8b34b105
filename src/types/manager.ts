/** Every supported package manager, in detection and listing order. */
export const MANAGER_IDS = ["apt", "yum_dnf", "portage", "pacman", "flatpak", "snap", "xbps"] as const;

/** Closed set of package manager identifiers. */
export type ManagerId = (typeof MANAGER_IDS)[number];

/** Manager-local package identifier. No equivalence across managers. */
export type PackageName = string;

/** Which managers answered their probe during this run. Frozen once built. */
export type AvailabilityMap = Readonly<Record<ManagerId, boolean>>;

/**
 * Installed packages grouped by manager, in native listing order.
 * Map iteration order is the order managers were inserted.
 */
export type Catalog = ReadonlyMap<ManagerId, readonly PackageName[]>;

/** Result of aggregation: a catalog, or the marker for "checked, nothing found". */
export type CatalogScan =
  | { readonly kind: "catalog"; readonly catalog: Catalog }
  | { readonly kind: "empty"; readonly message: string };

export function isManagerId(value: string): value is ManagerId {
  return (MANAGER_IDS as readonly string[]).includes(value);
}
