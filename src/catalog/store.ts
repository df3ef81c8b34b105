// Catalog persistence: one pretty-printed JSON object at <baseDir>/SysBackup/package_list.json.
// The document is validated at load time; nothing past this module sees untyped JSON.
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { isManagerId, type Catalog, type ManagerId, type PackageName } from "../types/manager.js";
import { SysbakError, SysbakErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

export const CATALOG_DIR = "SysBackup";
export const CATALOG_FILE = "package_list.json";

// Names end up as the last argv item of root-run installs; one that parses as an option is refused.
const PackageNameSchema = z.string().min(1).refine((name) => !name.startsWith("-"), {
  message: "Package names must not start with '-'",
});

const CatalogDocumentSchema = z.record(z.string(), z.array(PackageNameSchema));

/** On-disk shape: manager identifier → package names. */
export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;

export interface LoadedCatalog {
  readonly catalog: Catalog;
  readonly path: string;
  /** Keys not naming a known manager. Kept out of the catalog, left untouched on disk. */
  readonly unknownManagers: readonly string[];
}

export function catalogPath(baseDir: string): string {
  return path.join(baseDir, CATALOG_DIR, CATALOG_FILE);
}

export function catalogToDocument(catalog: Catalog): CatalogDocument {
  const doc: CatalogDocument = {};
  for (const [id, packages] of catalog) doc[id] = [...packages];
  return doc;
}

export function catalogFromDocument(doc: CatalogDocument): { catalog: Catalog; unknownManagers: string[] } {
  const catalog = new Map<ManagerId, readonly PackageName[]>();
  const unknownManagers: string[] = [];
  for (const [key, packages] of Object.entries(doc)) {
    if (isManagerId(key)) catalog.set(key, packages);
    else unknownManagers.push(key);
  }
  return { catalog, unknownManagers };
}

export async function saveCatalog(baseDir: string, catalog: Catalog): Promise<string> {
  const filePath = catalogPath(baseDir);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(catalogToDocument(catalog), null, 2), "utf-8");
  } catch (err) {
    throw new SysbakError(SysbakErrorCode.IO_FAILED, `Failed to write ${filePath}: ${describeError(err)}`, { path: filePath });
  }
  logger.info({ path: filePath, managers: catalog.size }, "Package list saved");
  return filePath;
}

export async function catalogExists(baseDir: string): Promise<boolean> {
  try {
    await fs.access(catalogPath(baseDir));
    return true;
  } catch {
    return false;
  }
}

export async function loadCatalog(baseDir: string): Promise<LoadedCatalog> {
  const filePath = catalogPath(baseDir);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new SysbakError(SysbakErrorCode.CATALOG_NOT_FOUND, `${filePath} not found. Save a package list first.`, { path: filePath });
    }
    throw new SysbakError(SysbakErrorCode.IO_FAILED, `Failed to read ${filePath}: ${describeError(err)}`, { path: filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SysbakError(SysbakErrorCode.CATALOG_INVALID, `Failed to parse ${filePath}: ${describeError(err)}`, { path: filePath });
  }

  const result = CatalogDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new SysbakError(SysbakErrorCode.CATALOG_INVALID, `${filePath} is not an object of package name arrays`, {
      path: filePath, issues: result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    });
  }

  const { catalog, unknownManagers } = catalogFromDocument(result.data);
  if (unknownManagers.length > 0) {
    logger.warn({ path: filePath, unknownManagers }, "Catalog names managers this build does not know; they will not be reconciled");
  }
  return { catalog, path: filePath, unknownManagers };
}
