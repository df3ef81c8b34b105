import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { Catalog } from "../../types/manager.js";
import { registerTool, success, errorFromException, commandTimeout, storageDir } from "../helpers.js";
import { detectManagers, availableManagers } from "../../managers/detector.js";
import { aggregateCatalog, countPackages } from "../../catalog/aggregator.js";
import { saveCatalog, loadCatalog, catalogToDocument } from "../../catalog/store.js";
import { reconcile } from "../../reconcile/reconciler.js";
import { formatEntry, summarizeReport } from "../../reconcile/summary.js";

function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

export function registerCatalogTools(ctx: PluginContext): void {
  // ── pkg_detect_managers ─────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_detect_managers", description: "Probe every supported package manager (apt, dnf, portage, pacman, flatpak, snap, xbps) and report which are available.",
    module: "catalog", riskLevel: "read-only",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const start = performance.now();
    const availability = await detectManagers(ctx.executor, commandTimeout(ctx));
    return success("pkg_detect_managers", ctx.targetHost, elapsed(start), null, { detected_package_managers: availability }, {
      total: availableManagers(availability).length,
    });
  });

  // ── pkg_list_catalog ────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_list_catalog", description: "List installed packages for every available package manager, grouped by manager.",
    module: "catalog", riskLevel: "read-only",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async () => {
    const start = performance.now();
    try {
      const availability = await detectManagers(ctx.executor, commandTimeout(ctx));
      const scan = await aggregateCatalog(ctx.executor, availability, commandTimeout(ctx));
      if (scan.kind === "empty") {
        return success("pkg_list_catalog", ctx.targetHost, elapsed(start), null, { message: scan.message }, { total: 0 });
      }
      return success("pkg_list_catalog", ctx.targetHost, elapsed(start), null, { packages: catalogToDocument(scan.catalog) }, {
        total: countPackages(scan.catalog),
      });
    } catch (err) {
      return errorFromException("pkg_list_catalog", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── pkg_save_catalog ────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_save_catalog", description: "List installed packages and save them to SysBackup/package_list.json for later replay.",
    module: "catalog", riskLevel: "low",
    inputSchema: z.object({}),
    annotations: { destructiveHint: false },
  }, async () => {
    const start = performance.now();
    try {
      const availability = await detectManagers(ctx.executor, commandTimeout(ctx));
      const scan = await aggregateCatalog(ctx.executor, availability, commandTimeout(ctx));
      const catalog: Catalog = scan.kind === "catalog" ? scan.catalog : new Map();
      const path = await saveCatalog(storageDir(ctx), catalog);
      return success("pkg_save_catalog", ctx.targetHost, elapsed(start), null, {
        path,
        managers: [...catalog.keys()],
        ...(scan.kind === "empty" ? { message: scan.message } : {}),
      }, { total: countPackages(catalog) });
    } catch (err) {
      return errorFromException("pkg_save_catalog", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── pkg_show_catalog ────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_show_catalog", description: "Show the saved package list.",
    module: "catalog", riskLevel: "read-only",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const start = performance.now();
    try {
      const loaded = await loadCatalog(storageDir(ctx));
      return success("pkg_show_catalog", ctx.targetHost, elapsed(start), null, {
        path: loaded.path,
        packages: catalogToDocument(loaded.catalog),
        ...(loaded.unknownManagers.length ? { unknown_managers: loaded.unknownManagers } : {}),
      }, { total: countPackages(loaded.catalog) });
    } catch (err) {
      return errorFromException("pkg_show_catalog", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── pkg_reconcile ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_reconcile", description: "Install every package from the saved package list that is missing on this host. Moderate risk, requires confirmation.",
    module: "catalog", riskLevel: "moderate",
    inputSchema: z.object({
      confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
      dry_run: z.boolean().optional().default(false).describe("Check which packages are missing without installing anything."),
    }),
    annotations: { destructiveHint: false, openWorldHint: true },
  }, async (args) => {
    const start = performance.now();
    try {
      const loaded = await loadCatalog(storageDir(ctx));
      const gate = ctx.safetyGate.check({
        toolName: "pkg_reconcile", toolRiskLevel: "moderate", targetHost: ctx.targetHost,
        command: `install missing packages from ${loaded.path}`,
        description: `Install up to ${countPackages(loaded.catalog)} packages across ${loaded.catalog.size} package managers`,
        warnings: loaded.unknownManagers.map((m) => `Unknown package manager '${m}' in catalog will be ignored`),
        confirmed: args.confirmed, dryRun: args.dry_run,
      });
      if (gate) return gate;

      const report = await reconcile(ctx.executor, loaded.catalog, {
        elevation: ctx.config.privilege.method,
        dryRun: args.dry_run,
        timeoutMs: commandTimeout(ctx),
      });
      return success("pkg_reconcile", ctx.targetHost, elapsed(start), null, {
        already_installed: report.alreadyInstalled.map(formatEntry),
        newly_installed: report.newlyInstalled.map(formatEntry),
        failed: report.failed.map((f) => ({ entry: formatEntry(f), reason: f.reason })),
        ...(report.dryRun ? { would_install: report.pending.map(formatEntry) } : {}),
        skipped_managers: report.skipped,
      }, {
        summary: summarizeReport(report),
        ...(report.dryRun ? { dry_run: true } : {}),
      });
    } catch (err) {
      return errorFromException("pkg_reconcile", ctx.targetHost, elapsed(start), err);
    }
  });
}
