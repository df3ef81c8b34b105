import { z } from "zod";
import type { PluginContext } from "../context.js";
import { registerTool, success, storageDir } from "../helpers.js";
import { catalogExists, catalogPath } from "../../catalog/store.js";
import { MANAGER_IDS } from "../../types/manager.js";

export function registerSessionTools(ctx: PluginContext): void {
  registerTool(ctx, {
    name: "sysbak_session_info",
    description: "Session context: target host, configuration, supported package managers and whether a saved package list exists. Call this first.",
    module: "session",
    riskLevel: "read-only",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async () => {
    const dir = storageDir(ctx);
    const data: Record<string, unknown> = {
      target_host: ctx.targetHost,
      config_path: ctx.configPath,
      elevation_method: ctx.config.privilege.method,
      catalog: { path: catalogPath(dir), exists: await catalogExists(dir) },
      supported_managers: [...MANAGER_IDS],
      tools_registered: [...ctx.registry.getAll().keys()],
    };
    if (ctx.firstRun) {
      data.setup = {
        first_run: true,
        message: `A default configuration was written to ${ctx.configPath}. Adjust storage.base_dir there to change where the package list is kept.`,
      };
    }
    return success("sysbak_session_info", ctx.targetHost, 0, null, data);
  });
}
