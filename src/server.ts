#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { SafetyGate } from "./safety/gate.js";
import { ToolRegistry } from "./tools/registry.js";
import type { PluginContext } from "./tools/context.js";
import type { ToolResponse } from "./types/response.js";
import { registerSessionTools } from "./tools/session/index.js";
import { registerCatalogTools } from "./tools/catalog/index.js";
import { describeError } from "./shared/errors.js";

async function main(): Promise<void> {
  logger.info("Starting sysbak-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.SYSBAK_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Build context ────────────────────────────────────
  const registry = new ToolRegistry();
  const ctx: PluginContext = {
    config,
    executor: new LocalExecutor(),
    safetyGate: new SafetyGate(config.safety),
    registry,
    targetHost: hostname(),
    configPath,
    firstRun,
  };

  // ── Phase 3: Register tool modules ────────────────────────────
  registerSessionTools(ctx);
  registerCatalogTools(ctx);
  logger.info({ toolCount: registry.size }, "All tool modules registered");

  // ── Phase 4: Expose tools over MCP ────────────────────────────
  const server = new McpServer({ name: "sysbak-mcp", version: "0.1.0" });

  for (const [name, tool] of registry.getAll()) {
    const meta = tool.metadata;
    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? meta.riskLevel === "read-only",
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response: ToolResponse = await tool.execute(args);
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          };
        } catch (err) {
          const message = describeError(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          return {
            content: [{
              type: "text" as const,
              text: JSON.stringify({
                status: "error",
                tool: name,
                target_host: ctx.targetHost,
                duration_ms: 0,
                command_executed: null,
                error_code: "INTERNAL_ERROR",
                error_category: "state",
                message,
                transient: false,
                remediation: ["Check server logs for details"],
              }),
            }],
            isError: true,
          };
        }
      },
    );
  }

  // ── Phase 5: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, host: ctx.targetHost }, "sysbak-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
