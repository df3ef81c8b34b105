import type { z } from "zod";
import path from "node:path";
import type { PluginContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import { SysbakErrorCode, isSysbakError, describeError } from "../shared/errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number, commandExecuted: string | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, command_executed: commandExecuted, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[] }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs, command_executed: null,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
  };
}

// ── Error Categorization ───────────────────────────────────────────

const ERROR_CATEGORIES: Record<SysbakErrorCode, { category: ErrorCategory; remediation: string[] }> = {
  [SysbakErrorCode.SPAWN_FAILED]: {
    category: "dependency",
    remediation: ["Check that the package manager's list command is installed and on PATH", "Run pkg_detect_managers to see which managers answered their probe"],
  },
  [SysbakErrorCode.CATALOG_NOT_FOUND]: {
    category: "not_found",
    remediation: ["Run pkg_save_catalog on the source host first", "Check storage.base_dir in config.yaml"],
  },
  [SysbakErrorCode.CATALOG_INVALID]: {
    category: "validation",
    remediation: ["The catalog must be a JSON object mapping manager names to arrays of package names", "Re-create it with pkg_save_catalog"],
  },
  [SysbakErrorCode.IO_FAILED]: {
    category: "state",
    remediation: ["Check permissions on the SysBackup directory"],
  },
};

/** Convert a thrown error into an error response. Non-SysbakErrors are rethrown for the server boundary. */
export function errorFromException(tool: string, targetHost: string, durationMs: number, err: unknown): ErrorResponse {
  if (!isSysbakError(err)) throw err;
  const { category, remediation } = ERROR_CATEGORIES[err.code];
  return error(tool, targetHost, durationMs, { code: err.code, category, message: describeError(err), remediation });
}

// ── Context Helpers ────────────────────────────────────────────────

/** Per-command timeout in ms; 0 means wait indefinitely. */
export function commandTimeout(ctx: PluginContext): number {
  return ctx.config.execution.command_timeout_seconds * 1000;
}

/** Directory holding SysBackup/, resolved against the process working directory. */
export function storageDir(ctx: PluginContext): string {
  return path.resolve(ctx.config.storage.base_dir);
}

// ── Tool Registration Helper ───────────────────────────────────────

/** Register a tool whose handler receives arguments already validated against its schema. */
export function registerTool<Shape extends z.ZodRawShape>(
  ctx: PluginContext,
  metadata: Omit<ToolMetadata, "inputSchema"> & { readonly inputSchema: z.ZodObject<Shape> },
  handler: (args: z.infer<z.ZodObject<Shape>>) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (args) => handler(metadata.inputSchema.parse(args)),
  });
}
