import type { SysbakConfig } from "../config/schema.js";
import type { Executor } from "../execution/executor.js";
import type { SafetyGate } from "../safety/gate.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared plugin context, created once at startup and passed to all tool modules.
 */
export interface PluginContext {
  readonly config: SysbakConfig;
  readonly executor: Executor;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  readonly configPath: string;
  readonly firstRun: boolean;
}
