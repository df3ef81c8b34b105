// Safety gate: checked by every state-changing tool before it executes.
// A tool at or above the configured threshold must be called again with confirmed: true,
// unless it is a dry run and dry runs bypass confirmation.
import type { RiskLevel } from "../types/risk.js";
import { RISK_ORDER } from "../types/risk.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

export class SafetyGate {
  private readonly threshold: RiskLevel;
  private readonly dryRunBypass: boolean;

  constructor(config: { confirmation_threshold: RiskLevel; dry_run_bypass_confirmation: boolean }) {
    this.threshold = config.confirmation_threshold;
    this.dryRunBypass = config.dry_run_bypass_confirmation;
  }

  /** Returns null if the call may proceed, otherwise the confirmation request to send back. */
  check(params: {
    toolName: string;
    toolRiskLevel: RiskLevel;
    targetHost: string;
    command: string;
    description: string;
    warnings?: string[];
    confirmed?: boolean;
    dryRun?: boolean;
  }): ConfirmationResponse | null {
    if (params.dryRun && this.dryRunBypass) return null;
    if (RISK_ORDER[params.toolRiskLevel] < RISK_ORDER[this.threshold]) return null;
    if (params.confirmed) {
      logger.info({ tool: params.toolName, risk: params.toolRiskLevel }, "Confirmed operation proceeding");
      return null;
    }

    logger.info({ tool: params.toolName, risk: params.toolRiskLevel }, "Confirmation required");
    return {
      status: "confirmation_required",
      tool: params.toolName,
      target_host: params.targetHost,
      duration_ms: 0,
      command_executed: null,
      risk_level: params.toolRiskLevel,
      dry_run_available: true,
      preview: {
        command: params.command,
        description: params.description,
        warnings: params.warnings ?? [],
      },
    };
  }
}
