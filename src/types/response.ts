/** Error categories reported to the client. */
export type ErrorCategory =
  | "not_found"
  | "dependency"
  | "validation"
  | "state";

/** Fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "confirmation_required";
  tool: string;
  target_host: string;
  duration_ms: number;
  command_executed: string | null;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  total?: number;
  summary?: string;
  dry_run?: boolean;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  transient: boolean;
  remediation: string[];
}

/** Returned by the safety gate when a state-changing call lacks confirmation. */
export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  risk_level: string;
  dry_run_available: boolean;
  preview: {
    command: string;
    description: string;
    warnings: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
