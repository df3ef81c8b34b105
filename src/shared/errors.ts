export enum SysbakErrorCode {
  SPAWN_FAILED = "SPAWN_FAILED",
  CATALOG_NOT_FOUND = "CATALOG_NOT_FOUND",
  CATALOG_INVALID = "CATALOG_INVALID",
  IO_FAILED = "IO_FAILED",
}

export class SysbakError extends Error {
  readonly code: SysbakErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SysbakErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "SysbakError";
    this.code = code;
    this.context = context;
  }
}

export function isSysbakError(err: unknown): err is SysbakError {
  return err instanceof SysbakError;
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
