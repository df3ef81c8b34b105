import type { ManagerId, PackageName } from "../types/manager.js";

/**
 * Side channel for the reason behind a false result from the installed
 * check or the installer. The boolean results stay the only control signal.
 */
export interface Diagnostic {
  readonly manager: ManagerId;
  readonly package: PackageName;
  readonly kind: "spawn_failure" | "non_zero_exit";
  readonly detail: string;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;
