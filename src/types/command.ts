/**
 * A structured command ready for execution.
 * Manager adapters never build shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  /** Drop the child's stdout/stderr instead of buffering them. */
  readonly discardOutput?: boolean;
}
