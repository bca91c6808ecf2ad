/**
 * A structured command ready for execution.
 * Adapters never build shell strings for the package manager; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
  /** Hand the terminal's stdin to the child so sudo or the manager can prompt. */
  readonly interactive?: boolean;
}
