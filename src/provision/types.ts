import type { Executor } from "../execution/executor.js";
import type { SystemProbe } from "../execution/probe.js";
import type { PackageManagerAdapter } from "../manager/adapter.js";
import type { ProvisionError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { LogSink } from "../types/log.js";
import type { Elevation, PackageManagerKind } from "../types/manager.js";

/**
 * Per-run state, created once at startup and passed to every component.
 * Only the log sink is written to after creation.
 */
export interface RunContext {
  readonly platform: NodeJS.Platform;
  readonly manager: PackageManagerKind;
  readonly nonInteractive: boolean;
  readonly elevation: Elevation;
  readonly steps: readonly InstallStep[];
  readonly log: LogSink;
}

/** What a step's capabilities are handed when the sequencer calls them. */
export interface StepEnvironment {
  readonly ctx: RunContext;
  readonly adapter: PackageManagerAdapter;
  readonly executor: Executor;
  readonly probe: SystemProbe;
}

export interface InstallStep {
  readonly name: string;
  /** A failed required step aborts the run; a failed optional step is skipped. */
  readonly required: boolean;
  /** Process exit code reported when this step aborts the run. */
  readonly exitCode: number;
  /** Set by skip flags or config; the step is recorded as skipped without being checked. */
  readonly disabled?: boolean;
  isInstalled(env: StepEnvironment): Promise<boolean>;
  /** Resolves with the canonical name of what was installed. */
  install(env: StepEnvironment): Promise<Result<string>>;
}

export type StepOutcome =
  | { readonly kind: "already_present" }
  | { readonly kind: "installed"; readonly package: string }
  | { readonly kind: "skipped"; readonly reason: string }
  | { readonly kind: "failed"; readonly error: ProvisionError };

export interface StepResult {
  readonly step: string;
  readonly outcome: StepOutcome;
}

/** Work that runs once every step has completed; never after an abort. */
export interface PostProvisionAction {
  readonly name: string;
  run(env: StepEnvironment, results: readonly StepResult[]): Promise<Result<void>>;
}

export interface RunReport {
  readonly status: "completed" | "aborted";
  readonly exitCode: number;
  readonly results: readonly StepResult[];
  readonly postActionFailures: readonly ProvisionError[];
}
