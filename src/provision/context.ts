import type { SystemProbe } from "../execution/probe.js";
import type { PackageManagerAdapter } from "../manager/adapter.js";
import type { LogSink } from "../types/log.js";
import type { InstallStep, RunContext } from "./types.js";

export interface RunContextOptions {
  nonInteractive: boolean;
  steps: readonly InstallStep[];
  log: LogSink;
}

/**
 * Resolve the run context. The package manager is detected here, exactly once;
 * a `none` result is carried through so the sequencer can abort before any step.
 */
export function createRunContext(adapter: PackageManagerAdapter, probe: SystemProbe, options: RunContextOptions): RunContext {
  const manager = adapter.detect();
  const elevation = probe.elevation();

  if (manager !== "none") {
    options.log.record("info", `Detected package manager: ${manager}`, { platform: probe.platform, elevation });
  }

  return Object.freeze({
    platform: probe.platform,
    manager,
    nonInteractive: options.nonInteractive,
    elevation,
    steps: Object.freeze([...options.steps]),
    log: options.log,
  });
}
