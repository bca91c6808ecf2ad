import type { CandidateTable, PackageCandidate, PackageManagerKind } from "../../types/manager.js";
import type { InstallStep, StepEnvironment } from "../types.js";

export interface StepToggle {
  required: boolean;
  disabled: boolean;
}

export function candidatesFor(manager: PackageManagerKind, table: CandidateTable): readonly PackageCandidate[] {
  return manager === "none" ? [] : table[manager] ?? [];
}

/** One way of finding a step's software on the host. */
export type PresenceCheck = (env: StepEnvironment) => Promise<boolean>;

export function onPath(executables: readonly string[]): PresenceCheck {
  return async ({ adapter }) => executables.some((executable) => adapter.isInstalled(executable));
}

/** A file or bundle that only exists on one platform, e.g. a macOS `.app`. */
export function fileOnPlatform(platform: NodeJS.Platform, path: string): PresenceCheck {
  return async ({ ctx, probe }) => ctx.platform === platform && probe.fileExists(path);
}

/** Casks land in /Applications, not on PATH; Homebrew's own records decide. */
export function brewCask(name: string): PresenceCheck {
  return async ({ ctx, adapter }) => {
    if (ctx.manager !== "brew") return false;
    const listed = await adapter.run(ctx, { argv: ["brew", "list", "--cask", name] }, false);
    return listed.ok && listed.value.exitCode === 0;
  };
}

/** Checks run in order and stop at the first hit. */
export async function anyPresent(env: StepEnvironment, checks: readonly PresenceCheck[]): Promise<boolean> {
  for (const check of checks) {
    if (await check(env)) return true;
  }
  return false;
}

export interface PackageStepOptions extends StepToggle {
  name: string;
  exitCode: number;
  /** Any one of these on PATH means the step is satisfied. */
  executables: readonly string[];
  candidates: CandidateTable;
}

/** A step that is satisfied by an executable and installed through the adapter's candidate list. */
export function packageStep(options: PackageStepOptions): InstallStep {
  const present = onPath(options.executables);
  return {
    name: options.name,
    required: options.required,
    exitCode: options.exitCode,
    disabled: options.disabled,
    isInstalled: present,
    install({ ctx, adapter }) {
      return adapter.install(ctx, candidatesFor(ctx.manager, options.candidates));
    },
  };
}
