// Third-party package sources (vendor repositories, PPAs) that must be configured before
// the manager can see a package. Setup is skipped once any of the source's files exists.
import { lastErrorLine } from "../../execution/executor.js";
import { ProvisionError, ProvisionErrorCode } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";
import { err, ok } from "../../shared/result.js";
import type { Command } from "../../types/command.js";
import type { CandidateTable } from "../../types/manager.js";
import type { StepEnvironment } from "../types.js";
import { candidatesFor } from "./package-step.js";

export type PrerequisiteTool = "curl" | "gpg" | "add-apt-repository";

export const PREREQUISITE_CANDIDATES: Record<PrerequisiteTool, CandidateTable> = {
  curl: { apt: ["curl"], dnf: ["curl"], yum: ["curl"], zypper: ["curl"] },
  gpg: { apt: ["gnupg"], dnf: ["gnupg2"], yum: ["gnupg2"], zypper: ["gpg2", "gnupg"] },
  "add-apt-repository": { apt: ["software-properties-common"] },
};

export interface RepositorySource {
  /** Used in log lines: "<label> repository already configured". */
  readonly label: string;
  /** Any of these existing means the repository is configured. */
  readonly markers: readonly string[];
  readonly prerequisites: readonly PrerequisiteTool[];
  /** Run elevated, in order. */
  readonly commands: readonly Command[];
}

function setupFailed(message: string, context?: Record<string, unknown>): Result<never> {
  return err(new ProvisionError(ProvisionErrorCode.REPOSITORY_SETUP_FAILED, message, context));
}

export async function ensureRepository(env: StepEnvironment, source: RepositorySource): Promise<Result<void>> {
  const { ctx, adapter, probe } = env;
  const marker = source.markers.find((path) => probe.fileExists(path));
  if (marker !== undefined) {
    ctx.log.record("info", `${source.label} repository already configured`, { marker });
    return ok(undefined);
  }

  for (const tool of source.prerequisites) {
    if (adapter.isInstalled(tool)) continue;
    ctx.log.record("info", `Installing prerequisite tool: ${tool}`);
    const installed = await adapter.install(ctx, candidatesFor(ctx.manager, PREREQUISITE_CANDIDATES[tool]));
    if (!installed.ok) {
      return setupFailed(`Prerequisite ${tool} could not be installed: ${installed.error.message}`, installed.error.context);
    }
  }

  ctx.log.record("info", `Configuring ${source.label} repository`, { manager: ctx.manager });
  for (const command of source.commands) {
    const result = await adapter.run(ctx, command, true);
    if (!result.ok) return setupFailed(result.error.message, { cause: result.error.code });
    if (result.value.exitCode !== 0) {
      return setupFailed(
        `${command.argv.join(" ")} exited with ${result.value.exitCode}: ${lastErrorLine(result.value)}`,
        { exitCode: result.value.exitCode },
      );
    }
  }

  const refreshed = await adapter.refresh(ctx);
  if (!refreshed.ok) ctx.log.record("warn", `Package index refresh failed after adding the repository: ${refreshed.error.message}`);
  return ok(undefined);
}
