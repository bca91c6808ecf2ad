// Provisioning Sequencer: runs the ordered step list to completion or to the first
// required failure. Steps run strictly one after another; each adapter call is awaited
// before the next begins. Nothing installed by an earlier step is rolled back.
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import { EXIT_CODES } from "./exit-codes.js";
import type { InstallStep, PostProvisionAction, RunReport, StepEnvironment, StepOutcome, StepResult } from "./types.js";

export interface SequenceOptions {
  /** Re-sync the package index once before the first step. */
  refresh: boolean;
  /** Run a full system update after the refresh. */
  upgrade: boolean;
  postActions: readonly PostProvisionAction[];
}

export async function runSequence(env: StepEnvironment, options: SequenceOptions): Promise<RunReport> {
  const { ctx, adapter } = env;

  if (ctx.manager === "none") {
    const error = new ProvisionError(
      ProvisionErrorCode.UNSUPPORTED_ENVIRONMENT,
      `No supported package manager found on ${ctx.platform}`,
    );
    ctx.log.record("error", error.message);
    return { status: "aborted", exitCode: EXIT_CODES.UNSUPPORTED_ENVIRONMENT, results: [], postActionFailures: [] };
  }

  if (options.refresh) {
    const refreshed = await adapter.refresh(ctx);
    if (!refreshed.ok) ctx.log.record("warn", `Package index refresh failed; proceeding: ${refreshed.error.message}`);
  }
  if (options.upgrade) {
    const upgraded = await adapter.upgrade(ctx);
    if (!upgraded.ok) ctx.log.record("warn", `System update failed; proceeding: ${upgraded.error.message}`);
  }

  const results: StepResult[] = [];
  for (const [index, step] of ctx.steps.entries()) {
    ctx.log.record("info", `Step ${index + 1}/${ctx.steps.length}: ${step.name}`);
    const outcome = await runStep(env, step);

    if (outcome.kind !== "failed") {
      results.push({ step: step.name, outcome });
      continue;
    }

    if (step.required) {
      results.push({ step: step.name, outcome });
      ctx.log.record("error", `${step.name} failed: ${outcome.error.message}`, {
        code: outcome.error.code,
        exitCode: step.exitCode,
        ...outcome.error.context,
      });
      return { status: "aborted", exitCode: step.exitCode, results, postActionFailures: [] };
    }

    ctx.log.record("warn", `${step.name} failed and is optional; skipping: ${outcome.error.message}`, { code: outcome.error.code });
    results.push({ step: step.name, outcome: { kind: "skipped", reason: outcome.error.message } });
  }

  const postActionFailures: ProvisionError[] = [];
  for (const action of options.postActions) {
    const done = await action.run(env, results);
    if (!done.ok) {
      ctx.log.record("error", `Post-provisioning action ${action.name} failed: ${done.error.message}`, { code: done.error.code });
      postActionFailures.push(done.error);
    }
  }

  if (postActionFailures.length > 0) {
    return { status: "completed", exitCode: EXIT_CODES.GENERAL_ERROR, results, postActionFailures };
  }
  ctx.log.record("info", "All requested operations completed successfully");
  return { status: "completed", exitCode: EXIT_CODES.SUCCESS, results, postActionFailures };
}

async function runStep(env: StepEnvironment, step: InstallStep): Promise<StepOutcome> {
  const { log } = env.ctx;

  if (step.disabled) {
    log.record("info", `${step.name}: skipped (disabled)`);
    return { kind: "skipped", reason: "disabled" };
  }
  if (await step.isInstalled(env)) {
    log.record("info", `${step.name}: already present`);
    return { kind: "already_present" };
  }

  const installed = await step.install(env);
  if (!installed.ok) return { kind: "failed", error: installed.error };

  // Installers on Windows write the new PATH to the registry only.
  env.probe.refreshPath();
  if (!(await step.isInstalled(env))) {
    return {
      kind: "failed",
      error: new ProvisionError(
        ProvisionErrorCode.VERIFICATION_MISMATCH,
        `${installed.value} reported success but ${step.name} is still not detected`,
        { step: step.name, package: installed.value },
      ),
    };
  }

  log.record("info", `${step.name}: installed (${installed.value})`);
  return { kind: "installed", package: installed.value };
}
