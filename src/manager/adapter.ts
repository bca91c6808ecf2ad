// Package Manager Adapter: the one place that spawns package-manager processes.
// Calls are awaited one at a time by the sequencer; nothing here runs two manager
// processes concurrently, since they contend for the same package database lock.
import type { Command } from "../types/command.js";
import type { LogSink } from "../types/log.js";
import type { Elevation, PackageCandidate, PackageManagerKind } from "../types/manager.js";
import { candidateName } from "../types/manager.js";
import type { ExecResult, Executor } from "../execution/executor.js";
import { lastErrorLine } from "../execution/executor.js";
import type { SystemProbe } from "../execution/probe.js";
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { ManagerCommands } from "./commands/interface.js";
import { createManagerCommands } from "./commands/factory.js";
import { detectPackageManager } from "./detector.js";
import { diagnoseFailure } from "./diagnostics.js";

/** The slice of the run context the adapter reads. */
export interface AdapterContext {
  readonly manager: PackageManagerKind;
  readonly nonInteractive: boolean;
  readonly elevation: Elevation;
  readonly log: LogSink;
}

export interface CandidateAttempt {
  candidate: string;
  exitCode: number;
  error: string;
  hint: string | null;
}

/**
 * Prefix a command for the available privilege.
 * sudo resets the environment, so variables are passed through `env` on the sudo side.
 */
export function elevate(command: Command, elevation: Elevation, nonInteractive: boolean): Command {
  if (elevation !== "sudo") return command;
  const sudo = nonInteractive ? ["sudo", "-n"] : ["sudo"];
  const envArgs = command.env
    ? ["env", ...Object.entries(command.env).map(([key, value]) => `${key}=${value}`)]
    : [];
  return { ...command, argv: [...sudo, ...envArgs, ...command.argv] };
}

export class PackageManagerAdapter {
  constructor(
    private readonly probe: SystemProbe,
    private readonly executor: Executor,
  ) {}

  detect(): PackageManagerKind {
    return detectPackageManager(this.probe);
  }

  /** PATH lookup only; never invokes the manager. */
  isInstalled(executable: string): boolean {
    return this.probe.which(executable) !== null;
  }

  async refresh(ctx: AdapterContext): Promise<Result<void>> {
    const commands = this.commandsFor(ctx);
    if (!commands.ok) return commands;

    const command = commands.value.refresh({ nonInteractive: ctx.nonInteractive });
    if (!command) {
      ctx.log.record("debug", `${ctx.manager} has no index refresh`);
      return ok(undefined);
    }

    ctx.log.record("info", `Refreshing ${ctx.manager} package index`);
    const result = await this.run(ctx, command, commands.value.requiresElevation);
    if (!result.ok) {
      return err(new ProvisionError(ProvisionErrorCode.INDEX_REFRESH_FAILED, result.error.message, result.error.context));
    }
    if (result.value.exitCode !== 0) {
      return err(new ProvisionError(
        ProvisionErrorCode.INDEX_REFRESH_FAILED,
        `${command.argv.join(" ")} exited with ${result.value.exitCode}: ${lastErrorLine(result.value)}`,
        { manager: ctx.manager, exitCode: result.value.exitCode },
      ));
    }
    return ok(undefined);
  }

  /** Full system update; commands run in order and the first failure stops the sequence. */
  async upgrade(ctx: AdapterContext): Promise<Result<void>> {
    const commands = this.commandsFor(ctx);
    if (!commands.ok) return commands;

    ctx.log.record("info", `Upgrading system packages via ${ctx.manager}`);
    for (const command of commands.value.upgrade({ nonInteractive: ctx.nonInteractive })) {
      const result = await this.run(ctx, command, commands.value.requiresElevation);
      if (!result.ok) return result;
      if (result.value.exitCode !== 0) {
        return err(new ProvisionError(
          ProvisionErrorCode.UPGRADE_FAILED,
          `${command.argv.join(" ")} exited with ${result.value.exitCode}: ${lastErrorLine(result.value)}`,
          { manager: ctx.manager, exitCode: result.value.exitCode },
        ));
      }
    }
    return ok(undefined);
  }

  /**
   * Try each candidate in order and return the canonical name of the first that installs.
   * A failed candidate is never retried; the next one is tried instead.
   */
  async install(ctx: AdapterContext, candidates: readonly PackageCandidate[]): Promise<Result<string>> {
    const commands = this.commandsFor(ctx);
    if (!commands.ok) return commands;
    const manager = commands.value;

    if (candidates.length === 0) {
      return err(new ProvisionError(
        ProvisionErrorCode.NO_CANDIDATE_AVAILABLE,
        `No package candidates are declared for ${ctx.manager}`,
        { manager: ctx.manager, attempted: [] },
      ));
    }
    const privilege = this.checkPrivilege(ctx, manager.requiresElevation);
    if (!privilege.ok) return privilege;

    const attempts: CandidateAttempt[] = [];
    for (const candidate of candidates) {
      const name = candidateName(candidate);
      const planned = manager.install(candidate, { nonInteractive: ctx.nonInteractive });
      const command = manager.requiresElevation ? elevate(planned, ctx.elevation, ctx.nonInteractive) : planned;
      ctx.log.record("info", `Installing ${name} via ${ctx.manager}`);

      const result = await this.executor.execute(command);
      this.recordOutput(ctx, command, result);
      if (result.exitCode === 0) {
        ctx.log.record("info", `Installed ${name} via ${ctx.manager}`, { durationMs: result.durationMs });
        return ok(name);
      }

      const attempt: CandidateAttempt = {
        candidate: name,
        exitCode: result.exitCode,
        error: lastErrorLine(result),
        hint: diagnoseFailure(`${result.stderr}\n${result.stdout}`).hint,
      };
      attempts.push(attempt);
      ctx.log.record("warn", `Candidate ${name} failed via ${ctx.manager} (exit ${result.exitCode})`, { ...attempt });
    }

    const last = attempts[attempts.length - 1];
    return err(new ProvisionError(
      ProvisionErrorCode.NO_CANDIDATE_AVAILABLE,
      `No candidate could be installed via ${ctx.manager} (tried ${attempts.map((a) => a.candidate).join(", ")})`,
      { manager: ctx.manager, attempted: attempts.map((a) => a.candidate), lastError: last?.error, hint: last?.hint, attempts },
    ));
  }

  /**
   * Run an auxiliary command (repository setup, key import) with the manager's privilege rules.
   * The exit code is returned as-is; only a missing privilege is an error.
   */
  async run(ctx: AdapterContext, command: Command, elevated: boolean): Promise<Result<ExecResult>> {
    const privilege = this.checkPrivilege(ctx, elevated);
    if (!privilege.ok) return privilege;

    const prepared = elevated ? elevate(command, ctx.elevation, ctx.nonInteractive) : command;
    const result = await this.executor.execute(prepared);
    this.recordOutput(ctx, prepared, result);
    return ok(result);
  }

  private commandsFor(ctx: AdapterContext): Result<ManagerCommands> {
    if (ctx.manager === "none") {
      return err(new ProvisionError(ProvisionErrorCode.UNSUPPORTED_ENVIRONMENT, "No supported package manager detected"));
    }
    return ok(createManagerCommands(ctx.manager));
  }

  private checkPrivilege(ctx: AdapterContext, elevated: boolean): Result<void> {
    if (elevated && ctx.elevation === "none") {
      return err(new ProvisionError(
        ProvisionErrorCode.PRIVILEGE_REQUIRED,
        `${ctx.manager} requires elevated privileges (run as root/administrator or install sudo)`,
        { manager: ctx.manager },
      ));
    }
    return ok(undefined);
  }

  private recordOutput(ctx: AdapterContext, command: Command, result: ExecResult): void {
    ctx.log.record("debug", `$ ${command.argv.join(" ")}`, {
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }
}
