// CLI entry: parse flags, load config, build the run context and drive the sequencer.
// Host access (probe, executor, log sink, console) is injected so runs can be exercised in-process.
import type { Executor } from "../execution/executor.js";
import { LocalExecutor } from "../execution/executor.js";
import type { SystemProbe } from "../execution/probe.js";
import { LocalProbe } from "../execution/probe.js";
import { loadConfig } from "../config/loader.js";
import { createLogger, pinoSink } from "../logger.js";
import { PackageManagerAdapter } from "../manager/adapter.js";
import { createRunContext } from "../provision/context.js";
import { EXIT_CODES } from "../provision/exit-codes.js";
import { profileLine, verifyInstallation } from "../provision/post-actions.js";
import { runSequence } from "../provision/sequencer.js";
import { errorMessage } from "../shared/errors.js";
import { createDefaultSteps } from "../provision/steps/index.js";
import type { PostProvisionAction } from "../provision/types.js";
import type { ProvisionConfig, StepName } from "../types/config.js";
import type { LogLevel, LogSink } from "../types/log.js";
import type { CliOptions } from "./args.js";
import { USAGE, parseArgs } from "./args.js";

export interface CliDependencies {
  probe: SystemProbe;
  executor: Executor;
  createSink(options: { logFile: string; level: LogLevel }): LogSink;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Home directory used to expand `~` in profile line targets. */
  home?: string;
}

export function defaultDependencies(): CliDependencies {
  return {
    probe: new LocalProbe(),
    executor: new LocalExecutor(),
    createSink: ({ logFile, level }) => pinoSink(createLogger({ logFile, level })),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}

/** Flags win over the config file; skip flags only ever disable steps. */
export function applyOverrides(config: ProvisionConfig, options: CliOptions): ProvisionConfig {
  const steps = { ...config.steps };
  for (const name of options.skip) {
    steps[name] = { ...steps[name], enabled: false };
  }
  return {
    ...config,
    log: { ...config.log, file: options.logFile ?? config.log.file },
    refresh: options.refresh ?? config.refresh,
    upgrade: options.upgrade ?? config.upgrade,
    non_interactive: options.nonInteractive ?? config.non_interactive,
    steps,
  };
}

function postActionsFor(config: ProvisionConfig, home?: string): PostProvisionAction[] {
  const actions: PostProvisionAction[] = [];
  if (config.post.verify) actions.push(verifyInstallation());
  for (const entry of config.post.profile_lines) actions.push(profileLine(entry, home));
  return actions;
}

function disabledSteps(config: ProvisionConfig): StepName[] {
  const names: StepName[] = ["python", "pip", "git", "password_manager"];
  return names.filter((name) => !config.steps[name].enabled);
}

/** Run the provisioner and resolve with the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies = defaultDependencies()): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    deps.stderr(`${parsed.error.message}\n\n${USAGE}`);
    return EXIT_CODES.INVALID_ARGUMENTS;
  }
  if (parsed.value.help) {
    deps.stdout(USAGE);
    return EXIT_CODES.SUCCESS;
  }

  const loaded = loadConfig(parsed.value.configPath);
  if (!loaded.ok) {
    deps.stderr(`${loaded.error.message}\n`);
    return EXIT_CODES.INVALID_ARGUMENTS;
  }

  const config = applyOverrides(loaded.value.config, parsed.value);
  let log: LogSink;
  try {
    log = deps.createSink({ logFile: config.log.file, level: config.log.level });
  } catch (error) {
    deps.stderr(`Cannot open log file ${config.log.file}: ${errorMessage(error)}\n`);
    return EXIT_CODES.GENERAL_ERROR;
  }
  for (const warning of loaded.value.warnings) log.record("warn", warning);
  if (loaded.value.firstRun) log.record("info", `Wrote default configuration to ${loaded.value.configPath}`);
  log.record("info", "Starting provisioning", {
    config: loaded.value.configPath,
    logFile: config.log.file,
    nonInteractive: config.non_interactive,
    refresh: config.refresh,
    upgrade: config.upgrade,
    skipped: disabledSteps(config),
  });

  try {
    const adapter = new PackageManagerAdapter(deps.probe, deps.executor);
    const ctx = createRunContext(adapter, deps.probe, {
      nonInteractive: config.non_interactive,
      steps: createDefaultSteps(config),
      log,
    });
    const report = await runSequence(
      { ctx, adapter, executor: deps.executor, probe: deps.probe },
      { refresh: config.refresh, upgrade: config.upgrade, postActions: postActionsFor(config, deps.home) },
    );

    const summary = report.results.map((r) => `${r.step}=${r.outcome.kind}`).join(" ");
    log.record(report.exitCode === EXIT_CODES.SUCCESS ? "info" : "error", `Provisioning ${report.status} with exit code ${report.exitCode}`, {
      summary,
    });
    return report.exitCode;
  } catch (error) {
    log.record("error", `Unexpected failure: ${errorMessage(error)}`);
    return EXIT_CODES.GENERAL_ERROR;
  }
}
