export { runCli, applyOverrides, defaultDependencies } from "./cli/index.js";
export type { CliDependencies } from "./cli/index.js";
export { parseArgs, USAGE } from "./cli/args.js";
export type { CliOptions } from "./cli/args.js";
export { loadConfig, configSchema, deepMerge, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH, DEFAULT_CONFIG_YAML } from "./config/loader.js";
export type { ConfigResult } from "./config/loader.js";
export { createLogger, pinoSink } from "./logger.js";
export { LocalExecutor, lastErrorLine, SPAWN_FAILURE_EXIT_CODE } from "./execution/executor.js";
export type { ExecResult, Executor } from "./execution/executor.js";
export { LocalProbe } from "./execution/probe.js";
export type { SystemProbe } from "./execution/probe.js";
export { PackageManagerAdapter, elevate } from "./manager/adapter.js";
export type { AdapterContext, CandidateAttempt } from "./manager/adapter.js";
export { detectPackageManager, DETECTION_ORDER } from "./manager/detector.js";
export { diagnoseFailure } from "./manager/diagnostics.js";
export type { FailureDiagnosis, FailureKind } from "./manager/diagnostics.js";
export { createManagerCommands } from "./manager/commands/factory.js";
export { MANAGER_DEFINITIONS } from "./manager/commands/definitions.js";
export type { ManagerDefinition } from "./manager/commands/definitions.js";
export type { CommandOptions, ManagerCommands } from "./manager/commands/interface.js";
export { createRunContext } from "./provision/context.js";
export { runSequence } from "./provision/sequencer.js";
export type { SequenceOptions } from "./provision/sequencer.js";
export { EXIT_CODES } from "./provision/exit-codes.js";
export type { ExitCode } from "./provision/exit-codes.js";
export { profileLine, verifyInstallation, expandHome } from "./provision/post-actions.js";
export { createDefaultSteps } from "./provision/steps/index.js";
export { packageStep, candidatesFor, anyPresent, onPath, fileOnPlatform, brewCask } from "./provision/steps/package-step.js";
export type { PresenceCheck } from "./provision/steps/package-step.js";
export { ensureRepository } from "./provision/steps/repository.js";
export type { RepositorySource } from "./provision/steps/repository.js";
export { gitStep } from "./provision/steps/git.js";
export { pythonStep, pipStep, pythonCandidates, pipCandidates, reportsVersion, deadsnakesSource } from "./provision/steps/python.js";
export { passwordManagerStep } from "./provision/steps/password-manager.js";
export type * from "./provision/types.js";
export { ProvisionError, ProvisionErrorCode } from "./shared/errors.js";
export { ok, err } from "./shared/result.js";
export type { Result } from "./shared/result.js";
export type * from "./types/command.js";
export type * from "./types/config.js";
export type * from "./types/log.js";
export type { Elevation, PackageCandidate, CandidateTable, PackageManagerKind, SupportedManager } from "./types/manager.js";
export { candidateName } from "./types/manager.js";
