import { ProvisionError, ProvisionErrorCode } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";
import { err, ok } from "../../shared/result.js";
import type { CandidateTable } from "../../types/manager.js";
import { candidateName } from "../../types/manager.js";
import { lastErrorLine } from "../../execution/executor.js";
import { EXIT_CODES } from "../exit-codes.js";
import type { InstallStep, StepEnvironment } from "../types.js";
import type { StepToggle } from "./package-step.js";
import { candidatesFor } from "./package-step.js";
import type { RepositorySource } from "./repository.js";
import { ensureRepository } from "./repository.js";

/**
 * Package names for a pinned Python release. Managers that only ship the
 * current release get the generic name; the version check after install decides.
 */
export function pythonCandidates(version: string): CandidateTable {
  const compact = version.replace(".", "");
  return {
    apt: [`python${version}`, "python3"],
    dnf: [`python${version}`, `python${compact}`],
    yum: [`python${version}`, `python${compact}`],
    pacman: ["python"],
    zypper: [`python${compact}`, "python3"],
    apk: ["python3"],
    brew: [`python@${version}`],
    winget: [`Python.Python.${version}`],
    choco: [`python${compact}`],
    scoop: [`versions/python${compact}`, "python"],
  };
}

export function pipCandidates(version: string): CandidateTable {
  const compact = version.replace(".", "");
  return {
    apt: ["python3-pip"],
    dnf: [`python${version}-pip`, "python3-pip"],
    yum: [`python${version}-pip`, "python3-pip"],
    pacman: ["python-pip"],
    zypper: [`python${compact}-pip`, "python3-pip"],
    apk: ["py3-pip"],
  };
}

/** True when `python --version` output names the pinned major.minor release. */
export function reportsVersion(output: string, version: string): boolean {
  const match = /Python (\d+\.\d+)(?:\.\d+)?/.exec(output);
  return match?.[1] === version;
}

/**
 * Find an interpreter for the pinned version: the versioned executable if present,
 * otherwise a generic `python3`/`python` whose reported version matches.
 */
export async function resolvePython(env: StepEnvironment, version: string): Promise<string | null> {
  const pinned = `python${version}`;
  if (env.adapter.isInstalled(pinned)) return pinned;

  for (const executable of ["python3", "python"]) {
    if (!env.adapter.isInstalled(executable)) continue;
    const result = await env.executor.execute({ argv: [executable, "--version"] });
    if (result.exitCode === 0 && reportsVersion(`${result.stdout}\n${result.stderr}`, version)) return executable;
  }
  return null;
}

export interface PythonStepOptions extends StepToggle {
  version: string;
}

/** Ubuntu PPA carrying Python releases the distribution archive does not. */
export function deadsnakesSource(codename: string): RepositorySource {
  return {
    label: "deadsnakes PPA",
    markers: [
      `/etc/apt/sources.list.d/deadsnakes-ubuntu-ppa-${codename}.list`,
      `/etc/apt/sources.list.d/deadsnakes-ubuntu-ppa-${codename}.sources`,
    ],
    prerequisites: ["add-apt-repository"],
    commands: [{ argv: ["add-apt-repository", "-y", "ppa:deadsnakes/ppa"] }],
  };
}

/**
 * apt: the pinned package, then (Ubuntu only) the same package from deadsnakes,
 * then the generic candidates. The pinned interpreter gets its venv module too.
 */
async function installWithApt(env: StepEnvironment, version: string, candidates: CandidateTable): Promise<Result<string>> {
  const { ctx, adapter, probe } = env;
  const pinned = `python${version}`;

  let installed = await adapter.install(ctx, [pinned]);
  const release = probe.osRelease();
  if (!installed.ok && release.ID === "ubuntu") {
    ctx.log.record("warn", `${pinned} is not available from the configured sources; adding the deadsnakes PPA`);
    const added = await ensureRepository(env, deadsnakesSource(release.VERSION_CODENAME ?? release.UBUNTU_CODENAME ?? ""));
    if (added.ok) {
      installed = await adapter.install(ctx, [pinned]);
    } else {
      ctx.log.record("warn", `deadsnakes PPA could not be added: ${added.error.message}`);
    }
  }

  if (installed.ok) {
    const venv = await adapter.install(ctx, [`${pinned}-venv`]);
    if (!venv.ok) ctx.log.record("warn", `${pinned}-venv could not be installed: ${venv.error.message}`);
    return installed;
  }

  const fallback = candidatesFor(ctx.manager, candidates).filter((candidate) => candidate !== pinned);
  ctx.log.record("warn", `${pinned} could not be installed; trying ${fallback.map(candidateName).join(", ")}`);
  return adapter.install(ctx, fallback);
}

/** Keg-only formulae are not linked into the prefix until asked. */
async function linkBrewFormula(env: StepEnvironment, formula: string): Promise<void> {
  const { ctx, adapter } = env;
  const linked = await adapter.run(ctx, { argv: ["brew", "link", "--overwrite", "--force", formula] }, false);
  if (!linked.ok) {
    ctx.log.record("warn", `brew link ${formula} failed: ${linked.error.message}`);
  } else if (linked.value.exitCode !== 0) {
    ctx.log.record("warn", `brew link ${formula} exited with ${linked.value.exitCode}: ${lastErrorLine(linked.value)}`);
  }
}

export function pythonStep(options: PythonStepOptions): InstallStep {
  const candidates = pythonCandidates(options.version);
  return {
    name: "python",
    required: options.required,
    exitCode: EXIT_CODES.PYTHON_INSTALL_FAILED,
    disabled: options.disabled,
    async isInstalled(env) {
      return (await resolvePython(env, options.version)) !== null;
    },
    async install(env) {
      const { ctx, adapter } = env;
      if (ctx.manager === "apt") return installWithApt(env, options.version, candidates);

      const installed = await adapter.install(ctx, candidatesFor(ctx.manager, candidates));
      if (installed.ok && ctx.manager === "brew") await linkBrewFormula(env, installed.value);
      return installed;
    },
  };
}

export function pipStep(options: PythonStepOptions): InstallStep {
  const candidates = pipCandidates(options.version);

  async function bootstrap(env: StepEnvironment): Promise<Result<string>> {
    const { ctx, adapter, executor } = env;
    const python = await resolvePython(env, options.version);
    if (!python) {
      return err(new ProvisionError(
        ProvisionErrorCode.NO_CANDIDATE_AVAILABLE,
        `Python ${options.version} is not installed; pip cannot be bootstrapped`,
      ));
    }

    ctx.log.record("info", `Bootstrapping pip with ${python} -m ensurepip`);
    const ensured = await executor.execute({ argv: [python, "-m", "ensurepip", "--upgrade"] });
    if (ensured.exitCode === 0) return ok("ensurepip");

    ctx.log.record("warn", `ensurepip is unavailable for ${python}; falling back to ${ctx.manager} packages`);
    return adapter.install(ctx, candidatesFor(ctx.manager, candidates));
  }

  return {
    name: "pip",
    required: options.required,
    exitCode: EXIT_CODES.PIP_INSTALL_FAILED,
    disabled: options.disabled,
    async isInstalled(env) {
      const python = await resolvePython(env, options.version);
      if (!python) return false;
      const result = await env.executor.execute({ argv: [python, "-m", "pip", "--version"] });
      return result.exitCode === 0;
    },
    install: bootstrap,
  };
}
