import type { CandidateTable } from "../../types/manager.js";
import { EXIT_CODES } from "../exit-codes.js";
import type { InstallStep } from "../types.js";
import type { StepToggle } from "./package-step.js";
import { packageStep } from "./package-step.js";

export const GIT_CANDIDATES: CandidateTable = {
  apt: ["git"],
  dnf: ["git"],
  yum: ["git"],
  pacman: ["git"],
  zypper: ["git"],
  apk: ["git"],
  brew: ["git"],
  winget: ["Git.Git"],
  choco: ["git"],
  scoop: ["git"],
};

export function gitStep(toggle: StepToggle): InstallStep {
  return packageStep({
    name: "git",
    exitCode: EXIT_CODES.GIT_INSTALL_FAILED,
    executables: ["git"],
    candidates: GIT_CANDIDATES,
    ...toggle,
  });
}
