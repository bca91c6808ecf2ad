import type { ProvisionConfig, StepConfig } from "../../types/config.js";
import type { InstallStep } from "../types.js";
import { gitStep } from "./git.js";
import { passwordManagerStep } from "./password-manager.js";
import type { StepToggle } from "./package-step.js";
import { pipStep, pythonStep } from "./python.js";

function toggle(step: StepConfig): StepToggle {
  return { required: step.required, disabled: !step.enabled };
}

/** The fixed provisioning order: Python, pip, Git, password manager. */
export function createDefaultSteps(config: ProvisionConfig): InstallStep[] {
  const { steps, python } = config;
  return [
    pythonStep({ version: python.version, ...toggle(steps.python) }),
    pipStep({ version: python.version, ...toggle(steps.pip) }),
    gitStep(toggle(steps.git)),
    passwordManagerStep(toggle(steps.password_manager)),
  ];
}
