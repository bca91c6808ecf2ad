import type { LogLevel } from "./log.js";

export type StepName = "python" | "pip" | "git" | "password_manager";

export interface StepConfig {
  enabled: boolean;
  required: boolean;
}

export interface ProfileLine {
  file: string;
  line: string;
}

/** Full provisioning configuration, as read from config.yaml and merged with defaults. */
export interface ProvisionConfig {
  log: {
    file: string;
    level: LogLevel;
  };
  refresh: boolean;
  upgrade: boolean;
  non_interactive: boolean;
  python: {
    version: string;
  };
  steps: Record<StepName, StepConfig>;
  post: {
    verify: boolean;
    profile_lines: ProfileLine[];
  };
}
