import type { Command } from "../../types/command.js";
import type { PackageCandidate, SupportedManager } from "../../types/manager.js";

export interface CommandOptions {
  nonInteractive: boolean;
}

/**
 * Manager-specific command dispatch.
 * The adapter calls these to express intent; implementations translate to argv.
 * Elevation is applied by the adapter, never here.
 */
export interface ManagerCommands {
  readonly kind: SupportedManager;
  /** Executable whose presence on PATH identifies the manager. */
  readonly executable: string;
  readonly requiresElevation: boolean;
  /** Index re-sync, or null when the manager has none. */
  refresh(options: CommandOptions): Command | null;
  /** Full system update, run in order. */
  upgrade(options: CommandOptions): Command[];
  install(candidate: PackageCandidate, options: CommandOptions): Command;
}
