import type { Command } from "../../types/command.js";
import type { PackageCandidate, SupportedManager } from "../../types/manager.js";
import { candidateName } from "../../types/manager.js";
import type { CommandOptions, ManagerCommands } from "./interface.js";
import type { ManagerDefinition } from "./definitions.js";

/** ManagerCommands backed by a row of the definition table. */
export class DeclaredManagerCommands implements ManagerCommands {
  constructor(
    readonly kind: SupportedManager,
    private readonly definition: ManagerDefinition,
  ) {}

  get executable(): string {
    return this.definition.executable;
  }

  get requiresElevation(): boolean {
    return this.definition.requiresElevation;
  }

  refresh(options: CommandOptions): Command | null {
    const { refresh } = this.definition;
    return refresh ? this.command(refresh, options) : null;
  }

  upgrade(options: CommandOptions): Command[] {
    return this.definition.upgrade.map((argv) => this.command(argv, options));
  }

  install(candidate: PackageCandidate, options: CommandOptions): Command {
    const cask = typeof candidate !== "string" && candidate.cask;
    return this.command(this.definition.install(candidateName(candidate), cask), options);
  }

  private command(argv: readonly string[], options: CommandOptions): Command {
    if (options.nonInteractive) {
      const env = this.definition.nonInteractiveEnv;
      return env ? { argv, env } : { argv };
    }
    return { argv, interactive: true };
  }
}
