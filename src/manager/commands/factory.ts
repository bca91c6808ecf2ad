import type { SupportedManager } from "../../types/manager.js";
import type { ManagerCommands } from "./interface.js";
import { MANAGER_DEFINITIONS } from "./definitions.js";
import { DeclaredManagerCommands } from "./declared.js";

/** Create the command adapter for a detected manager. */
export function createManagerCommands(kind: SupportedManager): ManagerCommands {
  return new DeclaredManagerCommands(kind, MANAGER_DEFINITIONS[kind]);
}
