import type { SystemProbe } from "../execution/probe.js";
import type { PackageManagerKind, SupportedManager } from "../types/manager.js";
import { MANAGER_DEFINITIONS } from "./commands/definitions.js";

/** Managers probed per platform, native manager first. */
export const DETECTION_ORDER: Partial<Record<NodeJS.Platform, readonly SupportedManager[]>> = {
  linux: ["apt", "dnf", "yum", "pacman", "zypper", "apk", "brew"],
  darwin: ["brew"],
  win32: ["winget", "choco", "scoop"],
};

/** Resolve the package manager for this host, or `none` when no known manager is on PATH. */
export function detectPackageManager(probe: SystemProbe): PackageManagerKind {
  const order = DETECTION_ORDER[probe.platform] ?? [];
  return order.find((kind) => probe.which(MANAGER_DEFINITIONS[kind].executable) !== null) ?? "none";
}
