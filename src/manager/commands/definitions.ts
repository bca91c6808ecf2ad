// Declarative table of supported package managers.
// Adding a manager means adding a SupportedManager member, a row here and a place in
// DETECTION_ORDER (../detector.ts); nothing else branches on the manager kind.
import type { SupportedManager } from "../../types/manager.js";

export interface ManagerDefinition {
  readonly executable: string;
  readonly requiresElevation: boolean;
  readonly refresh: readonly string[] | null;
  readonly upgrade: readonly (readonly string[])[];
  /** Install argv for a single package; every variant carries the manager's assume-yes flags. */
  install(name: string, cask: boolean): readonly string[];
  readonly nonInteractiveEnv?: Record<string, string>;
}

export const MANAGER_DEFINITIONS: Record<SupportedManager, ManagerDefinition> = {
  apt: {
    executable: "apt-get",
    requiresElevation: true,
    refresh: ["apt-get", "update", "-y"],
    upgrade: [["apt-get", "upgrade", "-y"]],
    install: (name) => ["apt-get", "install", "-y", name],
    nonInteractiveEnv: { DEBIAN_FRONTEND: "noninteractive" },
  },
  dnf: {
    executable: "dnf",
    requiresElevation: true,
    refresh: ["dnf", "makecache", "-y"],
    upgrade: [["dnf", "upgrade", "-y"]],
    install: (name) => ["dnf", "install", "-y", name],
  },
  yum: {
    executable: "yum",
    requiresElevation: true,
    refresh: ["yum", "makecache", "-y"],
    upgrade: [["yum", "update", "-y"]],
    install: (name) => ["yum", "install", "-y", name],
  },
  pacman: {
    executable: "pacman",
    requiresElevation: true,
    refresh: ["pacman", "-Sy", "--noconfirm"],
    upgrade: [["pacman", "-Syu", "--noconfirm"]],
    install: (name) => ["pacman", "-S", "--needed", "--noconfirm", name],
  },
  zypper: {
    executable: "zypper",
    requiresElevation: true,
    refresh: ["zypper", "--non-interactive", "refresh"],
    upgrade: [["zypper", "--non-interactive", "update"]],
    install: (name) => ["zypper", "--non-interactive", "install", name],
  },
  apk: {
    executable: "apk",
    requiresElevation: true,
    refresh: ["apk", "update"],
    upgrade: [["apk", "upgrade"]],
    install: (name) => ["apk", "add", "--no-cache", name],
  },
  brew: {
    // Homebrew refuses to run as root.
    executable: "brew",
    requiresElevation: false,
    refresh: ["brew", "update"],
    upgrade: [["brew", "upgrade"]],
    install: (name, cask) => (cask ? ["brew", "install", "--cask", name] : ["brew", "install", name]),
    nonInteractiveEnv: { HOMEBREW_NO_AUTO_UPDATE: "1", NONINTERACTIVE: "1" },
  },
  winget: {
    executable: "winget",
    requiresElevation: false,
    refresh: ["winget", "source", "update"],
    upgrade: [["winget", "upgrade", "--all", "--silent", "--accept-package-agreements", "--accept-source-agreements"]],
    install: (name) => [
      "winget", "install", "--exact", "--id", name, "--silent",
      "--accept-package-agreements", "--accept-source-agreements",
    ],
  },
  choco: {
    executable: "choco",
    requiresElevation: true,
    refresh: null,
    upgrade: [["choco", "upgrade", "all", "-y", "--no-progress"]],
    install: (name) => ["choco", "install", name, "-y", "--no-progress"],
  },
  scoop: {
    executable: "scoop",
    requiresElevation: false,
    refresh: ["scoop", "update"],
    upgrade: [["scoop", "update", "*"]],
    install: (name) => ["scoop", "install", name],
  },
};
