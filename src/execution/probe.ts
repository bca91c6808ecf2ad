import { accessSync, constants, existsSync, readFileSync, statSync } from "node:fs";
import { execSync } from "node:child_process";
import { delimiter, join } from "node:path";
import type { Elevation } from "../types/manager.js";

/**
 * Read-only view of the host: platform, PATH lookups, file presence and privilege.
 * Nothing here invokes a package manager.
 */
export interface SystemProbe {
  readonly platform: NodeJS.Platform;
  /** Absolute path of an executable resolved on PATH, or null. */
  which(executable: string): string | null;
  fileExists(path: string): boolean;
  elevation(): Elevation;
  /** /etc/os-release as key-value pairs; empty where there is none. */
  osRelease(): Record<string, string>;
  /**
   * Pick up PATH entries an installer registered after this process started.
   * Windows installers write them to the registry; elsewhere this is a no-op.
   */
  refreshPath(): void;
}

export class LocalProbe implements SystemProbe {
  readonly platform: NodeJS.Platform = process.platform;

  which(executable: string): string | null {
    const dirs = (process.env.PATH ?? "").split(delimiter).filter(Boolean);
    // Windows resolves bare names through PATHEXT; elsewhere the name is used as-is.
    const extensions = this.platform === "win32"
      ? ["", ...(process.env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD").split(";").filter(Boolean)]
      : [""];

    for (const dir of dirs) {
      for (const ext of extensions) {
        const candidate = join(dir, executable + ext);
        if (isExecutableFile(candidate, this.platform)) return candidate;
      }
    }
    return null;
  }

  fileExists(path: string): boolean {
    return existsSync(path);
  }

  elevation(): Elevation {
    if (this.platform === "win32") {
      // `net session` only succeeds from an elevated shell.
      try {
        execSync("net session", { stdio: "ignore" });
        return "admin";
      } catch {
        return "none";
      }
    }
    if (process.getuid?.() === 0) return "root";
    return this.which("sudo") ? "sudo" : "none";
  }

  osRelease(): Record<string, string> {
    try {
      return parseOsRelease(readFileSync("/etc/os-release", "utf-8"));
    } catch {
      return {};
    }
  }

  refreshPath(): void {
    if (this.platform !== "win32") return;
    const machine = readRegistryPath("HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment");
    const user = readRegistryPath("HKCU\\Environment");
    process.env.PATH = mergePathLists([machine, user, process.env.PATH ?? null], ";");
  }
}

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = /^([A-Z_]+)=(.*)$/.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** The `Path` value from `reg query <key> /v Path` output, with %VAR% references expanded. */
export function parseRegistryPath(output: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const match = /^\s*Path\s+REG_(?:EXPAND_)?SZ\s+(.*)$/im.exec(output);
  if (!match?.[1]) return null;
  return match[1].trim().replace(/%([^%]+)%/g, (whole, name: string) => env[name] ?? whole);
}

/** Join PATH lists in priority order, dropping empty and repeated entries (case-insensitive). */
export function mergePathLists(lists: readonly (string | null)[], separator: string): string {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const list of lists) {
    for (const entry of (list ?? "").split(separator)) {
      const trimmed = entry.trim();
      const key = trimmed.toLowerCase();
      if (!trimmed || seen.has(key)) continue;
      seen.add(key);
      merged.push(trimmed);
    }
  }
  return merged.join(separator);
}

function readRegistryPath(key: string): string | null {
  try {
    return parseRegistryPath(execSync(`reg query "${key}" /v Path`, { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"] }));
  } catch {
    return null;
  }
}

function isExecutableFile(path: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (platform !== "win32") accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
