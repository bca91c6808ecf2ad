import { appendFile, mkdir, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { ProvisionError, ProvisionErrorCode, errorMessage } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { ProfileLine } from "../types/config.js";
import type { PostProvisionAction } from "./types.js";

/** Re-check every step that ended installed or present. */
export function verifyInstallation(): PostProvisionAction {
  return {
    name: "verify-installation",
    async run(env, results) {
      const missing: string[] = [];
      for (const step of env.ctx.steps) {
        const outcome = results.find((r) => r.step === step.name)?.outcome;
        if (outcome?.kind !== "installed" && outcome?.kind !== "already_present") continue;
        if (await step.isInstalled(env)) {
          env.ctx.log.record("info", `Verified ${step.name}`);
        } else {
          missing.push(step.name);
        }
      }
      if (missing.length > 0) {
        return err(new ProvisionError(
          ProvisionErrorCode.POST_ACTION_FAILED,
          `Not detected after provisioning: ${missing.join(", ")}`,
          { missing },
        ));
      }
      return ok(undefined);
    },
  };
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}


/** Append a line to a shell profile unless an identical line is already there. */
export function profileLine(entry: ProfileLine, home?: string): PostProvisionAction {
  return {
    name: "profile-line",
    async run({ ctx }) {
      const path = expandHome(entry.file, home);
      try {
        let content = "";
        try {
          content = await readFile(path, "utf-8");
        } catch (error) {
          if ((error as NodeJS.ErrnoException).code !== "ENOENT") throw error;
        }

        if (content.split(/\r?\n/).includes(entry.line)) {
          ctx.log.record("info", `${path} already contains the requested line`);
          return ok(undefined);
        }

        await mkdir(dirname(path), { recursive: true });
        const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
        await appendFile(path, `${separator}${entry.line}\n`, "utf-8");
        ctx.log.record("info", `Appended line to ${path}`);
        return ok(undefined);
      } catch (error) {
        return err(new ProvisionError(
          ProvisionErrorCode.POST_ACTION_FAILED,
          `Could not update ${path}: ${errorMessage(error)}`,
          { file: path },
        ));
      }
    },
  };
}
