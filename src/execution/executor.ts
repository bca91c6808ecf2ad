// Process execution layer: every package-manager and helper invocation passes through here.
// Calls have no timeout; a manager run blocks until the child exits or is killed externally.
import execa from "execa";
import type { Command } from "../types/command.js";

/** Result of command execution. A non-zero exit is a value, never a rejection. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command): Promise<ExecResult>;
}

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export class LocalExecutor implements Executor {
  async execute(command: Command): Promise<ExecResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    if (!file) {
      return { stdout: "", stderr: "empty command", exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs: 0 };
    }

    const result = await execa(file, args, {
      env: command.env,
      extendEnv: true,
      reject: false,
      input: command.stdin,
      stdin: command.interactive && command.stdin === undefined ? "inherit" : "pipe",
      // 10MB: apt/dnf transcripts for large installs stay well below this.
      maxBuffer: 10 * 1024 * 1024,
    });

    const durationMs = Math.round(performance.now() - start);
    if (result.exitCode === undefined && result.failed) {
      return { stdout: "", stderr: `${file}: command not found`, exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs };
    }
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: result.exitCode ?? 0,
      durationMs,
    };
  }
}

/** Last non-empty line of a command's diagnostics, for one-line error reporting. */
export function lastErrorLine(result: ExecResult): string {
  for (const stream of [result.stderr, result.stdout]) {
    const line = stream.split("\n").map((l) => l.trim()).filter(Boolean).at(-1);
    if (line) return line;
  }
  return `exit code ${result.exitCode}`;
}
