import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { StepName } from "../types/config.js";

/** Parsed command line. Unset fields defer to the config file. */
export interface CliOptions {
  help: boolean;
  nonInteractive?: boolean;
  refresh?: boolean;
  upgrade?: boolean;
  logFile?: string;
  configPath?: string;
  skip: StepName[];
}

export const USAGE = `provision-kit - install Python (with pip), Git and 1Password through the system package manager

Usage: provision-kit [options]

Options:
  -y, --non-interactive          Run without prompts (assume yes)
      --no-refresh               Do not refresh the package index before installing
      --upgrade                  Run a full system update before installing
      --log-file <path>          Append logs to this file (default: provision.log)
      --config <path>            Config file (default: ~/.config/provision-kit/config.yaml)
      --skip-python              Skip Python and pip
      --skip-pip                 Skip pip only
      --skip-git                 Skip Git
      --skip-password-manager    Skip 1Password (alias: --skip-1password)
  -h, --help                     Show this help and exit

Exit codes:
  0   success
  1   unhandled error or failed post-provisioning action
  2   invalid arguments or configuration
  10  unsupported environment (no package manager found)
  20  Python install failed
  21  pip install failed
  30  Git install failed
  40  1Password install failed
`;

const SKIP_FLAGS: Record<string, StepName[]> = {
  "--skip-python": ["python", "pip"],
  "--skip-pip": ["pip"],
  "--skip-git": ["git"],
  "--skip-password-manager": ["password_manager"],
  "--skip-1password": ["password_manager"],
};

function invalid(message: string): Result<never> {
  return err(new ProvisionError(ProvisionErrorCode.INVALID_ARGUMENTS, message));
}

export function parseArgs(argv: readonly string[]): Result<CliOptions> {
  const options: CliOptions = { help: false, skip: [] };

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i] ?? "";
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const flag = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    const takesValue = flag === "--log-file" || flag === "--config";
    if (inline !== undefined && !takesValue) return invalid(`Unexpected value for ${flag}`);

    // Flags that take a path, as `--flag value` or `--flag=value`.
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline || undefined;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) return undefined;
      i++;
      return next;
    };

    switch (flag) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-y":
      case "--yes":
      case "--non-interactive":
        options.nonInteractive = true;
        break;
      case "--refresh":
        options.refresh = true;
        break;
      case "--no-refresh":
        options.refresh = false;
        break;
      case "--upgrade":
        options.upgrade = true;
        break;
      case "--log-file": {
        const value = takeValue();
        if (!value) return invalid("Missing value for --log-file");
        options.logFile = value;
        break;
      }
      case "--config": {
        const value = takeValue();
        if (!value) return invalid("Missing value for --config");
        options.configPath = value;
        break;
      }
      default: {
        const steps = SKIP_FLAGS[flag];
        if (!steps) return invalid(`Unknown option: ${raw}`);
        for (const step of steps) {
          if (!options.skip.includes(step)) options.skip.push(step);
        }
      }
    }
  }

  return ok(options);
}
