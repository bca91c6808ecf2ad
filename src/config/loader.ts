// Config loader: reads ~/.config/provision-kit/config.yaml and deep-merges it over defaults.
// On first run (no config file) the default YAML is written and firstRun is reported.
// The merged document is validated with zod; unset keys inherit defaults.
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ProvisionError, ProvisionErrorCode, errorMessage } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { ProvisionConfig } from "../types/config.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "provision-kit", "config.yaml");

const stepSchema = z.object({
  enabled: z.boolean(),
  required: z.boolean(),
});

export const configSchema = z.object({
  log: z.object({
    file: z.string().min(1),
    level: z.enum(["debug", "info", "warn", "error"]),
  }),
  refresh: z.boolean(),
  upgrade: z.boolean(),
  non_interactive: z.boolean(),
  python: z.object({
    version: z.string().regex(/^\d+\.\d+$/, "expected a major.minor version such as 3.11"),
  }),
  steps: z.object({
    python: stepSchema,
    pip: stepSchema,
    git: stepSchema,
    password_manager: stepSchema,
  }),
  post: z.object({
    verify: z.boolean(),
    profile_lines: z.array(z.object({ file: z.string().min(1), line: z.string().min(1) })),
  }),
}) satisfies z.ZodType<ProvisionConfig>;

export const DEFAULT_CONFIG: ProvisionConfig = {
  log: { file: "provision.log", level: "info" },
  refresh: true,
  upgrade: false,
  non_interactive: false,
  python: { version: "3.11" },
  steps: {
    python: { enabled: true, required: true },
    pip: { enabled: true, required: true },
    git: { enabled: true, required: true },
    password_manager: { enabled: true, required: true },
  },
  post: { verify: true, profile_lines: [] },
};

/** Written verbatim to the config path when no file exists yet; parses to DEFAULT_CONFIG. */
export const DEFAULT_CONFIG_YAML = `# provision-kit configuration
# Generated automatically on first run. All values shown are defaults.

log:
  file: provision.log
  level: info        # debug | info | warn | error

refresh: true        # re-sync the package index before the first step
upgrade: false       # run a full system update before the steps
non_interactive: false

python:
  version: "3.11"

steps:
  python:
    enabled: true
    required: true
  pip:
    enabled: true
    required: true
  git:
    enabled: true
    required: true
  password_manager:
    enabled: true
    required: true

post:
  verify: true
  # Lines appended to shell profiles after a successful run, e.g.
  # profile_lines:
  #   - file: ~/.zshrc
  #     line: alias refreshenv='eval "$(/opt/homebrew/bin/brew shellenv)"'
  profile_lines: []
`;

export interface ConfigResult {
  config: ProvisionConfig;
  configPath: string;
  firstRun: boolean;
  /** Non-fatal problems, logged once the logger exists. */
  warnings: string[];
}

export function loadConfig(explicitPath?: string): Result<ConfigResult> {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    const warnings: string[] = [];
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (error) {
      warnings.push(`Could not write default config to ${configPath}: ${errorMessage(error)}`);
    }
    return ok({ config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true, warnings });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return err(new ProvisionError(
      ProvisionErrorCode.CONFIG_INVALID,
      `Failed to parse ${configPath}: ${errorMessage(error)}`,
      { configPath },
    ));
  }

  const validated = configSchema.safeParse(deepMerge(DEFAULT_CONFIG, parsed ?? {}));
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return err(new ProvisionError(
      ProvisionErrorCode.CONFIG_INVALID,
      `Invalid configuration in ${configPath}: ${issues.join("; ")}`,
      { configPath, issues },
    ));
  }
  return ok({ config: validated.data, configPath, firstRun: false, warnings: [] });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Overlay a user document on the defaults: nested mappings merge key by key, anything else replaces. */
export function deepMerge(a: unknown, b: unknown): unknown {
  if (!isPlainObject(a) || !isPlainObject(b)) return b === undefined ? a : b;
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    result[key] = deepMerge(a[key], b[key]);
  }
  return result;
}
