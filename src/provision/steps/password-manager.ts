// 1Password desktop app / CLI. Linux RPM and Debian systems need the vendor repository
// configured before the package is visible to the manager; pacman and apk have no
// official package, so the step fails there with no candidates.
import type { CandidateTable, PackageManagerKind } from "../../types/manager.js";
import { EXIT_CODES } from "../exit-codes.js";
import type { InstallStep } from "../types.js";
import type { PresenceCheck, StepToggle } from "./package-step.js";
import { anyPresent, brewCask, candidatesFor, fileOnPlatform, onPath } from "./package-step.js";
import type { RepositorySource } from "./repository.js";
import { ensureRepository } from "./repository.js";

const SIGNING_KEY_URL = "https://downloads.1password.com/linux/keys/1password.asc";
const APT_KEYRING = "/usr/share/keyrings/1password-archive-keyring.gpg";
const DEBSIG_POLICY_ID = "AC2D62742012EA22";

export const PASSWORD_MANAGER_EXECUTABLES = ["1password", "op"] as const;

export const PASSWORD_MANAGER_CANDIDATES: CandidateTable = {
  apt: ["1password"],
  dnf: ["1password"],
  yum: ["1password"],
  zypper: ["1password"],
  brew: [{ name: "1password", cask: true }, { name: "1password-cli", cask: true }],
  winget: ["AgileBits.1Password.CLI", "AgileBits.1Password"],
  choco: ["1password-cli", "1password"],
  scoop: ["1password-cli"],
};

/** The cask installs the app bundle only; nothing lands on PATH. */
export const MAC_APP_BUNDLE = "/Applications/1Password.app";

const PRESENCE_CHECKS: readonly PresenceCheck[] = [
  onPath(PASSWORD_MANAGER_EXECUTABLES),
  fileOnPlatform("darwin", MAC_APP_BUNDLE),
  brewCask("1password"),
];

const RPM_REPOSITORY: RepositorySource = {
  label: "1Password",
  markers: ["/etc/yum.repos.d/1password.repo"],
  prerequisites: [],
  commands: [
    { argv: ["rpm", "--import", SIGNING_KEY_URL] },
    {
      argv: ["sh", "-c", [
        "printf '%s\\n'",
        "'[1password]'",
        "'name=1Password Stable Channel'",
        "'baseurl=https://downloads.1password.com/linux/rpm/stable/$basearch'",
        "'enabled=1'",
        "'gpgcheck=1'",
        "'repo_gpgcheck=1'",
        `'gpgkey=${SIGNING_KEY_URL}'`,
        "> /etc/yum.repos.d/1password.repo",
      ].join(" ")],
    },
  ],
};

export const REPOSITORY_SOURCES: Partial<Record<PackageManagerKind, RepositorySource>> = {
  apt: {
    label: "1Password",
    markers: ["/etc/apt/sources.list.d/1password.list"],
    prerequisites: ["curl", "gpg"],
    commands: [
      { argv: ["mkdir", "-p", "/usr/share/keyrings", `/etc/debsig/policies/${DEBSIG_POLICY_ID}`, `/usr/share/debsig/keyrings/${DEBSIG_POLICY_ID}`] },
      { argv: ["sh", "-c", `curl -fsSL ${SIGNING_KEY_URL} | gpg --batch --yes --dearmor --output ${APT_KEYRING}`] },
      { argv: ["sh", "-c", `curl -fsSL https://downloads.1password.com/linux/debian/debsig/1password.pol > /etc/debsig/policies/${DEBSIG_POLICY_ID}/1password.pol`] },
      { argv: ["sh", "-c", `curl -fsSL ${SIGNING_KEY_URL} | gpg --batch --yes --dearmor --output /usr/share/debsig/keyrings/${DEBSIG_POLICY_ID}/debsig.gpg`] },
      {
        argv: ["sh", "-c",
          `echo "deb [arch=$(dpkg --print-architecture) signed-by=${APT_KEYRING}] https://downloads.1password.com/linux/debian/$(dpkg --print-architecture) stable main" > /etc/apt/sources.list.d/1password.list`],
      },
    ],
  },
  dnf: RPM_REPOSITORY,
  yum: RPM_REPOSITORY,
  zypper: {
    label: "1Password",
    markers: ["/etc/zypp/repos.d/1password.repo"],
    prerequisites: [],
    commands: [
      { argv: ["rpm", "--import", SIGNING_KEY_URL] },
      { argv: ["zypper", "--non-interactive", "addrepo", "https://downloads.1password.com/linux/rpm/stable/$basearch", "1password"] },
    ],
  },
};

export function passwordManagerStep(toggle: StepToggle): InstallStep {
  return {
    name: "password-manager",
    required: toggle.required,
    exitCode: EXIT_CODES.PASSWORD_MANAGER_INSTALL_FAILED,
    disabled: toggle.disabled,
    isInstalled(env) {
      return anyPresent(env, PRESENCE_CHECKS);
    },
    async install(env) {
      const source = REPOSITORY_SOURCES[env.ctx.manager];
      if (source) {
        const configured = await ensureRepository(env, source);
        if (!configured.ok) return configured;
      }
      return env.adapter.install(env.ctx, candidatesFor(env.ctx.manager, PASSWORD_MANAGER_CANDIDATES));
    },
  };
}
