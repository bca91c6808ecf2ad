/** Package managers the adapter knows how to drive. */
export type SupportedManager =
  | "apt"
  | "dnf"
  | "yum"
  | "pacman"
  | "zypper"
  | "apk"
  | "brew"
  | "winget"
  | "choco"
  | "scoop";

/** Detected package manager; `none` when nothing usable was found. */
export type PackageManagerKind = SupportedManager | "none";

/** Privilege available to the process for system-wide installs. */
export type Elevation = "root" | "sudo" | "admin" | "none";

/**
 * One plausible identifier for a logical package.
 * Plain strings are regular packages; the object form marks a Homebrew cask.
 */
export type PackageCandidate = string | { readonly name: string; readonly cask: true };

/** Candidate lists keyed by manager. Managers without an entry have no candidates. */
export type CandidateTable = Partial<Record<SupportedManager, readonly PackageCandidate[]>>;

export function candidateName(candidate: PackageCandidate): string {
  return typeof candidate === "string" ? candidate : candidate.name;
}
