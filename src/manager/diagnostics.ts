// Classifies a failed manager run from its output so failure reports say what went wrong.
// Diagnosis is informational only: it never changes whether the adapter moves to the next candidate.

export type FailureKind = "not_found" | "lock" | "network" | "privilege" | "dependency" | "disk" | "unknown";

interface FailurePattern {
  test: (output: string) => boolean;
  kind: FailureKind;
  hint: string;
}

const FAILURE_PATTERNS: FailurePattern[] = [
  { test: (s) => s.includes("unable to locate package") || s.includes("no match for argument") || s.includes("target not found")
      || s.includes("no provider of") || s.includes("no package found") || s.includes("no available formula") || s.includes("not found in any bucket")
      || s.includes("could not find package"),
    kind: "not_found", hint: "Package name is not known to this manager or release" },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("rpm.lock")
      || s.includes("unable to lock database") || s.includes("system management is locked"),
    kind: "lock", hint: "Another package manager process holds the database lock" },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("connection timed out")
      || s.includes("network is unreachable") || s.includes("failed to download"),
    kind: "network", hint: "Package download failed; check network connectivity" },
  { test: (s) => s.includes("permission denied") || s.includes("are you root") || s.includes("a password is required")
      || s.includes("operation not permitted") || s.includes("administrative privileges"),
    kind: "privilege", hint: "The manager needs elevated rights" },
  { test: (s) => s.includes("unmet dependencies") || s.includes("dependency problems") || s.includes("depsolve error") || s.includes("conflicting"),
    kind: "dependency", hint: "Dependency conflict reported by the manager" },
  { test: (s) => s.includes("no space left on device"),
    kind: "disk", hint: "Disk is full" },
];

export interface FailureDiagnosis {
  kind: FailureKind;
  hint: string | null;
}

export function diagnoseFailure(output: string): FailureDiagnosis {
  const lowered = output.toLowerCase();
  for (const p of FAILURE_PATTERNS) {
    if (p.test(lowered)) return { kind: p.kind, hint: p.hint };
  }
  return { kind: "unknown", hint: null };
}
