export enum ProvisionErrorCode {
  UNSUPPORTED_ENVIRONMENT = "UNSUPPORTED_ENVIRONMENT",
  INDEX_REFRESH_FAILED = "INDEX_REFRESH_FAILED",
  NO_CANDIDATE_AVAILABLE = "NO_CANDIDATE_AVAILABLE",
  VERIFICATION_MISMATCH = "VERIFICATION_MISMATCH",
  PRIVILEGE_REQUIRED = "PRIVILEGE_REQUIRED",
  REPOSITORY_SETUP_FAILED = "REPOSITORY_SETUP_FAILED",
  UPGRADE_FAILED = "UPGRADE_FAILED",
  POST_ACTION_FAILED = "POST_ACTION_FAILED",
  INVALID_ARGUMENTS = "INVALID_ARGUMENTS",
  CONFIG_INVALID = "CONFIG_INVALID",
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ProvisionErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
    this.context = context;
  }
}

/** Message of anything thrown; Node errors from another realm fail `instanceof Error`. */
export function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
