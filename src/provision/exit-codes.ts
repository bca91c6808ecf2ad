/** Process exit codes. Step codes are attached to the steps in the catalogue. */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENTS: 2,
  UNSUPPORTED_ENVIRONMENT: 10,
  PYTHON_INSTALL_FAILED: 20,
  PIP_INSTALL_FAILED: 21,
  GIT_INSTALL_FAILED: 30,
  PASSWORD_MANAGER_INSTALL_FAILED: 40,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
