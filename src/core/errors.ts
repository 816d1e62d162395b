export type AuthErrorCode = "FORM_NOT_FOUND" | "TIMEOUT" | "LOGIN_REJECTED";

export class AuthError extends Error {
  constructor(message: string, public code: AuthErrorCode) {
    super(message);
    this.name = "AuthError";
  }
}

export class EnvironmentError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvironmentError";
  }
}

export class NavigationError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NavigationError";
  }
}

export class OutputError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OutputError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public code = "CONFIG_INVALID") {
    super(message);
    this.name = "ConfigError";
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Every error that reaches the top of a run is fatal: the run either completed
 * (possibly with skipped posts) or it did not.
 */
export function resolveExitCode(error: unknown): number {
  return error === undefined || error === null ? EXIT_OK : EXIT_FAILURE;
}

export function describeError(error: unknown): { name: string; code: string | null; message: string } {
  if (
    error instanceof ConfigError ||
    error instanceof AuthError ||
    error instanceof EnvironmentError ||
    error instanceof NavigationError ||
    error instanceof OutputError
  ) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, code: null, message: error.message };
  }
  return { name: "UnknownError", code: null, message: String(error) };
}
