/*
Purpose: error types raised by the host before and around the supervised program run.
Assumptions: UserFacingError instances are safe to print to the engine's diagnostic stream.
Usage: throw new ProgramNotFoundError(programPath); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class HostError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "HostError";
  }
}

export class ConfigEnvironmentError extends HostError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigEnvironmentError";
  }
}

export class RuntimeLoadError extends HostError {
  constructor(
    message: string,
    public readonly specifier: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RuntimeLoadError";
  }
}

export class ProgramError extends HostError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ProgramError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_INVALID",
  environment: "ENVIRONMENT_MISSING",
  program: "PROGRAM_NOT_FOUND",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export class EnvironmentMissingError extends UserFacingError {
  constructor(specifier: string, cause?: unknown) {
    super({
      code: USER_FACING_ERROR_CODES.environment,
      title: "Runtime library not found.",
      message: `Could not load the runtime library "${specifier}".`,
      hint: "Install stack-host in your program's directory (npm install stack-host) and try again.",
      cause: new RuntimeLoadError(`Failed to load ${specifier}.`, specifier, cause),
    });
    this.name = "EnvironmentMissingError";
  }
}

export class ProgramNotFoundError extends UserFacingError {
  constructor(programPath: string, cause?: unknown) {
    super({
      code: USER_FACING_ERROR_CODES.program,
      title: "Program not found.",
      message: `No program entry point found at ${programPath}.`,
      hint: "Pass a file, or a directory with a package.json \"main\" field or an index.js.",
      cause: new ProgramError(`Missing program: ${programPath}`, cause),
    });
    this.name = "ProgramNotFoundError";
  }
}
