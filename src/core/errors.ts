export class FolioError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "FolioError";
  }
}

export class ConfigError extends FolioError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends FolioError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class HostingError extends FolioError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "HostingError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  hosting: "HOSTING_ERROR",
  profileNotFound: "PROFILE_NOT_FOUND",
  malformedInput: "MALFORMED_INPUT",
  missingDependency: "MISSING_DEPENDENCY",
  missingRequiredField: "MISSING_REQUIRED_FIELD",
  authenticationFailure: "AUTHENTICATION_FAILURE",
  repositoryCreateFailure: "REPOSITORY_CREATE_FAILURE",
  pushFailure: "PUSH_FAILURE",
  unknown: "UNKNOWN_ERROR",
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

/**
 * Error meant to be printed to the user as-is.
 * `title` is the one-line headline; `hint` and `next` are optional remediation lines.
 */
export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

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

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}
