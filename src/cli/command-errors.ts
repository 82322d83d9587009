import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  GitError,
  HostingError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
} from "../core/errors.js";

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const CONFIG_HINT = "Fix .folio/config.yaml or remove it to use the defaults.";

/** Pass user-facing errors through; wrap anything else under the command's title. */
export function normalizeCommandError(error: unknown, title: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title,
    message: formatErrorMessage(error),
    hint: error instanceof ConfigError ? CONFIG_HINT : undefined,
    cause: error,
  });
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  if (error instanceof HostingError) return USER_FACING_ERROR_CODES.hosting;
  return USER_FACING_ERROR_CODES.unknown;
}
