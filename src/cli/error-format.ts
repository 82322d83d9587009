/*
Purpose: print a failed command on stderr in the same ✗/→ vocabulary as the progress lines.
Assumptions: the error kind shown in debug mode is the user-facing taxonomy name, not the raw code.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, type UserFacingErrorCode } from "../core/errors.js";

import { formatStatusLine } from "./console-reporter.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const ERROR_KIND_NAMES: Record<UserFacingErrorCode, string> = {
  [USER_FACING_ERROR_CODES.config]: "ConfigError",
  [USER_FACING_ERROR_CODES.git]: "GitError",
  [USER_FACING_ERROR_CODES.hosting]: "HostingError",
  [USER_FACING_ERROR_CODES.profileNotFound]: "ProfileNotFound",
  [USER_FACING_ERROR_CODES.malformedInput]: "MalformedInput",
  [USER_FACING_ERROR_CODES.missingDependency]: "MissingDependency",
  [USER_FACING_ERROR_CODES.missingRequiredField]: "MissingRequiredField",
  [USER_FACING_ERROR_CODES.authenticationFailure]: "AuthenticationFailure",
  [USER_FACING_ERROR_CODES.repositoryCreateFailure]: "RepositoryCreateFailure",
  [USER_FACING_ERROR_CODES.pushFailure]: "PushFailure",
  [USER_FACING_ERROR_CODES.unknown]: "UnexpectedError",
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  const body = lines.filter((line) => line.kind !== "code" && line.kind !== "name");
  const rendered = body.map((line) => renderLine(line, format));

  // Debug mode: the error kind goes right under the headline.
  const code = lines.find((line) => line.kind === "code");
  if (code) {
    const name = lines.find((line) => line.kind === "name")?.text;
    const kind = describeErrorKind(code.text);
    const label = name && name !== "UserFacingError" ? `${kind} (${name})` : kind;
    rendered.splice(1, 0, format(`  [${label}]`, ["dim"]));
  }

  return rendered.join("\n");
}

/** Taxonomy name for a user-facing error code; unknown codes are shown as-is. */
export function describeErrorKind(code: string): string {
  const match = Object.entries(ERROR_KIND_NAMES).find(([key]) => key === code);
  return match ? match[1] : code;
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return formatStatusLine("error", format(line.text, ["bold"]), format);
    case "hint":
      return formatStatusLine("hint", line.text, format);
    case "next":
      return formatStatusLine("hint", `Next: ${line.text}`, format);
    case "cause":
      return format(`  caused by: ${line.text}`, ["dim"]);
    case "stack":
      return format(indent(line.text, "    "), ["dim"]);
    default:
      return indent(line.text, "  ");
  }
}

function indent(value: string, prefix: string): string {
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
