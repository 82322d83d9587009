/*
Purpose: turn unknown thrown values into structured lines for CLI and log output.
Assumptions: UserFacingError carries its own title/hint; anything else is unexpected.
Usage: formatErrorLines(err, { mode: "short" }) then render each line.
*/

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "green" | "yellow" | "blue" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const UNEXPECTED_ERROR_TITLE = "Unexpected error.";

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  blue: [34, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;

  try {
    const json = JSON.stringify(error);
    return json ?? String(error);
  } catch {
    return String(error);
  }
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNEXPECTED_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode === "debug") {
    lines.push(...formatDebugLines(error));
  }

  return lines;
}

function formatDebugLines(error: unknown): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  const code =
    error instanceof UserFacingError ? error.code : USER_FACING_ERROR_CODES.unknown;
  lines.push({ kind: "code", text: code });

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });

    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor === false) return false;
  if (!options.stream?.isTTY) return false;

  const noColor = process.env.NO_COLOR;
  if (noColor !== undefined && noColor.length > 0) return false;

  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
