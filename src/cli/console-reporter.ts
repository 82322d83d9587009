/*
Purpose: console rendering for progress lines shared by `validate` and `deploy`.
Assumptions: progress goes to stdout; colour follows the stdout TTY and NO_COLOR.
Usage: const reporter = createConsoleReporter(); reporter.success("done");
*/

import type { DeployReporter } from "../app/deploy/ports.js";
import {
  createAnsiFormatter,
  resolveColorEnabled,
  type AnsiFormatter,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type StatusKind = "success" | "error" | "warning" | "info" | "hint";

export type ConsoleReporterOptions = {
  useColor?: boolean;
  stream?: { isTTY?: boolean };
  write?: (line: string) => void;
};

// =============================================================================
// FORMATTING
// =============================================================================

export function formatStatusLine(kind: StatusKind, message: string, format: AnsiFormatter): string {
  switch (kind) {
    case "success":
      return `${format("✓", ["green"])} ${message}`;
    case "error":
      return `${format("✗", ["red"])} ${message}`;
    case "warning":
      return `${format("⚠", ["yellow"])} ${message}`;
    case "info":
      return `${format("ℹ", ["blue"])} ${message}`;
    case "hint":
      return `  ${format("→", ["blue"])} ${message}`;
  }
}

export function resolveStdoutFormatter(options: ConsoleReporterOptions = {}): AnsiFormatter {
  const stream = options.stream ?? process.stdout;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

// =============================================================================
// REPORTER
// =============================================================================

export function createConsoleReporter(options: ConsoleReporterOptions = {}): DeployReporter {
  const format = resolveStdoutFormatter(options);
  const write = options.write ?? ((line: string) => console.log(line));

  return {
    step: (title) => write(`\n${format("==>", ["blue"])} ${title}`),
    success: (message) => write(formatStatusLine("success", message, format)),
    info: (message) => write(formatStatusLine("info", message, format)),
    warn: (message) => write(formatStatusLine("warning", message, format)),
    line: (message) => write(message),
  };
}
