import type { AnsiFormatter } from "../core/error-format.js";
import { validateProfile } from "../validators/profile-validator.js";
import {
  groupBySection,
  SECTION_TITLES,
  summarizeReport,
  type CheckResult,
  type ValidationReport,
} from "../validators/report.js";

import { normalizeCommandError } from "./command-errors.js";
import { loadConfigForCli } from "./config.js";
import { formatStatusLine, resolveStdoutFormatter, type StatusKind } from "./console-reporter.js";

// =============================================================================
// COMMAND
// =============================================================================

export type ValidateCommandOptions = {
  cwd?: string;
  write?: (line: string) => void;
  useColor?: boolean;
};

export async function validateCommand(options: ValidateCommandOptions = {}): Promise<void> {
  const write = options.write ?? ((line: string) => console.log(line));

  let report: ValidationReport;
  try {
    const { config, repoRoot } = loadConfigForCli({ cwd: options.cwd });
    report = await validateProfile({
      repoRoot,
      profilePath: config.profile_path,
      workflowPath: config.workflow_path,
    });
  } catch (error) {
    throw normalizeCommandError(error, "Profile validation failed.");
  }

  const format = resolveStdoutFormatter({ useColor: options.useColor });
  for (const line of renderValidationReport(report, format)) {
    write(line);
  }

  if (!summarizeReport(report).ok) {
    process.exitCode = 1;
  }
}

// =============================================================================
// RENDERING
// =============================================================================

export function renderValidationReport(report: ValidationReport, format: AnsiFormatter): string[] {
  const lines: string[] = [];

  for (const [section, checks] of groupBySection(report.checks)) {
    lines.push("", format(`${SECTION_TITLES[section]}...`, ["blue"]));
    for (const check of checks) {
      lines.push(...renderCheck(check, format));
    }
  }

  lines.push(...renderSummary(report, format));
  return lines;
}

function renderCheck(check: CheckResult, format: AnsiFormatter): string[] {
  const lines = [formatStatusLine(statusKind(check), check.message, format)];
  if (check.hint) {
    lines.push(formatStatusLine("hint", check.hint, format));
  }
  return lines;
}

function renderSummary(report: ValidationReport, format: AnsiFormatter): string[] {
  const summary = summarizeReport(report);
  const lines = [
    "",
    format("Validation Summary", ["blue"]),
    "",
    `  Checks performed: ${summary.checks}`,
    `  ${format("Errors:", ["red"])}          ${summary.errors}`,
    `  ${format("Warnings:", ["yellow"])}        ${summary.warnings}`,
    "",
  ];

  if (!summary.ok) {
    lines.push(
      formatStatusLine(
        "error",
        `Found ${summary.errors} error(s) that must be fixed before deployment`,
        format,
      ),
      formatStatusLine("info", "Fix the errors above and run `folio validate` again", format),
    );
    return lines;
  }

  lines.push(
    formatStatusLine("success", "Your profile is ready for deployment!", format),
    formatStatusLine("info", "Next step: run `folio deploy`", format),
  );
  if (summary.warnings > 0) {
    lines.push(
      formatStatusLine("warning", `There are ${summary.warnings} warnings - review them above`, format),
      formatStatusLine("info", "Warnings won't prevent deployment but should be addressed", format),
    );
  }
  return lines;
}

function statusKind(check: CheckResult): StatusKind {
  switch (check.status) {
    case "pass":
      return "success";
    case "warning":
      return "warning";
    case "error":
      return "error";
  }
}
