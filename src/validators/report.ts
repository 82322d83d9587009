// =============================================================================
// TYPES
// =============================================================================

export type CheckStatus = "pass" | "warning" | "error";

export type ValidationSection =
  | "files"
  | "profile"
  | "contact"
  | "bio"
  | "site"
  | "arrays"
  | "skills"
  | "references"
  | "workflow";

export type CheckResult = {
  section: ValidationSection;
  status: CheckStatus;
  message: string;
  hint?: string;
};

export type ValidationReport = {
  profilePath: string;
  checks: CheckResult[];
};

export type ValidationSummary = {
  checks: number;
  errors: number;
  warnings: number;
  ok: boolean;
};

export const SECTION_TITLES: Record<ValidationSection, string> = {
  files: "Checking files",
  profile: "Profile section",
  contact: "Contact section",
  bio: "Bio section",
  site: "Site configuration",
  arrays: "Validating arrays",
  skills: "Validating skills",
  references: "Checking referenced files",
  workflow: "Checking GitHub Actions workflow",
};

// =============================================================================
// BUILDERS
// =============================================================================

export function pass(section: ValidationSection, message: string): CheckResult {
  return { section, status: "pass", message };
}

export function warn(section: ValidationSection, message: string, hint?: string): CheckResult {
  return hint ? { section, status: "warning", message, hint } : { section, status: "warning", message };
}

export function fail(section: ValidationSection, message: string, hint?: string): CheckResult {
  return hint ? { section, status: "error", message, hint } : { section, status: "error", message };
}

export function mergeChecks(...groups: CheckResult[][]): CheckResult[] {
  return groups.flat();
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarizeReport(report: ValidationReport): ValidationSummary {
  let errors = 0;
  let warnings = 0;

  for (const check of report.checks) {
    if (check.status === "error") errors += 1;
    if (check.status === "warning") warnings += 1;
  }

  return { checks: report.checks.length, errors, warnings, ok: errors === 0 };
}

export function groupBySection(checks: CheckResult[]): Array<[ValidationSection, CheckResult[]]> {
  const groups = new Map<ValidationSection, CheckResult[]>();
  for (const check of checks) {
    const group = groups.get(check.section);
    if (group) {
      group.push(check);
    } else {
      groups.set(check.section, [check]);
    }
  }
  return Array.from(groups.entries());
}
