/**
 * Profile validator.
 * Purpose: check a profile record for the fields, formats and files a deploy needs.
 * Assumptions: every check is independent; only loading the record can abort the run.
 * Usage: const report = await validateProfile({ repoRoot, profilePath, workflowPath });
 */

import path from "node:path";

import { isFile } from "../core/utils.js";
import { loadProfileDocument, type FieldPath, type ProfileDocument } from "../profile/document.js";
import {
  isGithubUsernameWithinLimit,
  isValidDomain,
  isValidEmail,
  isValidGithubUsernameFormat,
  PROFILE_FIELDS,
  PROFILE_LISTS,
  GITHUB_USERNAME_MAX_LENGTH,
} from "../profile/rules.js";

import {
  fail,
  mergeChecks,
  pass,
  warn,
  type CheckResult,
  type ValidationReport,
  type ValidationSection,
} from "./report.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileProbe = (absolutePath: string) => Promise<boolean>;

export type ProfileValidatorOptions = {
  repoRoot: string;
  profilePath: string;
  workflowPath: string;
  fileExists?: FileProbe;
};

type FormatCheck = (value: string, section: ValidationSection) => CheckResult[];

type FieldSpec = {
  label: string;
  path: FieldPath;
  required: boolean;
  formats?: FormatCheck[];
};

type ListSpec = {
  path: FieldPath;
  label: string;
  emptyMessage: string;
  required: boolean;
};

type MediaSpec = {
  arrayPath: FieldPath;
  itemPath: string;
  missingLabel: string;
};

// =============================================================================
// CHECKLISTS
// =============================================================================

const FIELD_CHECKLIST: Array<{ section: ValidationSection; fields: FieldSpec[] }> = [
  {
    section: "profile",
    fields: [
      { label: "Name", path: PROFILE_FIELDS.name, required: true },
      { label: "Title", path: PROFILE_FIELDS.title, required: true },
      { label: "Organization", path: PROFILE_FIELDS.organization, required: true },
      { label: "Profile Image", path: PROFILE_FIELDS.profileImage, required: true },
      { label: "CV Path", path: PROFILE_FIELDS.cvPath, required: false },
    ],
  },
  {
    section: "contact",
    fields: [
      { label: "Email", path: PROFILE_FIELDS.email, required: true, formats: [checkEmailFormat] },
      { label: "Phone", path: PROFILE_FIELDS.phone, required: false },
      { label: "Location", path: PROFILE_FIELDS.location, required: true },
      {
        label: "GitHub Username",
        path: PROFILE_FIELDS.githubUsername,
        required: true,
        formats: [checkUsernameFormat, checkUsernameLength],
      },
    ],
  },
  {
    section: "bio",
    fields: [
      { label: "Introduction", path: PROFILE_FIELDS.introduction, required: true },
      { label: "Background", path: PROFILE_FIELDS.background, required: true },
      { label: "Research Focus", path: PROFILE_FIELDS.researchFocus, required: false },
    ],
  },
  {
    section: "site",
    fields: [
      { label: "Site Title", path: PROFILE_FIELDS.siteTitle, required: true },
      {
        label: "Custom Domain",
        path: PROFILE_FIELDS.domain,
        required: false,
        formats: [checkDomainFormat],
      },
    ],
  },
];

const LIST_CHECKLIST: ListSpec[] = [
  {
    path: PROFILE_LISTS.publications,
    label: "Publications",
    emptyMessage: "No publications/experience entries found",
    required: false,
  },
  { path: PROFILE_LISTS.projects, label: "Projects", emptyMessage: "No projects found", required: false },
  {
    path: PROFILE_LISTS.education,
    label: "Education",
    emptyMessage: "No education entries found",
    required: false,
  },
  {
    path: PROFILE_LISTS.navigation,
    label: "Navigation",
    emptyMessage: "No navigation entries found",
    required: true,
  },
];

const MEDIA_CHECKLIST: MediaSpec[] = [
  { arrayPath: PROFILE_LISTS.publications, itemPath: "image", missingLabel: "Image" },
  { arrayPath: PROFILE_LISTS.projects, itemPath: "media.src", missingLabel: "Media" },
  { arrayPath: PROFILE_LISTS.education, itemPath: "logo", missingLabel: "Logo" },
];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function validateProfile(options: ProfileValidatorOptions): Promise<ValidationReport> {
  const fileExists = options.fileExists ?? isFile;
  const resolve = (relPath: string): string => path.resolve(options.repoRoot, relPath);

  const doc = await loadProfileDocument(resolve(options.profilePath), options.profilePath);

  const checks = mergeChecks(
    [
      pass("files", `Profile file exists: ${options.profilePath}`),
      pass("files", "Valid JSON format"),
    ],
    checkFields(doc),
    checkLists(doc),
    checkSkills(doc),
    await checkReferencedFiles(doc, (relPath) => fileExists(resolve(relPath))),
    await checkWorkflow(options.workflowPath, () => fileExists(resolve(options.workflowPath))),
  );

  return { profilePath: options.profilePath, checks };
}

// =============================================================================
// FIELD CHECKS
// =============================================================================

export function checkFields(doc: ProfileDocument): CheckResult[] {
  return FIELD_CHECKLIST.flatMap(({ section, fields }) =>
    fields.flatMap((field) => checkField(doc, section, field)),
  );
}

function checkField(doc: ProfileDocument, section: ValidationSection, field: FieldSpec): CheckResult[] {
  const value = doc.text(field.path);

  if (value === undefined) {
    return field.required
      ? [fail(section, `Missing required field: ${field.label} (${field.path})`)]
      : [warn(section, `Optional field not set: ${field.label} (${field.path})`)];
  }

  const formatChecks = (field.formats ?? []).flatMap((check) => check(value, section));
  return [pass(section, `${field.label}: ${value}`), ...formatChecks];
}

function checkEmailFormat(value: string, section: ValidationSection): CheckResult[] {
  return isValidEmail(value)
    ? [pass(section, "Valid email format")]
    : [fail(section, `Invalid email format: ${value}`)];
}

function checkUsernameFormat(value: string, section: ValidationSection): CheckResult[] {
  return isValidGithubUsernameFormat(value)
    ? [pass(section, "Valid GitHub username format")]
    : [
        fail(
          section,
          `Invalid GitHub username format: ${value}`,
          "GitHub usernames contain only alphanumeric characters and single hyphens, and cannot start or end with a hyphen",
        ),
      ];
}

function checkUsernameLength(value: string, section: ValidationSection): CheckResult[] {
  return isGithubUsernameWithinLimit(value)
    ? []
    : [fail(section, `GitHub username too long (max ${GITHUB_USERNAME_MAX_LENGTH} characters): ${value}`)];
}

function checkDomainFormat(value: string, section: ValidationSection): CheckResult[] {
  return isValidDomain(value)
    ? [pass(section, "Valid domain format")]
    : [fail(section, `Invalid domain format: ${value}`)];
}

// =============================================================================
// COLLECTION CHECKS
// =============================================================================

export function checkLists(doc: ProfileDocument): CheckResult[] {
  return LIST_CHECKLIST.map((list) => {
    const count = doc.count(list.path);
    if (count > 0) {
      return pass("arrays", `${list.label}: ${count} entries`);
    }
    return list.required ? fail("arrays", list.emptyMessage) : warn("arrays", list.emptyMessage);
  });
}

export function checkSkills(doc: ProfileDocument): CheckResult[] {
  const skills = doc.get(PROFILE_LISTS.skills);

  if (skills === undefined || skills === null) {
    return [warn("skills", "Skills section not found")];
  }
  if (typeof skills !== "object" || Array.isArray(skills)) {
    return [warn("skills", "Skills section is not a mapping of categories to skills")];
  }

  const categories = Object.entries(skills);
  if (categories.length === 0) {
    return [warn("skills", "No skill categories found")];
  }

  return [
    pass("skills", `Skills categories: ${categories.length}`),
    ...categories.map(([category, entries]) =>
      pass("skills", `${category}: ${Array.isArray(entries) ? entries.length : 0} skills`),
    ),
  ];
}

// =============================================================================
// FILE CHECKS
// =============================================================================

export async function checkReferencedFiles(
  doc: ProfileDocument,
  exists: (relPath: string) => Promise<boolean>,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];

  const profileImage = doc.text(PROFILE_FIELDS.profileImage);
  if (profileImage !== undefined) {
    results.push(
      (await exists(profileImage))
        ? pass("references", `Profile image exists: ${profileImage}`)
        : fail("references", `Profile image not found: ${profileImage}`),
    );
  }

  const cvPath = doc.text(PROFILE_FIELDS.cvPath);
  if (cvPath !== undefined) {
    results.push(
      (await exists(cvPath))
        ? pass("references", `CV file exists: ${cvPath}`)
        : fail("references", `CV file not found: ${cvPath}`),
    );
  }

  for (const media of MEDIA_CHECKLIST) {
    for (const relPath of doc.collectText(media.arrayPath, media.itemPath)) {
      results.push(
        (await exists(relPath))
          ? pass("references", `Found: ${relPath}`)
          : warn("references", `${media.missingLabel} not found: ${relPath}`),
      );
    }
  }

  return results;
}

async function checkWorkflow(
  workflowPath: string,
  exists: () => Promise<boolean>,
): Promise<CheckResult[]> {
  if (await exists()) {
    return [pass("workflow", `GitHub Actions workflow exists: ${workflowPath}`)];
  }
  return [
    fail(
      "workflow",
      `GitHub Actions workflow not found: ${workflowPath}`,
      "This file is required for automatic deployment",
    ),
  ];
}
