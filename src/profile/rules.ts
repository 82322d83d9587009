import type { FieldPath } from "./document.js";

// =============================================================================
// FORMATS
// =============================================================================

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

// Alphanumeric and hyphens; no leading or trailing hyphen.
export const GITHUB_USERNAME_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/;
export const GITHUB_USERNAME_MAX_LENGTH = 39;

export const DOMAIN_PATTERN =
  /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}$/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export function isValidGithubUsernameFormat(value: string): boolean {
  return GITHUB_USERNAME_PATTERN.test(value) && !value.includes("--");
}

export function isGithubUsernameWithinLimit(value: string): boolean {
  return value.length <= GITHUB_USERNAME_MAX_LENGTH;
}

export function isValidDomain(value: string): boolean {
  return DOMAIN_PATTERN.test(value);
}

// =============================================================================
// FIELD PATHS
// =============================================================================

export const PROFILE_FIELDS = {
  name: ".profile.name",
  title: ".profile.title",
  organization: ".profile.organization",
  profileImage: ".profile.profileImage",
  cvPath: ".profile.cvPath",
  email: ".contact.email",
  phone: ".contact.phone",
  location: ".contact.location",
  githubUsername: ".contact.githubUsername",
  introduction: ".bio.introduction",
  background: ".bio.background",
  researchFocus: ".bio.researchFocus",
  siteTitle: ".siteConfig.siteTitle",
  domain: ".siteConfig.domain",
} as const satisfies Record<string, FieldPath>;

export const PROFILE_LISTS = {
  publications: ".publications",
  projects: ".projects",
  education: ".education",
  navigation: ".navigation",
  skills: ".skills",
} as const satisfies Record<string, FieldPath>;

/** Strip the leading dot for messages that quote the key path (`profile.name`). */
export function describeFieldPath(fieldPath: FieldPath): string {
  return fieldPath.slice(1);
}
