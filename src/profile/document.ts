/**
 * Read-only accessor over the JSON profile record.
 * Purpose: give validators and the deployer one way to read fields by JSON path.
 * Assumptions: the record is a JSON object; paths use the `.section.field` form.
 * Usage: const doc = await loadProfileDocument(file); doc.text(".profile.name")
 */

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { isFile, readTextFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type FieldPath = `.${string}`;

type JsonRecord = Record<string, unknown>;

// =============================================================================
// DOCUMENT
// =============================================================================

export class ProfileDocument {
  constructor(
    public readonly sourcePath: string,
    private readonly root: JsonRecord,
  ) {}

  get(fieldPath: string): unknown {
    return readPath(this.root, splitPath(fieldPath));
  }

  /** Field as display text; missing, null, false and whitespace-only read as undefined. */
  text(fieldPath: string): string | undefined {
    return toText(this.get(fieldPath));
  }

  list(fieldPath: FieldPath): unknown[] | undefined {
    const value = this.get(fieldPath);
    return Array.isArray(value) ? value : undefined;
  }

  count(fieldPath: FieldPath): number {
    return this.list(fieldPath)?.length ?? 0;
  }

  /** Non-blank `itemPath` values of every entry of the array at `arrayPath`. */
  collectText(arrayPath: FieldPath, itemPath: string): string[] {
    const entries = this.list(arrayPath) ?? [];
    const keys = splitPath(itemPath);
    const values: string[] = [];

    for (const entry of entries) {
      const value = toText(readPath(entry, keys));
      if (value !== undefined) values.push(value);
    }

    return values;
  }
}

// =============================================================================
// LOADING
// =============================================================================

export async function loadProfileDocument(
  filePath: string,
  displayPath: string = filePath,
): Promise<ProfileDocument> {
  if (!(await isFile(filePath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.profileNotFound,
      title: "Profile file not found.",
      message: `Profile file not found: ${displayPath}`,
      hint: "Create the profile record or set profile_path in .folio/config.yaml.",
    });
  }

  const raw = await readTextFile(filePath);
  return parseProfileDocument(raw, displayPath);
}

export function parseProfileDocument(raw: string, displayPath: string): ProfileDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.malformedInput,
      title: "Invalid JSON format.",
      message: `Invalid JSON format in ${displayPath}: ${formatErrorMessage(err)}`,
      hint: "Use a JSON validator to fix syntax errors: https://jsonlint.com/",
      cause: err,
    });
  }

  if (!isRecord(parsed)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.malformedInput,
      title: "Invalid JSON format.",
      message: `Expected a JSON object at the top level of ${displayPath}.`,
    });
  }

  return new ProfileDocument(displayPath, parsed);
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitPath(fieldPath: string): string[] {
  return fieldPath.split(".").filter((segment) => segment.length > 0);
}

function readPath(value: unknown, keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function toText(value: unknown): string | undefined {
  if (value === undefined || value === null || value === false) return undefined;

  const text = typeof value === "string" ? value : JSON.stringify(value);
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
