import fs from "node:fs/promises";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

type JsonRecord = Record<string, unknown>;

export type ProfileRecordFixture = {
  profile: JsonRecord;
  contact: JsonRecord;
  bio: JsonRecord;
  siteConfig: JsonRecord;
  publications: JsonRecord[];
  projects: JsonRecord[];
  education: JsonRecord[];
  navigation: JsonRecord[];
  skills: Record<string, string[]>;
};

// =============================================================================
// BUILDERS
// =============================================================================

export const PROFILE_ASSET_PATHS = [
  "images/profile.jpg",
  "files/cv.pdf",
  "images/publication.png",
  "images/project.png",
  "images/school.png",
];

export const WORKFLOW_PATH = ".github/workflows/deploy-pages.yml";

export function buildProfileRecord(): ProfileRecordFixture {
  return {
    profile: {
      name: "Ada Lovelace",
      title: "Research Engineer",
      organization: "Analytical Engines Ltd",
      profileImage: "images/profile.jpg",
      cvPath: "files/cv.pdf",
    },
    contact: {
      email: "ada@example.com",
      phone: "+1 555 0100",
      location: "London",
      githubUsername: "valid-user1",
      linkedin: "https://www.linkedin.com/in/example",
    },
    bio: {
      introduction: "I build calculating machines.",
      background: "Mathematics and engineering.",
      researchFocus: "Programmable computation.",
    },
    siteConfig: {
      siteTitle: "Ada Lovelace",
      domain: "example.com",
    },
    publications: [{ title: "Notes on the Engine", image: "images/publication.png" }],
    projects: [{ title: "Difference Engine", media: { src: "images/project.png" } }],
    education: [{ school: "Home Tutoring", logo: "images/school.png" }],
    navigation: [
      { label: "About", href: "#about" },
      { label: "Projects", href: "#projects" },
    ],
    skills: {
      languages: ["TypeScript", "Python"],
      tools: ["git"],
    },
  };
}

/** Deep copy of `record` without the field at `fieldPath` (`.section.field`). */
export function withoutField(record: ProfileRecordFixture, fieldPath: string): JsonRecord {
  const copy: JsonRecord = structuredClone(record);
  const keys = fieldPath.split(".").filter((key) => key.length > 0);
  const last = keys.pop();
  if (!last) return copy;

  let current: unknown = copy;
  for (const key of keys) {
    current = isRecord(current) ? current[key] : undefined;
  }
  if (isRecord(current)) {
    delete current[last];
  }
  return copy;
}

// =============================================================================
// FILES
// =============================================================================

export async function writeProfile(
  repoDir: string,
  record: unknown,
  relPath = "data/profile.json",
): Promise<void> {
  const filePath = path.join(repoDir, relPath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, "utf8");
}

export async function writeSiteAssets(
  repoDir: string,
  relPaths: string[] = [...PROFILE_ASSET_PATHS, WORKFLOW_PATH],
): Promise<void> {
  for (const relPath of relPaths) {
    const filePath = path.join(repoDir, relPath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `placeholder for ${relPath}\n`, "utf8");
  }
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
