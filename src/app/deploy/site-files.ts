import path from "node:path";

import { pathExists, removeFile, writeTextFile } from "../../core/utils.js";
import { loadProfileDocument } from "../../profile/document.js";

import type { ProfileSource, SiteFiles } from "./ports.js";

// Paths are relative to the working-tree root.

export function createFsSiteFiles(repoRoot: string): SiteFiles {
  const resolve = (relPath: string): string => path.resolve(repoRoot, relPath);

  return {
    exists: (relPath) => pathExists(resolve(relPath)),
    write: (relPath, contents) => writeTextFile(resolve(relPath), contents),
    remove: (relPath) => removeFile(resolve(relPath)),
  };
}

export function createFsProfileSource(repoRoot: string): ProfileSource {
  return (relPath) => loadProfileDocument(path.resolve(repoRoot, relPath), relPath);
}
