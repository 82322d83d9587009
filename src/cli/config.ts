import path from "node:path";

import { loadFolioConfig, type LoadedConfig } from "../core/config.js";

// =============================================================================
// CONFIG RESOLUTION (CLI)
//
// The working directory is the site root; `.folio/config.yaml` beside it is
// optional and every key falls back to its default.
// =============================================================================

export type CliContext = LoadedConfig & {
  repoRoot: string;
  projectName: string;
};

export function loadConfigForCli(args: { cwd?: string } = {}): CliContext {
  const repoRoot = path.resolve(args.cwd ?? process.cwd());
  const loaded = loadFolioConfig(repoRoot);

  return { ...loaded, repoRoot, projectName: slugifyProjectName(path.basename(repoRoot)) };
}

export function slugifyProjectName(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug.length > 0 ? slug : "site";
}
