import fs from "node:fs";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigError } from "./errors.js";
import { repoConfigPath } from "./paths.js";

// GitHub Pages apex addresses, https://docs.github.com/pages/configuring-a-custom-domain-for-your-github-pages-site
const DEFAULT_PAGES_IPS = [
  "185.199.108.153",
  "185.199.109.153",
  "185.199.110.153",
  "185.199.111.153",
];

const HostingSchema = z.object({
  api_base_url: z.string().url().default("https://api.github.com"),
  web_base_url: z.string().url().default("https://github.com"),
  git_base_url: z.string().min(1).default("https://github.com"),
  pages_domain: z.string().min(1).default("github.io"),
  request_timeout_ms: z.number().int().positive().default(20_000),
});

export const FolioConfigSchema = z.object({
  profile_path: z.string().min(1).default("data/profile.json"),
  workflow_path: z.string().min(1).default(".github/workflows/deploy-pages.yml"),
  main_branch: z.string().min(1).default("main"),
  remote_name: z.string().min(1).default("origin"),
  cname_path: z.string().min(1).default("CNAME"),
  pages_ips: z.array(z.string().ip({ version: "v4" })).min(1).default(DEFAULT_PAGES_IPS),
  hosting: HostingSchema.default({}),
});

export type FolioConfig = z.infer<typeof FolioConfigSchema>;
export type HostingConfig = FolioConfig["hosting"];

export type LoadedConfig = {
  config: FolioConfig;
  configPath: string;
  source: "repo" | "defaults";
};

// =============================================================================
// LOADING
// =============================================================================

function expandEnv(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_, varName: string) => {
      const v = process.env[varName];
      if (v === undefined) {
        throw new ConfigError(`Environment variable ${varName} is not set but is referenced in config.`);
      }
      return v;
    });
  }
  if (Array.isArray(value)) {
    return value.map(expandEnv);
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnv(v);
    }
    return out;
  }
  return value;
}

export function parseFolioConfig(doc: unknown, source = "<inline>"): FolioConfig {
  const expanded = expandEnv(doc ?? {});

  const parsed = FolioConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(`Invalid folio config: ${source}\n${parsed.error.toString()}`);
  }

  return parsed.data;
}

export function loadFolioConfig(repoRoot: string): LoadedConfig {
  const configPath = repoConfigPath(repoRoot);
  if (!fs.existsSync(configPath)) {
    return { config: parseFolioConfig({}), configPath, source: "defaults" };
  }

  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML config: ${configPath}`, err);
  }

  return { config: parseFolioConfig(doc, configPath), configPath, source: "repo" };
}

// =============================================================================
// TOKEN
// =============================================================================

/**
 * Hosting token precedence: explicit flag, then GH_TOKEN, then GITHUB_TOKEN.
 * A flag that was passed but is blank means "no token"; the environment is not consulted.
 */
export function resolveDeployToken(
  flagToken: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (flagToken !== undefined) return flagToken.trim() || undefined;

  for (const candidate of [env.GH_TOKEN, env.GITHUB_TOKEN]) {
    const trimmed = candidate?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}
