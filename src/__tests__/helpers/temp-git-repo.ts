import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type TempGitRepo = {
  tempRoot: string;
  repoDir: string;
  writeFile: (relPath: string, contents: string) => Promise<void>;
  readFile: (relPath: string) => Promise<string>;
  exists: (relPath: string) => Promise<boolean>;
  rm: (relPath: string) => Promise<void>;
  commit: (message: string) => Promise<string>;
  git: (args: string[]) => Promise<string>;
  cleanup: () => Promise<void>;
};

export type TempGitRepoOptions = {
  /** When false, the directory starts as a plain folder without `git init`. */
  init?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createTempGitRepo(opts: TempGitRepoOptions = {}): Promise<TempGitRepo> {
  const tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "folio-git-"));
  const repoDir = path.join(tempRoot, "site");

  await fs.mkdir(repoDir, { recursive: true });
  if (opts.init ?? true) {
    await initGitRepo(repoDir);
  }

  const git = async (args: string[]): Promise<string> => {
    const result = await execa("git", ["-C", repoDir, ...args]);
    return result.stdout;
  };

  const writeFile = async (relPath: string, contents: string): Promise<void> => {
    const absolutePath = path.join(repoDir, relPath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, normalizeLineEndings(contents), "utf8");
  };

  const readFile = async (relPath: string): Promise<string> => {
    return fs.readFile(path.join(repoDir, relPath), "utf8");
  };

  const exists = async (relPath: string): Promise<boolean> => {
    try {
      await fs.access(path.join(repoDir, relPath));
      return true;
    } catch {
      return false;
    }
  };

  const rm = async (relPath: string): Promise<void> => {
    await fs.rm(path.join(repoDir, relPath), { recursive: true, force: true });
  };

  const commit = async (message: string): Promise<string> => {
    await git(["add", "-A"]);
    await git(["commit", "-m", message]);
    const sha = await git(["rev-parse", "HEAD"]);
    return sha.trim();
  };

  const cleanup = async (): Promise<void> => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  };

  return { tempRoot, repoDir, writeFile, readFile, exists, rm, commit, git, cleanup };
}

/**
 * Creates `<root>/<owner>/<repo>.git` as a bare repository, matching the
 * `<git_base_url>/<owner>/<repo>.git` layout the deployer pushes to.
 */
export async function createBareRemote(root: string, owner: string, repo: string): Promise<string> {
  const remoteDir = path.join(root, owner, `${repo}.git`);
  await fs.mkdir(remoteDir, { recursive: true });
  await execa("git", ["init", "--bare", "--initial-branch=main"], { cwd: remoteDir });
  return remoteDir;
}

export async function configureTestIdentity(repoDir: string): Promise<void> {
  await execa("git", ["config", "user.name", "folio-test"], { cwd: repoDir });
  await execa("git", ["config", "user.email", "folio-test@example.com"], { cwd: repoDir });
  await execa("git", ["config", "commit.gpgsign", "false"], { cwd: repoDir });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function initGitRepo(repoDir: string): Promise<void> {
  await execa("git", ["init", "--initial-branch=main"], { cwd: repoDir });
  await configureTestIdentity(repoDir);
}

function normalizeLineEndings(contents: string): string {
  return contents.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}
