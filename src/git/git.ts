import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export type GitPushOptions = {
  remote: string;
  branch: string;
  /** Sent as an HTTP basic auth header; never written to git config. */
  token?: string;
};

// =============================================================================
// RUNNER
// =============================================================================

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      ...opts,
    });
    return {
      stdout: toText(res.stdout),
      stderr: toText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    throw buildGitErrorFromCommand(args, cwd, err);
  }
}

/** Run git without rejecting on a non-zero exit; spawn failures still throw. */
export async function gitStatus(cwd: string, args: string[]): Promise<GitResult> {
  return git(cwd, args, { reject: false });
}

// =============================================================================
// REPOSITORY
// =============================================================================

export async function isInsideWorkTree(cwd: string): Promise<boolean> {
  const res = await gitStatus(cwd, ["rev-parse", "--is-inside-work-tree"]);
  return res.exitCode === 0 && res.stdout.trim() === "true";
}

export async function initRepo(cwd: string): Promise<void> {
  await git(cwd, ["init"]);
}

export async function setLocalConfig(cwd: string, key: string, value: string): Promise<void> {
  await git(cwd, ["config", "--local", key, value]);
}

// =============================================================================
// BRANCHES
// =============================================================================

/** Current branch name, including an unborn branch; null on a detached HEAD. */
export async function currentBranch(cwd: string): Promise<string | null> {
  const res = await gitStatus(cwd, ["symbolic-ref", "--short", "-q", "HEAD"]);
  if (res.exitCode !== 0) return null;
  const branch = res.stdout.trim();
  return branch.length > 0 ? branch : null;
}

export async function hasCommits(cwd: string): Promise<boolean> {
  const res = await gitStatus(cwd, ["rev-parse", "--verify", "-q", "HEAD"]);
  return res.exitCode === 0;
}

export async function headSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function checkoutResetBranch(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["checkout", "-B", branch]);
}

export async function pointHeadAt(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["symbolic-ref", "HEAD", `refs/heads/${branch}`]);
}

// =============================================================================
// STAGING
// =============================================================================

export async function stageAll(cwd: string): Promise<void> {
  await git(cwd, ["add", "-A"]);
}

export async function hasStagedChanges(cwd: string): Promise<boolean> {
  const res = await gitStatus(cwd, ["diff", "--cached", "--quiet"]);
  if (res.exitCode === 0) return false;
  if (res.exitCode === 1) return true;

  throw new GitError(`git diff --cached --quiet failed (cwd=${cwd}): ${res.stderr}`, {
    stdout: res.stdout,
    stderr: res.stderr,
  });
}

export async function commit(cwd: string, message: string): Promise<string> {
  await git(cwd, ["commit", "-m", message]);
  return headSha(cwd);
}

// =============================================================================
// REMOTES
// =============================================================================

export async function getRemoteUrl(cwd: string, remote = "origin"): Promise<string | null> {
  const res = await gitStatus(cwd, ["remote", "get-url", remote]);
  if (res.exitCode !== 0) return null;
  const url = res.stdout.trim();
  return url.length > 0 ? url : null;
}

export async function addRemote(cwd: string, name: string, url: string): Promise<void> {
  await git(cwd, ["remote", "add", name, url]);
}

export async function setRemoteUrl(cwd: string, name: string, url: string): Promise<void> {
  await git(cwd, ["remote", "set-url", name, url]);
}

export async function push(cwd: string, opts: GitPushOptions): Promise<void> {
  await git(cwd, ["push", "-u", opts.remote, opts.branch], { env: buildPushEnv(opts.token) });
}

export function buildPushEnv(token: string | undefined): Record<string, string> {
  const env: Record<string, string> = { GIT_TERMINAL_PROMPT: "0" };
  if (!token) return env;

  // GIT_CONFIG_* keeps the credential out of argv and out of .git/config.
  const basic = Buffer.from(`x-access-token:${token}`, "utf8").toString("base64");
  env.GIT_CONFIG_COUNT = "1";
  env.GIT_CONFIG_KEY_0 = "http.extraheader";
  env.GIT_CONFIG_VALUE_0 = `AUTHORIZATION: basic ${basic}`;
  return env;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

export function isPushRejectedError(err: unknown): boolean {
  if (!(err instanceof GitError)) return false;

  const { stderr } = extractGitErrorOutput(err);
  const output = stderr.toLowerCase();
  return (
    output.includes("[rejected]") ||
    output.includes("non-fast-forward") ||
    output.includes("fetch first")
  );
}

export function extractGitErrorOutput(err: GitError): { stdout: string; stderr: string } {
  return { stdout: readTextField(err.cause, "stdout"), stderr: readTextField(err.cause, "stderr") };
}

function buildGitErrorFromCommand(args: string[], cwd: string, err: unknown): GitError {
  const { stdout, stderr, message } = resolveExecaErrorOutput(err);
  const detail = stderr || message || "Unknown git error.";
  return new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, { stdout, stderr });
}

function resolveExecaErrorOutput(err: unknown): {
  stdout: string;
  stderr: string;
  message: string;
} {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: String(err) };
  }

  const message = err instanceof Error ? err.message : String(err);
  return { stdout: readTextField(err, "stdout"), stderr: readTextField(err, "stderr"), message };
}

function readTextField(value: unknown, key: "stdout" | "stderr"): string {
  if (!value || typeof value !== "object" || !(key in value)) return "";
  return toText(Reflect.get(value, key));
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}
