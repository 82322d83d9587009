/**
 * Deploy run.
 * Purpose: publish the working tree to the owner's Pages repository.
 * Assumptions: phases run in order and each one gates the next; only the Pages
 * configuration phase may fail without aborting the run.
 * Usage: const result = await runDeploy({ repoRoot, config, token }, ports);
 */

import type { FolioConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import {
  HostingError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  isUserFacingError,
} from "../../core/errors.js";
import type { JsonObject } from "../../core/logger.js";
import { isPushRejectedError } from "../../git/git.js";
import type { FieldPath, ProfileDocument } from "../../profile/document.js";
import { describeFieldPath, PROFILE_FIELDS } from "../../profile/rules.js";

import {
  buildDeployCommitMessage,
  buildDnsRecords,
  buildPagesRepoName,
  buildRemoteUrl,
  buildSiteLinks,
  formatDnsRecord,
  type DnsRecord,
  type SiteLinks,
} from "./deploy-helpers.js";
import type { DeployPorts, HostingClient, RepoProbe, ToolRequirement } from "./ports.js";
import { REQUIRED_TOOLS } from "./tool-probe.js";

// =============================================================================
// TYPES
// =============================================================================

export type DeployOptions = {
  repoRoot: string;
  config: FolioConfig;
  token?: string;
  requiredTools?: ToolRequirement[];
};

export type DeployPhase =
  | "dependencies"
  | "profile"
  | "naming"
  | "authentication"
  | "identity"
  | "cname"
  | "branch"
  | "remote-probe"
  | "commit"
  | "push"
  | "pages"
  | "report";

export type ProfileFields = {
  name: string;
  email: string;
  githubUsername: string;
  domain?: string;
};

export type CnameOutcome = "written" | "removed" | "absent";

export type CommitOutcome = { status: "committed"; sha: string } | { status: "unchanged" };

export type RemoteSync =
  | { status: "added"; url: string }
  | { status: "updated"; url: string; previousUrl: string }
  | { status: "unchanged"; url: string };

export type PagesOutcome = { status: "enabled" } | { status: "failed"; reason: string };

export type DeployNotice =
  | { kind: "identity-mismatch"; profileUsername: string; login: string }
  | { kind: "remote-url-updated"; from: string; to: string }
  | { kind: "pages-config-failure"; reason: string };

export type DeployResult = {
  login: string;
  repoName: string;
  domain?: string;
  initializedRepo: boolean;
  repoCreated: boolean;
  cname: CnameOutcome;
  commit: CommitOutcome;
  remote: RemoteSync;
  pages: PagesOutcome;
  links: SiteLinks;
  dnsRecords: DnsRecord[];
  notices: DeployNotice[];
};

const REQUIRED_TOKEN_SCOPES = ["repo", "workflow"];

const USERNAME_EXAMPLE = '"contact": { "githubUsername": "your-github-username", ... }';

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runDeploy(options: DeployOptions, ports: DeployPorts): Promise<DeployResult> {
  ports.events.emit("deploy.start", { repo_root: options.repoRoot });

  try {
    const result = await executeDeploy(options, ports);
    ports.events.emit("deploy.complete", summarizeResult(result));
    return result;
  } catch (err) {
    ports.events.emit("deploy.failed", describeFailure(err));
    throw err;
  }
}

// =============================================================================
// PHASES
// =============================================================================

async function executeDeploy(options: DeployOptions, ports: DeployPorts): Promise<DeployResult> {
  const { config, repoRoot } = options;
  const { reporter, vcs } = ports;
  const notices: DeployNotice[] = [];
  const completePhase = (phase: DeployPhase, payload: JsonObject = {}): void => {
    ports.events.emit("phase.complete", { phase, ...payload });
  };

  // 1. Dependencies
  reporter.step("Checking dependencies...");
  await checkRequiredTools(options.requiredTools ?? REQUIRED_TOOLS, ports);
  completePhase("dependencies");

  // 2. Profile fields
  reporter.step(`Parsing profile data from ${config.profile_path}...`);
  const fields = extractProfileFields(await ports.loadProfile(config.profile_path), config.profile_path);
  reporter.success(`Name: ${fields.name}`);
  reporter.success(`Email: ${fields.email}`);
  reporter.success(`GitHub Username: ${fields.githubUsername}`);
  completePhase("profile");

  // 3. Repository naming
  let repoName = buildPagesRepoName(fields.githubUsername, config.hosting.pages_domain);
  reporter.success(`Repository: ${repoName}`);
  if (fields.domain) {
    reporter.success(`Custom Domain: ${fields.domain}`);
  } else {
    reporter.info("No custom domain configured (will use default GitHub Pages URL)");
  }
  completePhase("naming", { repo: repoName, custom_domain: fields.domain !== undefined });

  // 4. Authentication
  reporter.step("Authenticating with GitHub...");
  const token = requireToken(options.token, config);
  const client = ports.hosting(token);
  const login = await authenticate(client, config);
  reporter.success(`Authenticated as: ${login}`);

  if (login !== fields.githubUsername) {
    notices.push({ kind: "identity-mismatch", profileUsername: fields.githubUsername, login });
    reporter.warn(
      `Authenticated user (${login}) differs from profile username (${fields.githubUsername})`,
    );
    reporter.warn(`The repository will be created under ${login}'s account`);
    repoName = buildPagesRepoName(login, config.hosting.pages_domain);
    reporter.info(`Updated repository name to: ${repoName}`);
  }
  completePhase("authentication", { login, repo: repoName });

  // 5. Local identity (the working tree becomes a repository first when needed)
  reporter.step("Configuring git identity...");
  let initializedRepo = false;
  if (!(await vcs.isInsideWorkTree(repoRoot))) {
    reporter.info("Initializing git repository...");
    await vcs.init(repoRoot);
    initializedRepo = true;
    reporter.success("Git repository initialized");
  }
  await vcs.setLocalIdentity(repoRoot, { name: fields.name, email: fields.email });
  reporter.success(`Git configured with name: ${fields.name}`);
  reporter.success(`Git configured with email: ${fields.email}`);
  completePhase("identity", { initialized_repo: initializedRepo });

  // 6. CNAME
  reporter.step("Managing CNAME file...");
  const cname = await reconcileCname(ports, config.cname_path, fields.domain);
  completePhase("cname", { outcome: cname });

  // 7. Branch
  reporter.step("Setting up GitHub repository...");
  const branch = await vcs.currentBranch(repoRoot);
  if (branch !== config.main_branch) {
    await vcs.ensureBranch(repoRoot, config.main_branch);
    reporter.success(`Switched to ${config.main_branch} branch`);
  }
  completePhase("branch", { branch: config.main_branch });

  // 8. Remote existence
  const probe = await probeRepository(client, login, repoName);
  if (probe.exists) {
    reporter.info(`Repository ${repoName} already exists on GitHub`);
  } else {
    reporter.info(`Repository ${repoName} does not exist, will be created`);
  }
  completePhase("remote-probe", { exists: probe.exists });

  // 9. Commit
  reporter.step("Committing changes...");
  const commit = await commitChanges(ports, repoRoot, buildDeployCommitMessage(fields.name, repoName));
  completePhase("commit", commit.status === "committed" ? { sha: commit.sha } : { status: "unchanged" });

  // 10. Remote, creation and push
  reporter.step("Deploying to GitHub...");
  const remote = await syncRemote(ports, repoRoot, config, login, repoName);
  if (remote.status === "updated") {
    notices.push({ kind: "remote-url-updated", from: remote.previousUrl, to: remote.url });
  }

  if (!probe.exists) {
    reporter.info("Creating repository on GitHub...");
    await createRepository(client, login, repoName);
    reporter.success("Repository created");
  } else {
    reporter.info("Pushing to existing repository...");
  }
  await pushBranch(ports, repoRoot, config, token);
  reporter.success("Code pushed to GitHub");
  completePhase("push", { created: !probe.exists, remote: config.remote_name });

  // 11. Pages
  reporter.step("Configuring GitHub Pages...");
  const pages = await configurePages(client, login, repoName, config.main_branch);
  if (pages.status === "enabled") {
    reporter.success("GitHub Pages configuration verified");
  } else {
    notices.push({ kind: "pages-config-failure", reason: pages.reason });
    reporter.info("GitHub Pages may already be configured");
  }
  completePhase("pages", { status: pages.status });

  // 12. Report
  const links = buildSiteLinks(config.hosting, login, repoName, fields.domain);
  const dnsRecords = fields.domain
    ? buildDnsRecords(config.pages_ips, login, config.hosting.pages_domain)
    : [];
  reportSuccess(ports, links, dnsRecords, fields.domain);
  completePhase("report");

  return {
    login,
    repoName,
    domain: fields.domain,
    initializedRepo,
    repoCreated: !probe.exists,
    cname,
    commit,
    remote,
    pages,
    links,
    dnsRecords,
    notices,
  };
}

async function checkRequiredTools(tools: ToolRequirement[], ports: DeployPorts): Promise<void> {
  for (const tool of tools) {
    if (!(await ports.toolProbe.isAvailable(tool.name))) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.missingDependency,
        title: `${tool.label} is not installed.`,
        message: `Required tool not found on PATH: ${tool.name}`,
        hint: tool.installHint,
      });
    }
    ports.reporter.success(`${tool.label} is installed`);
  }
}

export function extractProfileFields(doc: ProfileDocument, profilePath: string): ProfileFields {
  const requireField = (fieldPath: FieldPath, hint?: string): string => {
    const value = doc.text(fieldPath);
    if (value !== undefined) return value;

    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.missingRequiredField,
      title: "Missing required profile field.",
      message: `Missing '${describeFieldPath(fieldPath)}' in ${profilePath}`,
      hint,
    });
  };

  const name = requireField(PROFILE_FIELDS.name);
  const email = requireField(PROFILE_FIELDS.email);
  const githubUsername = requireField(
    PROFILE_FIELDS.githubUsername,
    `Add the GitHub username to the contact section: ${USERNAME_EXAMPLE}`,
  );
  const domain = doc.text(PROFILE_FIELDS.domain);

  return domain ? { name, email, githubUsername, domain } : { name, email, githubUsername };
}

function requireToken(token: string | undefined, config: FolioConfig): string {
  if (token) return token;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.authenticationFailure,
    title: "GitHub Personal Access Token (PAT) not provided.",
    message: "A GitHub token is required to create the repository and push to it.",
    hint: `Generate a PAT at ${config.hosting.web_base_url}/settings/tokens/new (scopes: ${REQUIRED_TOKEN_SCOPES.join(", ")}).`,
    next: "Set GH_TOKEN or run `folio deploy --token <pat>`.",
  });
}

async function authenticate(client: HostingClient, config: FolioConfig): Promise<string> {
  try {
    const user = await client.getAuthenticatedUser();
    return user.login;
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.authenticationFailure,
      title: "Failed to authenticate with GitHub.",
      message: `Token verification failed: ${formatErrorMessage(err)}`,
      hint: `Check that the token is valid and has the required scopes: ${REQUIRED_TOKEN_SCOPES.join(", ")}.`,
      next: `Generate a new token at ${config.hosting.web_base_url}/settings/tokens/new if needed.`,
      cause: err,
    });
  }
}

async function reconcileCname(
  ports: DeployPorts,
  cnamePath: string,
  domain: string | undefined,
): Promise<CnameOutcome> {
  if (domain) {
    await ports.files.write(cnamePath, `${domain}\n`);
    ports.reporter.success(`CNAME file created/updated with: ${domain}`);
    return "written";
  }

  if (await ports.files.exists(cnamePath)) {
    await ports.files.remove(cnamePath);
    ports.reporter.success("CNAME file removed (using default GitHub Pages URL)");
    return "removed";
  }

  ports.reporter.info("No CNAME file to remove");
  return "absent";
}

async function probeRepository(
  client: HostingClient,
  owner: string,
  repo: string,
): Promise<RepoProbe> {
  try {
    return await client.probeRepository(owner, repo);
  } catch (err) {
    throw wrapHostingError(err, `Failed to look up ${owner}/${repo} on GitHub.`);
  }
}

async function commitChanges(
  ports: DeployPorts,
  repoRoot: string,
  message: string,
): Promise<CommitOutcome> {
  await ports.vcs.stageAll(repoRoot);

  if (!(await ports.vcs.hasStagedChanges(repoRoot))) {
    ports.reporter.info("No changes to commit");
    return { status: "unchanged" };
  }

  const sha = await ports.vcs.commit(repoRoot, message);
  ports.reporter.success("Changes committed");
  return { status: "committed", sha };
}

async function syncRemote(
  ports: DeployPorts,
  repoRoot: string,
  config: FolioConfig,
  owner: string,
  repoName: string,
): Promise<RemoteSync> {
  const remote = config.remote_name;
  const url = buildRemoteUrl(config.hosting.git_base_url, owner, repoName);
  const currentUrl = await ports.vcs.getRemoteUrl(repoRoot, remote);

  if (currentUrl === null) {
    ports.reporter.info(`Adding remote '${remote}'...`);
    await ports.vcs.addRemote(repoRoot, remote, url);
    return { status: "added", url };
  }

  ports.reporter.info(`Remote '${remote}' already configured`);
  if (currentUrl === url) {
    return { status: "unchanged", url };
  }

  ports.reporter.warn(`Updating remote URL to: ${url}`);
  await ports.vcs.setRemoteUrl(repoRoot, remote, url);
  return { status: "updated", url, previousUrl: currentUrl };
}

async function createRepository(client: HostingClient, owner: string, repo: string): Promise<void> {
  try {
    await client.createRepository(repo);
  } catch (err) {
    const alreadyExists = err instanceof HostingError && err.status === 422;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.repositoryCreateFailure,
      title: "Failed to create repository.",
      message: `Could not create ${owner}/${repo}: ${formatErrorMessage(err)}`,
      hint: alreadyExists
        ? "The repository may have been created by another run since it was checked. Re-run the deploy to push to it."
        : "Check that the token has the repo scope.",
      cause: err,
    });
  }
}

async function pushBranch(
  ports: DeployPorts,
  repoRoot: string,
  config: FolioConfig,
  token: string,
): Promise<void> {
  const remote = config.remote_name;
  const branch = config.main_branch;

  try {
    await ports.vcs.push(repoRoot, { remote, branch, token });
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.pushFailure,
      title: "Failed to push to repository.",
      message: isPushRejectedError(err)
        ? `The ${remote}/${branch} branch has commits that are not in the local history.`
        : formatErrorMessage(err),
      hint: `You may need to use: git push -u ${remote} ${branch} --force`,
      next: "The local commit was kept; push it once the remote history is reconciled.",
      cause: err,
    });
  }
}

async function configurePages(
  client: HostingClient,
  owner: string,
  repo: string,
  branch: string,
): Promise<PagesOutcome> {
  try {
    await client.enablePages(owner, repo, { branch, path: "/" });
    return { status: "enabled" };
  } catch (err) {
    return { status: "failed", reason: formatErrorMessage(err) };
  }
}

function reportSuccess(
  ports: DeployPorts,
  links: SiteLinks,
  dnsRecords: DnsRecord[],
  domain: string | undefined,
): void {
  const { reporter } = ports;

  reporter.line("");
  reporter.success("Portfolio deployed successfully!");
  reporter.info("Important URLs:");
  reporter.line(`   Repository:    ${links.repository}`);
  reporter.line(`   Actions:       ${links.actions}`);
  reporter.line(`   Live Site:     ${links.liveSite}`);

  if (domain) {
    reporter.warn(`IMPORTANT: Configure your DNS records for ${domain}`);
    reporter.info("Add these DNS records at your domain registrar:");
    for (const record of dnsRecords) {
      reporter.info(`  ${formatDnsRecord(record)}`);
    }
  }

  reporter.info("GitHub Actions is building your site now...");
  reporter.info("Visit the Actions URL above to watch the deployment progress.");

  if (domain) {
    reporter.info("After DNS is configured:");
    reporter.info(`  1. Go to: ${links.pagesSettings}`);
    reporter.info(`  2. Verify custom domain is set to: ${domain}`);
    reporter.info("  3. Enable 'Enforce HTTPS' once certificate is issued");
  }

  reporter.success("Deployment complete!");
}

// =============================================================================
// INTERNALS
// =============================================================================

function wrapHostingError(err: unknown, title: string): UserFacingError {
  if (isUserFacingError(err)) return err;

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.hosting,
    title,
    message: formatErrorMessage(err),
    cause: err,
  });
}

function summarizeResult(result: DeployResult): JsonObject {
  return {
    login: result.login,
    repo: result.repoName,
    repo_created: result.repoCreated,
    cname: result.cname,
    commit: result.commit.status === "committed" ? result.commit.sha : null,
    pages: result.pages.status,
    notices: result.notices.map((notice) => notice.kind),
  };
}

function describeFailure(err: unknown): JsonObject {
  if (isUserFacingError(err)) {
    return { code: err.code, title: err.title, message: err.message };
  }
  return { message: formatErrorMessage(err) };
}
