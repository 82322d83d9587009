/**
 * Deployer ports define the boundary between the deploy run and its adapters.
 * Purpose: keep git, the hosting API and the console replaceable in tests.
 * Assumptions: every port call is awaited in phase order; none run concurrently.
 * Usage: build adapters in `cli/deploy.ts` and pass them to `runDeploy`.
 */

import type { JsonObject } from "../../core/logger.js";
import type { ProfileDocument } from "../../profile/document.js";

// =============================================================================
// TOOLS
// =============================================================================

export type ToolRequirement = {
  name: string;
  label: string;
  installHint: string;
};

export interface ToolProbe {
  isAvailable(tool: string): Promise<boolean>;
}

// =============================================================================
// VCS
// =============================================================================

export type GitIdentity = {
  name: string;
  email: string;
};

export type PushRequest = {
  remote: string;
  branch: string;
  token: string;
};

export interface Vcs {
  isInsideWorkTree(repoPath: string): Promise<boolean>;
  init(repoPath: string): Promise<void>;
  currentBranch(repoPath: string): Promise<string | null>;
  /** Switch to `branch`, creating or resetting it at HEAD; re-points an unborn HEAD. */
  ensureBranch(repoPath: string, branch: string): Promise<void>;
  setLocalIdentity(repoPath: string, identity: GitIdentity): Promise<void>;
  stageAll(repoPath: string): Promise<void>;
  hasStagedChanges(repoPath: string): Promise<boolean>;
  commit(repoPath: string, message: string): Promise<string>;
  getRemoteUrl(repoPath: string, remote: string): Promise<string | null>;
  addRemote(repoPath: string, remote: string, url: string): Promise<void>;
  setRemoteUrl(repoPath: string, remote: string, url: string): Promise<void>;
  push(repoPath: string, request: PushRequest): Promise<void>;
}

// =============================================================================
// HOSTING
// =============================================================================

export type AuthenticatedUser = {
  login: string;
};

export type RepoProbe = { exists: boolean };

export type PagesSource = {
  branch: string;
  path: "/" | "/docs";
};

export interface HostingClient {
  getAuthenticatedUser(): Promise<AuthenticatedUser>;
  probeRepository(owner: string, repo: string): Promise<RepoProbe>;
  createRepository(name: string): Promise<void>;
  enablePages(owner: string, repo: string, source: PagesSource): Promise<void>;
}

export type HostingClientFactory = (token: string) => HostingClient;

// =============================================================================
// FILES AND PROFILE
// =============================================================================

export interface SiteFiles {
  exists(relPath: string): Promise<boolean>;
  write(relPath: string, contents: string): Promise<void>;
  remove(relPath: string): Promise<void>;
}

export type ProfileSource = (relPath: string) => Promise<ProfileDocument>;

// =============================================================================
// OUTPUT
// =============================================================================

export interface DeployReporter {
  step(title: string): void;
  success(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /** Free-form line, e.g. URL listings in the final report. */
  line(message: string): void;
}

export interface DeployEventSink {
  emit(type: string, payload?: JsonObject): void;
}

export type DeployPorts = {
  toolProbe: ToolProbe;
  vcs: Vcs;
  hosting: HostingClientFactory;
  files: SiteFiles;
  loadProfile: ProfileSource;
  reporter: DeployReporter;
  events: DeployEventSink;
};
