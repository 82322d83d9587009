/**
 * Git-backed VCS adapter.
 * Purpose: map Vcs port calls onto the git helpers.
 * Usage: createGitVcs() and pass it to runDeploy as `vcs`.
 */

import {
  addRemote,
  checkoutResetBranch,
  commit,
  currentBranch,
  getRemoteUrl,
  hasCommits,
  hasStagedChanges,
  initRepo,
  isInsideWorkTree,
  pointHeadAt,
  push,
  setLocalConfig,
  setRemoteUrl,
  stageAll,
} from "../../git/git.js";

import type { Vcs } from "./ports.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(): Vcs {
  return {
    isInsideWorkTree,
    init: initRepo,
    currentBranch,
    ensureBranch: async (repoPath, branch) => {
      // `checkout -B` needs a commit to point at; an unborn HEAD only needs re-pointing.
      if (await hasCommits(repoPath)) {
        await checkoutResetBranch(repoPath, branch);
      } else {
        await pointHeadAt(repoPath, branch);
      }
    },
    setLocalIdentity: async (repoPath, identity) => {
      await setLocalConfig(repoPath, "user.name", identity.name);
      await setLocalConfig(repoPath, "user.email", identity.email);
    },
    stageAll,
    hasStagedChanges,
    commit,
    getRemoteUrl,
    addRemote,
    setRemoteUrl,
    push: (repoPath, request) =>
      push(repoPath, {
        remote: request.remote,
        branch: request.branch,
        token: request.token,
      }),
  };
}
