import os from "node:os";
import path from "node:path";

// =============================================================================
// CONTEXT
// =============================================================================

/** FOLIO_HOME when set, otherwise ~/.folio. */
export function resolveFolioHome(): string {
  if (process.env.FOLIO_HOME) {
    return path.resolve(process.env.FOLIO_HOME);
  }

  return path.join(os.homedir(), ".folio");
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function logsBaseDir(projectName: string): string {
  return path.join(resolveFolioHome(), "logs", projectName);
}

export function deployLogPath(projectName: string, runId: string): string {
  return path.join(logsBaseDir(projectName), `deploy-${runId}.jsonl`);
}

export function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, ".folio", "config.yaml");
}
