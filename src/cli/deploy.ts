import { createGitVcs } from "../app/deploy/git-vcs.js";
import type { DeployEventSink } from "../app/deploy/ports.js";
import { runDeploy, type DeployResult } from "../app/deploy/deployer.js";
import { createFsProfileSource, createFsSiteFiles } from "../app/deploy/site-files.js";
import { createExecaToolProbe } from "../app/deploy/tool-probe.js";
import { resolveDeployToken } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { JsonlLogger, logDeployEvent } from "../core/logger.js";
import { deployLogPath } from "../core/paths.js";
import { defaultRunId } from "../core/utils.js";
import { createGithubHostingClient } from "../hosting/github.js";

import { normalizeCommandError } from "./command-errors.js";
import { loadConfigForCli, type CliContext } from "./config.js";
import { createConsoleReporter } from "./console-reporter.js";

// =============================================================================
// COMMAND
// =============================================================================

export type DeployCommandOptions = {
  token?: string;
  cwd?: string;
  runId?: string;
};

const DEPLOY_FAILURE_TITLE = "Deploy failed.";

export async function deployCommand(options: DeployCommandOptions = {}): Promise<DeployResult> {
  let context: CliContext;
  try {
    context = loadConfigForCli({ cwd: options.cwd });
  } catch (error) {
    throw normalizeCommandError(error, DEPLOY_FAILURE_TITLE);
  }

  const { config, repoRoot } = context;
  const eventLog = openDeployEventLog(context.projectName, options.runId ?? defaultRunId());

  try {
    return await runDeploy(
      { repoRoot, config, token: resolveDeployToken(options.token) },
      {
        toolProbe: createExecaToolProbe(),
        vcs: createGitVcs(),
        hosting: (token) => createGithubHostingClient({ token, hosting: config.hosting }),
        files: createFsSiteFiles(repoRoot),
        loadProfile: createFsProfileSource(repoRoot),
        reporter: createConsoleReporter(),
        events: eventLog.sink,
      },
    );
  } catch (error) {
    throw normalizeCommandError(error, DEPLOY_FAILURE_TITLE);
  } finally {
    eventLog.close();
  }
}

// =============================================================================
// EVENT LOG
// =============================================================================

type DeployEventLog = {
  sink: DeployEventSink;
  close: () => void;
};

function openDeployEventLog(projectName: string, runId: string): DeployEventLog {
  const filePath = deployLogPath(projectName, runId);

  let logger: JsonlLogger;
  try {
    logger = new JsonlLogger(filePath, { runId });
  } catch (err) {
    console.warn(`Warning: deploy events will not be logged (${filePath}): ${formatErrorMessage(err)}`);
    return { sink: { emit: () => undefined }, close: () => undefined };
  }

  return {
    sink: { emit: (type, payload) => logDeployEvent(logger, type, payload) },
    close: () => logger.close(),
  };
}
