import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildProfileRecord, writeProfile } from "../__tests__/helpers/profile-fixture.js";
import { USER_FACING_ERROR_CODES } from "../core/errors.js";
import { deployLogPath } from "../core/paths.js";

import { slugifyProjectName } from "./config.js";
import { deployCommand } from "./deploy.js";

// =============================================================================
// HELPERS
// =============================================================================

let siteDir = "";

beforeEach(async () => {
  siteDir = await fs.mkdtemp(path.join(os.tmpdir(), "folio-deploy-cli-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(siteDir, { recursive: true, force: true });
});

async function readEventTypes(runId: string): Promise<unknown[]> {
  const logPath = deployLogPath(slugifyProjectName(path.basename(siteDir)), runId);
  const raw = await fs.readFile(logPath, "utf8");
  return raw
    .trim()
    .split("\n")
    .map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === "object" && parsed !== null && "type" in parsed
        ? parsed.type
        : undefined;
    });
}

// =============================================================================
// TESTS
// =============================================================================

describe("deployCommand", () => {
  it("fails without a token and records the run in the event log", async () => {
    await writeProfile(siteDir, buildProfileRecord());

    await expect(deployCommand({ cwd: siteDir, runId: "run-1" })).rejects.toMatchObject({
      code: USER_FACING_ERROR_CODES.authenticationFailure,
    });

    expect(await readEventTypes("run-1")).toEqual([
      "deploy.start",
      "phase.complete",
      "phase.complete",
      "phase.complete",
      "deploy.failed",
    ]);
  });

  it("rejects an empty --token even when GH_TOKEN is set", async () => {
    await writeProfile(siteDir, buildProfileRecord());
    process.env.GH_TOKEN = "test-secret";

    await expect(deployCommand({ cwd: siteDir, token: "", runId: "run-3" })).rejects.toMatchObject({
      code: USER_FACING_ERROR_CODES.authenticationFailure,
      title: "GitHub Personal Access Token (PAT) not provided.",
    });
  });

  it("renders an invalid repo config as a config error", async () => {
    await fs.mkdir(path.join(siteDir, ".folio"), { recursive: true });
    await fs.writeFile(path.join(siteDir, ".folio/config.yaml"), "main_branch: 42\n", "utf8");

    await expect(deployCommand({ cwd: siteDir, runId: "run-2" })).rejects.toMatchObject({
      code: USER_FACING_ERROR_CODES.config,
      title: "Deploy failed.",
    });
  });
});
