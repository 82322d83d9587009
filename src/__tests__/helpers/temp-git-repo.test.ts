import { execa } from "execa";
import { afterEach, describe, expect, it } from "vitest";

import { createBareRemote, createTempGitRepo } from "./temp-git-repo.js";

type TempRepoHandle = Awaited<ReturnType<typeof createTempGitRepo>>;

let repoHandle: TempRepoHandle | null = null;

afterEach(async () => {
  if (!repoHandle) return;
  await repoHandle.cleanup();
  repoHandle = null;
});

// =============================================================================
// TESTS
// =============================================================================

describe("temp git repo helper", () => {
  it("creates commits and exposes git history", async () => {
    repoHandle = await createTempGitRepo();

    await repoHandle.writeFile("notes/first.txt", "first\n");
    const firstSha = await repoHandle.commit("first commit");

    await repoHandle.writeFile("notes/second.txt", "second\n");
    const secondSha = await repoHandle.commit("second commit");

    expect(firstSha).not.toEqual(secondSha);

    const log = await repoHandle.git(["log", "--oneline"]);

    expect(log).toContain("first commit");
    expect(log).toContain("second commit");
  });

  it("creates a bare remote under owner/repo.git", async () => {
    repoHandle = await createTempGitRepo({ init: false });

    const remoteDir = await createBareRemote(repoHandle.tempRoot, "octo", "octo.github.io");
    const result = await execa("git", ["rev-parse", "--is-bare-repository"], { cwd: remoteDir });

    expect(remoteDir.endsWith("octo/octo.github.io.git")).toBe(true);
    expect(result.stdout.trim()).toBe("true");
    expect(await repoHandle.exists(".git")).toBe(false);
  });
});
