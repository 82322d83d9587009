import { describe, expect, it } from "vitest";

import { createExecaToolProbe } from "./tool-probe.js";

describe("createExecaToolProbe", () => {
  it("finds git on PATH", async () => {
    expect(await createExecaToolProbe().isAvailable("git")).toBe(true);
  });

  it("reports a missing executable as unavailable", async () => {
    expect(await createExecaToolProbe().isAvailable("folio-no-such-tool")).toBe(false);
  });
});
