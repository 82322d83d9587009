import { describe, expect, it } from "vitest";

import { slugifyProjectName } from "./config.js";

describe("slugifyProjectName", () => {
  it("lowercases and replaces unsafe characters", () => {
    expect(slugifyProjectName("My Portfolio (2024)")).toBe("my-portfolio-2024");
  });

  it("falls back when nothing usable remains", () => {
    expect(slugifyProjectName("***")).toBe("site");
  });
});
