import { execa } from "execa";

import type { ToolProbe, ToolRequirement } from "./ports.js";

// Profile parsing and the hosting API run in-process, so git is the only external tool.
export const REQUIRED_TOOLS: ToolRequirement[] = [
  {
    name: "git",
    label: "git",
    installHint: "Install from: https://git-scm.com/downloads",
  },
];

export function createExecaToolProbe(): ToolProbe {
  return {
    isAvailable: async (tool) => {
      try {
        const res = await execa(tool, ["--version"], { reject: false, stdio: "ignore" });
        return res.exitCode === 0;
      } catch {
        // spawn failure (ENOENT) means the tool is not installed
        return false;
      }
    },
  };
}
