import { Command } from "commander";

import { deployCommand } from "./deploy.js";
import { validateCommand } from "./validate.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("folio")
    .description("Validate a portfolio profile and deploy the site to GitHub Pages")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("validate")
    .description("Check data/profile.json, the files it references and the Pages workflow")
    .action(async () => {
      await validateCommand();
    });

  program
    .command("deploy")
    .description("Publish the working tree to <login>.github.io and enable GitHub Pages")
    .option("--token <pat>", "GitHub personal access token (default: $GH_TOKEN or $GITHUB_TOKEN)")
    .action(async (opts: { token?: string }) => {
      await deployCommand({ token: opts.token });
    });

  return program;
}
