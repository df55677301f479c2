#!/usr/bin/env node

import { Command, Option } from "commander";
import { createContext, type GlobalOpts } from "./commands/context.js";
import { runRelease, type ReleaseCommand } from "./commands/release.js";
import { validateSetup } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { Reporter, supportsColor } from "./report/reporter.js";

const EXAMPLES = `
Examples:
  releasectl --bump patch               bump patch version
  releasectl --bump minor               bump minor version
  releasectl --version 1.2.3            set version to 1.2.3
  releasectl commit                     commit version changes and create tag
  releasectl push                       push commit and tag to remote
  releasectl --bump minor --all         do all steps with prompts
  releasectl --bump patch --branch main bump on a specific branch`;

const program = new Command();

program
  .name("releasectl")
  .description("Bump the project version, commit and tag it, and push the release")
  .usage("[options] [command]")
  .allowExcessArguments(false)
  .option("--bump <type>", "Bump version semantically (major, minor, patch, alpha, beta, rc, ...)")
  .option("--version <ver>", "Set explicit version number (leading 'v' is dropped)")
  .option("--branch <ref>", "Branch to release from (default: the remote's default branch)")
  .option("--all", "Execute bump, commit and push with prompts between each")
  .option("-y, --yes", "Never prompt; proceed wherever a confirmation would be asked")
  .option("--config <file>", "Config file (default: .releasectl.yaml)")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .addHelpText("after", EXAMPLES);

async function execute(command: ReleaseCommand): Promise<void> {
  const opts = program.opts<GlobalOpts>();
  const res = createContext(opts, () => program.helpInformation());
  if (!res.ok) {
    res.reporter.error(res.error, "CONFIG_INVALID");
    process.exitCode = EXIT.FAILURE;
    return;
  }
  process.exitCode = await runRelease(
    command,
    { bump: opts.bump, version: opts.version, branch: opts.branch },
    res.ctx,
  );
}

program.action(async () => {
  await execute(program.opts<GlobalOpts>().all ? "all" : "bump");
});

program
  .command("commit")
  .description("Commit version changes and create tag")
  .action(async () => {
    await execute("commit");
  });

program
  .command("push")
  .description("Push commit and tag to remote")
  .action(async () => {
    await execute("push");
  });

program
  .command("status")
  .description("Show how far the release of the current version has progressed")
  .action(async () => {
    await execute("status");
  });

program
  .command("validate")
  .description("Validate configuration and version tooling")
  .action(async () => {
    const opts = program.opts<GlobalOpts>();
    const reporter = new Reporter({ format: opts.format, color: supportsColor(process.stdout) });
    process.exitCode = await validateSetup(reporter, {
      cwd: process.cwd(),
      configFile: opts.config,
      env: process.env,
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[ERROR] ${message}\n`);
  process.exit(EXIT.FAILURE);
});
