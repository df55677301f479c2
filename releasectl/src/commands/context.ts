import { loadConfig } from "../config/loader.js";
import { ReleaseCoordinator } from "../core/coordinator.js";
import { GitRepository } from "../git/repository.js";
import { selectConfirmation } from "../prompt/confirm.js";
import { Reporter, supportsColor, type OutputFormat } from "../report/reporter.js";
import { createVersionManager } from "../version/factory.js";
import type { ReleaseContext } from "./release.js";

export type GlobalOpts = {
  bump?: string;
  version?: string;
  branch?: string;
  all?: boolean;
  yes?: boolean;
  config?: string;
  format: OutputFormat;
};

export type ContextResult =
  | { ok: true; ctx: ReleaseContext }
  | { ok: false; reporter: Reporter; error: string };

/** Wire config, git, version manager and prompts for the current directory. */
export function createContext(opts: GlobalOpts, usage: () => string): ContextResult {
  const cwd = process.cwd();
  const reporter = new Reporter({ format: opts.format, color: supportsColor(process.stdout) });

  const loaded = loadConfig({ cwd, configFile: opts.config, env: process.env });
  if (!loaded.ok) return { ok: false, reporter, error: loaded.error };
  const { config } = loaded;

  const coordinator = new ReleaseCoordinator({
    repo: new GitRepository(cwd),
    versions: createVersionManager(config, cwd),
    confirm: selectConfirmation(reporter, { yes: opts.yes, isTTY: process.stdin.isTTY }),
    reporter,
    settings: { remote: config.remote, forgeUrl: config.forge_url },
  });

  return { ok: true, ctx: { coordinator, reporter, usage } };
}
