import { loadConfig } from "../config/loader.js";
import type { Reporter } from "../report/reporter.js";
import { createVersionManager } from "../version/factory.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

/**
 * Resolve and validate configuration, then run the version manager's
 * preflight so a misconfigured project fails here rather than mid-release.
 */
export async function validateSetup(
  reporter: Reporter,
  opts: { cwd: string; configFile?: string; env?: NodeJS.ProcessEnv },
): Promise<ExitCode> {
  const loaded = loadConfig({ cwd: opts.cwd, configFile: opts.configFile, env: opts.env });
  if (!loaded.ok) {
    reporter.error(loaded.error, "CONFIG_INVALID");
    return EXIT.FAILURE;
  }

  for (const source of loaded.sources) reporter.info(`Loaded ${source}`, "CONFIG_SOURCE");
  const { config } = loaded;
  const versions = createVersionManager(config, opts.cwd);
  reporter.info(
    `manager=${config.manager} remote=${config.remote} manifest=${versions.manifest} lock_file=${versions.lockFile}`,
    "CONFIG",
  );

  const failure = await versions.preflight();
  if (failure) {
    reporter.error(failure.message, failure.code);
    if (failure.hint) reporter.detail(failure.hint, true);
    return EXIT.FAILURE;
  }

  reporter.success("Configuration OK");
  return EXIT.SUCCESS;
}
