import type { ReleaseConfig } from "../types/config.js";
import type { VersionManager } from "./manager.js";
import { NpmVersionManager } from "./npm.js";
import { UvVersionManager } from "./uv.js";

/** Build the version manager named by `config.manager`, rooted at `cwd`. */
export function createVersionManager(config: ReleaseConfig, cwd: string): VersionManager {
  switch (config.manager) {
    case "uv":
      return new UvVersionManager({
        cwd,
        uvBin: config.uv_bin,
        manifest: config.manifest,
        lockFile: config.lock_file,
      });
    case "npm":
      return new NpmVersionManager({ cwd, manifest: config.manifest, lockFile: config.lock_file });
  }
}
