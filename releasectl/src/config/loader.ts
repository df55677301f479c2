import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { CONFIG_KEYS, type ReleaseConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

export const PROJECT_CONFIG_FILE = ".releasectl.yaml";

export type LoadConfigOpts = {
  cwd: string;
  /** Explicit config file; must exist when given. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory holding base.yaml. */
  configDir?: string;
};

export type LoadConfigResult =
  | { ok: true; config: ReleaseConfig; sources: string[] }
  | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`${filePath}: expected a mapping at the top level`);
  }
  return parsed;
}

/**
 * Apply RELEASECTL_ prefixed environment overrides for known keys.
 * UV_BIN also sets uv_bin; RELEASECTL_UV_BIN takes precedence.
 */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  if (env.UV_BIN) out.uv_bin = env.UV_BIN;
  for (const key of CONFIG_KEYS) {
    // RELEASECTL_LOCK_FILE → lock_file
    const value = env[`RELEASECTL_${key.toUpperCase()}`];
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

/**
 * Load layered config: base.yaml ← project file ← environment variables.
 */
export function loadConfig(opts: LoadConfigOpts): LoadConfigResult {
  const dir = opts.configDir ?? CONFIG_DIR;
  const sources: string[] = [];

  try {
    const basePath = path.join(dir, "base.yaml");
    const base = loadYaml(basePath);
    if (fs.existsSync(basePath)) sources.push(basePath);

    let projectPath = path.join(opts.cwd, PROJECT_CONFIG_FILE);
    if (opts.configFile) {
      projectPath = path.resolve(opts.cwd, opts.configFile);
      if (!fs.existsSync(projectPath)) {
        return { ok: false, error: `Config file not found: ${projectPath}` };
      }
    }
    const project = loadYaml(projectPath);
    if (fs.existsSync(projectPath)) sources.push(projectPath);

    const merged = { ...base, ...project, ...envOverrides(opts.env ?? process.env) };

    const res = validateConfig(merged);
    if (!res.valid) {
      return { ok: false, error: `Invalid configuration: ${res.errors}` };
    }
    return { ok: true, config: res.config, sources };
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}
