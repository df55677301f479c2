import fs from "node:fs";
import path from "node:path";
import semver, { type ReleaseType } from "semver";
import type { PreflightFailure, ToolResult, VersionManager } from "./manager.js";

const RELEASE_TYPES: Record<string, ReleaseType> = {
  major: "major",
  minor: "minor",
  patch: "patch",
  premajor: "premajor",
  preminor: "preminor",
  prepatch: "prepatch",
  prerelease: "prerelease",
};

const CHANNELS = new Set(["alpha", "beta", "rc"]);

export const NPM_BUMP_KEYWORDS = [...Object.keys(RELEASE_TYPES), ...CHANNELS, "stable"];

type JsonDocument = { data: Record<string, unknown>; indent: string; newline: boolean };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readJson(filePath: string): JsonDocument {
  const raw = fs.readFileSync(filePath, "utf8");
  const data: unknown = JSON.parse(raw);
  if (!isRecord(data)) throw new Error(`${filePath}: expected a JSON object`);
  const indent = /^\{\r?\n([ \t]+)"/.exec(raw)?.[1] ?? "  ";
  return { data, indent, newline: raw.endsWith("\n") };
}

function writeJson(filePath: string, doc: JsonDocument): void {
  const body = JSON.stringify(doc.data, null, doc.indent);
  fs.writeFileSync(filePath, doc.newline ? body + "\n" : body, "utf8");
}

/** Next version for a keyword; null when the keyword does not apply. */
export function incrementVersion(current: string, keyword: string): string | null {
  const type = RELEASE_TYPES[keyword];
  if (type) return semver.inc(current, type);

  // alpha/beta/rc: move onto (or along) that pre-release channel
  if (CHANNELS.has(keyword)) return semver.inc(current, "prerelease", keyword);

  if (keyword === "stable") {
    const parsed = semver.parse(current);
    if (!parsed || parsed.prerelease.length === 0) return null;
    return `${parsed.major}.${parsed.minor}.${parsed.patch}`;
  }

  return null;
}

export type NpmVersionManagerOpts = {
  cwd: string;
  manifest?: string;
  lockFile?: string;
};

/**
 * Keeps the version in package.json, mirroring it into the top-level fields
 * of package-lock.json when that file exists.
 */
export class NpmVersionManager implements VersionManager {
  readonly kind = "npm" as const;
  readonly manifest: string;
  readonly lockFile: string;
  private readonly cwd: string;

  constructor(opts: NpmVersionManagerOpts) {
    this.cwd = opts.cwd;
    this.manifest = opts.manifest ?? "package.json";
    this.lockFile = opts.lockFile ?? "package-lock.json";
  }

  private get manifestPath(): string {
    return path.join(this.cwd, this.manifest);
  }

  private get lockPath(): string {
    return path.join(this.cwd, this.lockFile);
  }

  async preflight(): Promise<PreflightFailure | null> {
    if (!fs.existsSync(this.manifestPath)) {
      return { code: "MANIFEST_NOT_FOUND", message: `${this.manifest} not found in ${this.cwd}` };
    }
    return null;
  }

  async current(): Promise<string | null> {
    if (!fs.existsSync(this.manifestPath)) return null;
    let data: Record<string, unknown>;
    try {
      ({ data } = readJson(this.manifestPath));
    } catch {
      // unparsable manifest: no version to read
      return null;
    }
    return typeof data.version === "string" && data.version !== "" ? data.version : null;
  }

  async computeBump(keyword: string): Promise<ToolResult<string>> {
    const current = await this.current();
    if (!current) return { ok: false, message: `${this.manifest} has no version field` };
    if (!semver.valid(current)) {
      return { ok: false, message: `current version '${current}' is not a valid semantic version` };
    }
    const next = incrementVersion(current, keyword);
    if (!next) {
      return {
        ok: false,
        message: `cannot apply bump '${keyword}' to ${current} (known: ${NPM_BUMP_KEYWORDS.join(", ")})`,
      };
    }
    return { ok: true, value: next };
  }

  async validate(version: string): Promise<ToolResult> {
    if (semver.valid(version) !== version) {
      return { ok: false, message: `'${version}' is not a valid semantic version` };
    }
    return { ok: true, value: undefined };
  }

  async bump(keyword: string): Promise<ToolResult> {
    const next = await this.computeBump(keyword);
    if (!next.ok) return next;
    return this.set(next.value);
  }

  async set(version: string): Promise<ToolResult> {
    const valid = await this.validate(version);
    if (!valid.ok) return valid;

    try {
      const manifest = readJson(this.manifestPath);
      manifest.data.version = version;
      writeJson(this.manifestPath, manifest);

      if (fs.existsSync(this.lockPath)) {
        const lock = readJson(this.lockPath);
        lock.data.version = version;
        const root = isRecord(lock.data.packages) ? lock.data.packages[""] : undefined;
        if (isRecord(root)) root.version = version;
        writeJson(this.lockPath, lock);
      }
    } catch (e: unknown) {
      return { ok: false, message: e instanceof Error ? e.message : String(e) };
    }
    return { ok: true, value: undefined };
  }
}
