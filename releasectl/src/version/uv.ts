import fs from "node:fs";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { PreflightFailure, ToolResult, VersionManager } from "./manager.js";

const pExecFile = promisify(execFile);

export type CommandRunner = (
  file: string,
  args: string[],
  opts: { cwd: string },
) => Promise<{ stdout: string; stderr: string }>;

const defaultRunner: CommandRunner = async (file, args, opts) => {
  const { stdout, stderr } = await pExecFile(file, args, { cwd: opts.cwd, timeout: 120000 });
  return { stdout, stderr };
};

/** Best message carried by a failed execFile call. */
export function commandErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    const stderr = "stderr" in e && typeof e.stderr === "string" ? e.stderr.trim() : "";
    return stderr !== "" ? stderr : e.message;
  }
  return String(e);
}

export type UvVersionManagerOpts = {
  cwd: string;
  uvBin: string;
  manifest?: string;
  lockFile?: string;
  run?: CommandRunner;
};

/** Drives `uv version` against pyproject.toml. */
export class UvVersionManager implements VersionManager {
  readonly kind = "uv" as const;
  readonly manifest: string;
  readonly lockFile: string;
  private readonly cwd: string;
  private readonly bin: string;
  private readonly run: CommandRunner;

  constructor(opts: UvVersionManagerOpts) {
    this.cwd = opts.cwd;
    // A bare name is looked up on PATH; anything with a slash is a path in the repo.
    this.bin = opts.uvBin.includes("/") ? path.resolve(opts.cwd, opts.uvBin) : opts.uvBin;
    this.manifest = opts.manifest ?? "pyproject.toml";
    this.lockFile = opts.lockFile ?? "uv.lock";
    this.run = opts.run ?? defaultRunner;
  }

  async preflight(): Promise<PreflightFailure | null> {
    if (!fs.existsSync(path.join(this.cwd, this.manifest))) {
      return { code: "MANIFEST_NOT_FOUND", message: `${this.manifest} not found in ${this.cwd}` };
    }
    if (this.bin.includes("/")) {
      try {
        fs.accessSync(this.bin, fs.constants.X_OK);
      } catch {
        return {
          code: "TOOL_NOT_FOUND",
          message: `uv not found at ${this.bin}`,
          hint: "Install uv first (make install-uv) or point uv_bin at it.",
        };
      }
    }
    return null;
  }

  async current(): Promise<string | null> {
    const res = await this.uv(["version", "--short"]);
    if (!res.ok) return null;
    return res.value === "" ? null : res.value;
  }

  async computeBump(keyword: string): Promise<ToolResult<string>> {
    const res = await this.uv(["version", "--bump", keyword, "--dry-run", "--short"]);
    if (!res.ok) return res;
    if (res.value === "") return { ok: false, message: `uv printed no version for bump '${keyword}'` };
    return res;
  }

  async validate(version: string): Promise<ToolResult> {
    return this.discard(await this.uv(["version", version, "--dry-run"]));
  }

  async bump(keyword: string): Promise<ToolResult> {
    return this.discard(await this.uv(["version", "--bump", keyword]));
  }

  async set(version: string): Promise<ToolResult> {
    return this.discard(await this.uv(["version", version]));
  }

  private discard(res: ToolResult<string>): ToolResult {
    return res.ok ? { ok: true, value: undefined } : res;
  }

  private async uv(args: string[]): Promise<ToolResult<string>> {
    try {
      const { stdout } = await this.run(this.bin, args, { cwd: this.cwd });
      return { ok: true, value: stdout.trim() };
    } catch (e: unknown) {
      return { ok: false, message: commandErrorMessage(e) };
    }
  }
}
