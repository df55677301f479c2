import { GitRepository } from "../../src/git/repository.js";
import type { PreflightFailure, ToolResult, VersionManager } from "../../src/version/manager.js";
import { incrementVersion } from "../../src/version/npm.js";
import { ReleaseCoordinator } from "../../src/core/coordinator.js";
import { AutoConfirmation, type ConfirmationProvider } from "../../src/prompt/confirm.js";
import { Reporter } from "../../src/report/reporter.js";
import type { ReleaseSettings } from "../../src/types/release.js";

export class GitFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GitFailure";
  }
}

/**
 * In-memory git: interprets the argument vectors GitRepository sends and
 * records every one of them.
 */
export class FakeGit {
  readonly calls: string[][] = [];
  defaultBranch: string | null = "main";
  url = "git@github.com:acme/widgets.git";
  head: string | null = "main";
  readonly refs = new Set<string>(["refs/heads/main", "refs/remotes/origin/main"]);
  readonly remoteTags = new Set<string>();
  /** Paths with uncommitted modifications (" M"). */
  readonly modified = new Set<string>();
  /** Extra porcelain lines, e.g. "?? notes.txt". */
  readonly foreign: string[] = [];
  readonly staged = new Set<string>();
  /** Local commits not yet on the remote branch. */
  unpushed: string[] = [];
  readonly tagMessages = new Map<string, string>();
  /** Commands (first argument) that fail. */
  readonly failing = new Set<string>();

  readonly run = async (args: string[]): Promise<string> => {
    this.calls.push([...args]);
    const [cmd, ...rest] = args;
    if (this.failing.has(cmd)) throw new GitFailure(`fatal: ${cmd} failed`);

    switch (cmd) {
      case "remote":
        if (rest[0] === "show") {
          return `* remote ${rest[1]}\n  Fetch URL: ${this.url}\n  HEAD branch: ${this.defaultBranch ?? "(unknown)"}\n`;
        }
        return `${this.url}\n`;
      case "rev-parse":
        if (rest[0] === "--abbrev-ref") return `${this.head ?? "HEAD"}\n`;
        // like simple-git: a silent non-zero exit resolves with empty output
        return this.refs.has(rest[2]) ? "0123456789abcdef\n" : "";
      case "ls-remote": {
        const tag = rest[2].replace(/^refs\/tags\//, "");
        return this.remoteTags.has(tag) ? `0123456789abcdef\t${rest[2]}\n` : "";
      }
      case "status":
        return [...[...this.modified].map((p) => ` M ${p}`), ...this.foreign].map((l) => l + "\n").join("");
      case "fetch":
      case "pull":
        return "";
      case "switch":
        if (!this.refs.has(`refs/heads/${rest[0]}`) && !this.refs.has(`refs/remotes/origin/${rest[0]}`)) {
          throw new GitFailure(`fatal: invalid reference: ${rest[0]}`);
        }
        this.refs.add(`refs/heads/${rest[0]}`);
        this.head = rest[0];
        return "";
      case "add":
        for (const p of rest.filter((a) => a !== "--")) this.staged.add(p);
        return "";
      case "commit":
        if (this.staged.size === 0) throw new GitFailure("nothing to commit");
        for (const p of this.staged) this.modified.delete(p);
        this.staged.clear();
        this.unpushed.push(`abc1234 ${rest[1]}`);
        return "";
      case "tag":
        this.refs.add(`refs/tags/${rest[1]}`);
        this.tagMessages.set(rest[1], rest[3]);
        return "";
      case "log":
        if (!this.refs.has(rest[1].split("..")[0])) throw new GitFailure("fatal: bad revision");
        return this.unpushed.map((l) => l + "\n").join("");
      case "push": {
        const ref = rest[1];
        if (ref.startsWith("refs/tags/")) {
          if (!this.refs.has(ref)) throw new GitFailure(`error: src refspec ${ref} does not match any`);
          this.remoteTags.add(ref.slice("refs/tags/".length));
        } else {
          this.unpushed = [];
        }
        return "";
      }
      default:
        throw new GitFailure(`unexpected git ${args.join(" ")}`);
    }
  };

  /** Calls whose first argument is `cmd`. */
  callsTo(cmd: string): string[][] {
    return this.calls.filter((c) => c[0] === cmd);
  }
}

/**
 * In-memory version manager over a single version string. Writes mark the
 * manifest (and, with `touchesLock`, the lock file) as modified in FakeGit.
 */
export class FakeVersions implements VersionManager {
  readonly kind = "uv" as const;
  readonly manifest = "pyproject.toml";
  readonly lockFile = "uv.lock";
  touchesLock = false;
  /** Value written instead of the requested one. */
  corruptWrite: string | null = null;
  readonly writes: string[] = [];

  constructor(
    private readonly git: FakeGit,
    public version: string | null = "1.4.0",
  ) {}

  async preflight(): Promise<PreflightFailure | null> {
    return null;
  }

  async current(): Promise<string | null> {
    return this.version;
  }

  async computeBump(keyword: string): Promise<ToolResult<string>> {
    const next = this.version ? incrementVersion(this.version, keyword) : null;
    return next ? { ok: true, value: next } : { ok: false, message: `error: invalid bump '${keyword}'` };
  }

  async validate(version: string): Promise<ToolResult> {
    return /^\d+\.\d+\.\d+(?:[-.]?[0-9A-Za-z.]+)?$/.test(version)
      ? { ok: true, value: undefined }
      : { ok: false, message: `error: invalid version '${version}'` };
  }

  async bump(keyword: string): Promise<ToolResult> {
    const next = await this.computeBump(keyword);
    if (!next.ok) return next;
    return this.set(next.value);
  }

  async set(version: string): Promise<ToolResult> {
    this.writes.push(version);
    this.version = this.corruptWrite ?? version;
    this.git.modified.add(this.manifest);
    if (this.touchesLock) this.git.modified.add(this.lockFile);
    return { ok: true, value: undefined };
  }
}

/** Confirmation provider that answers from a queue and records questions. */
export class ScriptedConfirmation implements ConfirmationProvider {
  readonly unattended = false;
  readonly questions: string[] = [];

  constructor(private readonly answers: boolean[]) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answers.shift() ?? false;
  }
}

/** Collects written chunks. */
export class MemorySink {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }

  get lines(): string[] {
    return this.text.split("\n").filter((l) => l.length > 0);
  }
}

export type Harness = {
  git: FakeGit;
  versions: FakeVersions;
  out: MemorySink;
  err: MemorySink;
  reporter: Reporter;
  coordinator: ReleaseCoordinator;
};

export type HarnessOpts = {
  confirm?: ConfirmationProvider;
  version?: string | null;
  versions?: (git: FakeGit) => FakeVersions;
  settings?: ReleaseSettings;
};

export function makeHarness(opts: HarnessOpts = {}): Harness {
  const git = new FakeGit();
  const versions = opts.versions
    ? opts.versions(git)
    : new FakeVersions(git, opts.version === undefined ? "1.4.0" : opts.version);
  const out = new MemorySink();
  const err = new MemorySink();
  const reporter = new Reporter({ format: "human", color: false, out, err });
  const coordinator = new ReleaseCoordinator({
    repo: new GitRepository("/repo", git.run),
    versions,
    confirm: opts.confirm ?? new AutoConfirmation(true),
    reporter,
    settings: opts.settings ?? { remote: "origin" },
  });
  return { git, versions, out, err, reporter, coordinator };
}
