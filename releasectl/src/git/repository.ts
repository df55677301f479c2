import { simpleGit } from "simple-git";

/** One `git status --porcelain` entry. */
export type StatusEntry = {
  /** Two-column XY status code, e.g. " M", "M ", "??". */
  code: string;
  path: string;
  /** The line exactly as git printed it. */
  line: string;
};

/**
 * Version-control capability the release phases drive.
 *
 * Every ref argument is fully qualified (`refs/heads/…`, `refs/tags/…`,
 * `refs/remotes/…`) so a tag and a branch sharing a name never resolve to
 * the wrong object.
 */
export interface ReleaseRepository {
  defaultBranch(remote: string): Promise<string | null>;
  refExists(ref: string): Promise<boolean>;
  remoteTagExists(remote: string, tag: string): Promise<boolean>;
  status(): Promise<StatusEntry[]>;
  fetch(remote: string): Promise<void>;
  switchBranch(branch: string): Promise<void>;
  pull(remote: string, branch: string): Promise<void>;
  add(paths: string[]): Promise<void>;
  commit(message: string): Promise<void>;
  createAnnotatedTag(tag: string, message: string): Promise<void>;
  currentBranch(): Promise<string | null>;
  /** Commits on the local branch that the remote branch lacks; null when they cannot be compared. */
  unpushedCommits(remote: string, branch: string): Promise<string[] | null>;
  push(remote: string, ref: string): Promise<void>;
  remoteUrl(remote: string): Promise<string | null>;
}

/** Runs git with the given arguments and resolves with its stdout. */
export type GitCommand = (args: string[]) => Promise<string>;

export function headsRef(branch: string): string {
  return `refs/heads/${branch}`;
}

export function tagsRef(tag: string): string {
  return `refs/tags/${tag}`;
}

export function remoteRef(remote: string, branch: string): string {
  return `refs/remotes/${remote}/${branch}`;
}

/** Parse `git status --porcelain` (v1) output. */
export function parsePorcelain(output: string): StatusEntry[] {
  const entries: StatusEntry[] = [];
  for (const raw of output.split("\n")) {
    const line = raw.replace(/\r$/, "");
    if (line.trim().length === 0) continue;
    const code = line.slice(0, 2);
    let file = line.slice(3);
    // Renames print "old -> new"; the new path is the one in the tree.
    const arrow = file.indexOf(" -> ");
    if (arrow !== -1) file = file.slice(arrow + 4);
    entries.push({ code, path: file, line });
  }
  return entries;
}

/** Extract the `HEAD branch:` value from `git remote show <remote>`. */
export function parseHeadBranch(output: string): string | null {
  const m = /^\s*HEAD branch:\s*(\S+)\s*$/m.exec(output);
  if (!m || m[1] === "(unknown)") return null;
  return m[1];
}

function lines(output: string): string[] {
  return output
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

/**
 * ReleaseRepository backed by the git CLI through simple-git.
 * The command runner is injectable so tests can assert exact arguments.
 */
export class GitRepository implements ReleaseRepository {
  private readonly run: GitCommand;

  constructor(repoPath: string, run?: GitCommand) {
    if (run) {
      this.run = run;
    } else {
      const git = simpleGit(repoPath);
      this.run = (args) => git.raw(args);
    }
  }

  async defaultBranch(remote: string): Promise<string | null> {
    const out = await this.run(["remote", "show", remote]);
    return parseHeadBranch(out);
  }

  async refExists(ref: string): Promise<boolean> {
    try {
      // a missing ref exits 1 without writing stderr, which simple-git resolves with ""
      return (await this.run(["rev-parse", "--verify", "--quiet", ref])).trim() !== "";
    } catch {
      // git failing outright (e.g. not a repository) also means the ref does not resolve
      return false;
    }
  }

  async remoteTagExists(remote: string, tag: string): Promise<boolean> {
    const out = await this.run(["ls-remote", "--tags", remote, tagsRef(tag)]);
    return lines(out).length > 0;
  }

  async status(): Promise<StatusEntry[]> {
    return parsePorcelain(await this.run(["status", "--porcelain"]));
  }

  async fetch(remote: string): Promise<void> {
    await this.run(["fetch", remote]);
  }

  async switchBranch(branch: string): Promise<void> {
    // switch only ever takes a branch name, so a same-named tag cannot win
    await this.run(["switch", branch]);
  }

  async pull(remote: string, branch: string): Promise<void> {
    await this.run(["pull", remote, headsRef(branch)]);
  }

  async add(paths: string[]): Promise<void> {
    await this.run(["add", "--", ...paths]);
  }

  async commit(message: string): Promise<void> {
    await this.run(["commit", "-m", message]);
  }

  async createAnnotatedTag(tag: string, message: string): Promise<void> {
    await this.run(["tag", "-a", tag, "-m", message]);
  }

  async currentBranch(): Promise<string | null> {
    let name: string;
    try {
      name = (await this.run(["rev-parse", "--abbrev-ref", "HEAD"])).trim();
    } catch {
      // unborn HEAD
      return null;
    }
    if (name === "" || name === "HEAD") return null;
    return name;
  }

  async unpushedCommits(remote: string, branch: string): Promise<string[] | null> {
    const range = `${remoteRef(remote, branch)}..${headsRef(branch)}`;
    try {
      return lines(await this.run(["log", "--oneline", range]));
    } catch {
      // no remote-tracking ref for this branch yet
      return null;
    }
  }

  async push(remote: string, ref: string): Promise<void> {
    await this.run(["push", remote, ref]);
  }

  async remoteUrl(remote: string): Promise<string | null> {
    const url = (await this.run(["remote", "get-url", remote])).trim();
    return url === "" ? null : url;
  }
}
