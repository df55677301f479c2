import type { ReleaseRepository, StatusEntry } from "../git/repository.js";
import { headsRef, remoteRef, tagsRef } from "../git/repository.js";
import { actionsUrl } from "../git/forge.js";
import type { VersionManager } from "../version/manager.js";
import { checkBumpOrder } from "../version/ordering.js";
import type { ConfirmationProvider } from "../prompt/confirm.js";
import type { Reporter } from "../report/reporter.js";
import {
  fail,
  ok,
  tagFor,
  type BumpRequest,
  type PhaseResult,
  type ReleaseError,
  type ReleasePhase,
  type ReleaseSettings,
  type ReleaseStage,
} from "../types/release.js";
import { PHASES, detectStage, nextStage, pendingPhase } from "./stages.js";

export type CoordinatorDeps = {
  repo: ReleaseRepository;
  versions: VersionManager;
  confirm: ConfirmationProvider;
  reporter: Reporter;
  settings: ReleaseSettings;
};

export type PushOutcome = {
  tag: string;
  branch: string;
  monitorUrl: string | null;
};

export type ChainOutcome = {
  version: string;
  tag: string;
  stage: ReleaseStage;
  monitorUrl: string | null;
};

export type ReleaseStatus = {
  version: string | null;
  tag: string | null;
  branch: string | null;
  manifestModified: boolean;
  lockModified: boolean;
  tagLocal: boolean;
  tagRemote: boolean;
  stage: ReleaseStage;
  nextPhase: ReleasePhase | null;
};

const STEP_TITLES: Record<ReleasePhase, string> = {
  bump: "Bump Version",
  commit: "Commit and Tag",
  push: "Push to Remote",
};

type BumpTarget = { kind: "version"; version: string } | { kind: "keyword"; keyword: string };

/** Exactly one of an explicit version (leading `v` dropped) or a bump keyword. */
export function parseBumpRequest(req: BumpRequest): PhaseResult<BumpTarget> {
  const explicit = req.version?.trim().replace(/^v/, "");
  const keyword = req.bump?.trim();

  if (explicit !== undefined && keyword !== undefined) {
    return fail("bump", "INVALID_ARGUMENTS", "Cannot specify both --version and --bump");
  }
  if (explicit !== undefined) {
    return explicit === ""
      ? fail("bump", "INVALID_ARGUMENTS", "--version requires a value")
      : ok<BumpTarget>({ kind: "version", version: explicit });
  }
  if (keyword !== undefined) {
    return keyword === ""
      ? fail("bump", "INVALID_ARGUMENTS", "--bump requires a value")
      : ok<BumpTarget>({ kind: "keyword", keyword });
  }
  return fail("bump", "INVALID_ARGUMENTS", "No version or bump type specified", {
    hint: "Use --bump TYPE or --version VER",
  });
}

function isModified(entries: StatusEntry[], file: string): boolean {
  return entries.some((e) => e.path === file && e.code.includes("M"));
}

/**
 * Drives a working tree through bump, commit and push.
 *
 * Holds no release state of its own. Every phase reads the repository and the
 * version manager, checks its guards and only then mutates anything; a failed
 * guard leaves the tree as it was. Nothing is rolled back after a later phase
 * fails.
 */
export class ReleaseCoordinator {
  private readonly repo: ReleaseRepository;
  private readonly versions: VersionManager;
  private readonly confirm: ConfirmationProvider;
  private readonly reporter: Reporter;
  private readonly settings: ReleaseSettings;

  constructor(deps: CoordinatorDeps) {
    this.repo = deps.repo;
    this.versions = deps.versions;
    this.confirm = deps.confirm;
    this.reporter = deps.reporter;
    this.settings = deps.settings;
  }

  /** Manifest present and version tool usable. */
  async preflight(): Promise<PhaseResult<void>> {
    const failure = await this.versions.preflight();
    if (failure) {
      return fail("setup", failure.code, failure.message, failure.hint ? { hint: failure.hint } : undefined);
    }
    return ok(undefined);
  }

  /** Compute the next version and write it to the manifest. No commit is made. */
  bump(req: BumpRequest): Promise<PhaseResult<string>> {
    return this.guard("bump", () => this.doBump(req, false));
  }

  /** Commit the manifest change and create the annotated release tag, locally. */
  commit(): Promise<PhaseResult<string>> {
    return this.guard("commit", () => this.doCommit());
  }

  /** Push the current branch and the release tag by explicit ref. */
  push(): Promise<PhaseResult<PushOutcome>> {
    return this.guard("push", () => this.doPush());
  }

  /**
   * Bump, commit and push in sequence, stopping at the first failure. In
   * interactive mode the operator confirms before each following phase; a
   * decline ends the run without undoing earlier phases. A non-default branch
   * is only warned about here, not confirmed.
   */
  async all(req: BumpRequest): Promise<PhaseResult<ChainOutcome>> {
    if (!this.confirm.unattended) {
      this.reporter.info("Running in ALL mode - will prompt between steps");
    }

    let stage: ReleaseStage = "idle";
    let version = "";
    let tag = "";
    let monitorUrl: string | null = null;

    for (const [i, phase] of PHASES.entries()) {
      if (i > 0 && !(await this.confirm.confirm("Continue to next step?"))) {
        this.reporter.info("Aborted by user");
        return fail(phase, "ABORTED_BY_USER", `Stopped before ${phase}; completed phases are kept`);
      }

      this.reporter.step(`STEP ${i + 1}: ${STEP_TITLES[phase]}`);

      switch (phase) {
        case "bump": {
          const res = await this.guard("bump", () => this.doBump(req, true));
          if (!res.ok) return res;
          version = res.value;
          tag = tagFor(version);
          break;
        }
        case "commit": {
          const res = await this.commit();
          if (!res.ok) return res;
          tag = res.value;
          break;
        }
        case "push": {
          const res = await this.push();
          if (!res.ok) return res;
          monitorUrl = res.value.monitorUrl;
          break;
        }
      }

      stage = nextStage(stage, phase) ?? stage;
    }

    this.reporter.success("All release steps completed!");
    return ok({ version, tag, stage, monitorUrl });
  }

  /** Where the release for the manifest's current version stands. */
  status(): Promise<PhaseResult<ReleaseStatus>> {
    return this.guard("status", async () => {
      const { remote } = this.settings;
      const version = await this.versions.current();
      const tag = version ? tagFor(version) : null;
      const entries = await this.repo.status();
      const manifestModified = isModified(entries, this.versions.manifest);
      const lockModified = isModified(entries, this.versions.lockFile);
      const tagLocal = tag ? await this.repo.refExists(tagsRef(tag)) : false;
      const tagRemote = tag ? await this.repo.remoteTagExists(remote, tag) : false;
      const branch = await this.repo.currentBranch();
      const stage = detectStage({ manifestModified: manifestModified || lockModified, tagLocal, tagRemote });

      return ok({
        version,
        tag,
        branch,
        manifestModified,
        lockModified,
        tagLocal,
        tagRemote,
        stage,
        nextPhase: pendingPhase(stage),
      });
    });
  }

  private async doBump(req: BumpRequest, chained: boolean): Promise<PhaseResult<string>> {
    const { remote } = this.settings;
    const parsed = parseBumpRequest(req);
    if (!parsed.ok) return parsed;
    const target = parsed.value;

    const defaultBranch = await this.repo.defaultBranch(remote);
    if (!defaultBranch) {
      return fail("bump", "NO_DEFAULT_BRANCH", `Could not determine default branch from remote '${remote}'`);
    }

    const branch = req.branch ?? defaultBranch;
    if (req.branch === undefined) {
      this.reporter.info(`Using default branch: ${branch}`);
    } else {
      this.reporter.info(`Using specified branch: ${branch}`);
      if (branch !== defaultBranch) {
        this.reporter.warn(`Target branch '${branch}' differs from default branch '${defaultBranch}'`);
        this.reporter.warn("Releases are typically created from the default branch.");
        if (!chained && !(await this.confirm.confirm(`Continue with branch '${branch}'?`))) {
          this.reporter.info("Aborted by user");
          return fail("bump", "ABORTED_BY_USER", `Release from '${branch}' declined`);
        }
      }
    }

    if (!(await this.repo.refExists(remoteRef(remote, branch)))) {
      return fail("bump", "BRANCH_NOT_FOUND", `Branch '${remote}/${branch}' does not exist`);
    }

    if (await this.repo.refExists(tagsRef(branch))) {
      this.reporter.warn(`A tag named '${branch}' exists, which conflicts with the branch name.`);
      this.reporter.warn(`Using fully qualified refs (${headsRef(branch)}, ${tagsRef(branch)}) for every git call.`);
    }

    const current = await this.versions.current();
    this.reporter.info(`Current version: ${current ?? "unknown"}`);

    let next: string;
    if (target.kind === "keyword") {
      this.reporter.info(`Bumping version using: ${target.keyword}`);
      const computed = await this.versions.computeBump(target.keyword);
      if (!computed.ok) {
        return fail(
          "bump",
          "BUMP_COMPUTATION_FAILED",
          `Failed to calculate new version with bump type: ${target.keyword}`,
          { details: [computed.message] },
        );
      }
      next = computed.value;
      if (current) {
        const order = checkBumpOrder(target.keyword, current, next);
        if (order.comparable && !order.ok) {
          return fail("bump", "BUMP_COMPUTATION_FAILED", order.message);
        }
      }
    } else {
      const valid = await this.versions.validate(target.version);
      if (!valid.ok) {
        return fail("bump", "INVALID_VERSION", `Invalid version format: ${target.version}`, {
          hint: `${this.versions.kind} rejected this version. Please use a valid semantic version.`,
          details: [valid.message],
        });
      }
      next = target.version;
    }
    this.reporter.info(`New version will be: ${next}`);

    const tag = tagFor(next);
    const duplicate = await this.checkTagFree("bump", tag);
    if (duplicate) return { ok: false, error: duplicate };

    const dirty = this.foreignChanges(await this.repo.status());
    if (dirty.length > 0) {
      return fail("bump", "DIRTY_WORKING_TREE", "You have uncommitted changes:", {
        details: dirty.map((e) => e.line),
        hint: "Please commit or stash your changes before releasing.",
      });
    }

    this.reporter.info(`Checking out branch ${branch}...`);
    await this.repo.fetch(remote);
    await this.repo.switchBranch(branch);
    await this.repo.pull(remote, branch);

    this.reporter.info(`Updating version in ${this.versions.manifest}...`);
    const written =
      target.kind === "keyword" ? await this.versions.bump(target.keyword) : await this.versions.set(next);
    if (!written.ok) {
      const how = target.kind === "keyword" ? `bump '${target.keyword}'` : `set '${next}'`;
      return fail("bump", "VERSION_WRITE_FAILED", `Failed to update version (${how})`, {
        details: [written.message],
      });
    }

    const updated = await this.versions.current();
    if (updated !== next) {
      return fail(
        "bump",
        "VERSION_WRITE_MISMATCH",
        `Version update failed. Expected ${next} but got ${updated ?? "nothing"}`,
      );
    }

    this.reporter.success(`Version bumped to ${next} in ${this.versions.manifest}`);
    this.reporter.info("Next step: run 'releasectl commit' to commit changes and create tag");
    return ok(next);
  }

  private async doCommit(): Promise<PhaseResult<string>> {
    const { manifest, lockFile } = this.versions;
    const entries = await this.repo.status();
    const manifestModified = isModified(entries, manifest);
    const lockModified = isModified(entries, lockFile);

    if (!manifestModified && !lockModified) {
      return fail("commit", "NOTHING_TO_COMMIT", `No uncommitted changes found in ${manifest} or ${lockFile}`, {
        hint: "Run the bump phase first: releasectl --bump <type>",
      });
    }

    const version = await this.versions.current();
    if (!version) {
      return fail("commit", "VERSION_UNREADABLE", `Could not determine version from ${manifest}`);
    }

    const tag = tagFor(version);
    const duplicate = await this.checkTagFree("commit", tag);
    if (duplicate) return { ok: false, error: duplicate };

    const dirty = this.foreignChanges(entries);
    if (dirty.length > 0) {
      return fail("commit", "DIRTY_WORKING_TREE", `You have uncommitted changes beyond ${manifest} and ${lockFile}:`, {
        details: dirty.map((e) => e.line),
        hint: "Please commit or stash your changes before committing the release.",
      });
    }

    this.reporter.info(`Committing version change to ${version}...`);
    const paths = manifestModified ? [manifest] : [];
    if (lockModified) paths.push(lockFile);
    await this.repo.add(paths);
    await this.repo.commit(`chore: bump version to ${version}`);

    this.reporter.info(`Creating tag ${tag}...`);
    await this.repo.createAnnotatedTag(tag, `Release ${tag}`);

    this.reporter.success(`Version committed and tag ${tag} created locally`);
    this.reporter.info("Next step: run 'releasectl push' to push to remote");
    return ok(tag);
  }

  private async doPush(): Promise<PhaseResult<PushOutcome>> {
    const { remote } = this.settings;
    const version = await this.versions.current();
    if (!version) {
      return fail("push", "VERSION_UNREADABLE", `Could not determine version from ${this.versions.manifest}`);
    }

    const tag = tagFor(version);
    if (!(await this.repo.refExists(tagsRef(tag)))) {
      return fail("push", "TAG_NOT_FOUND_LOCALLY", `Tag '${tag}' does not exist locally`, {
        hint: "Run the commit phase first: releasectl commit",
      });
    }

    if (await this.repo.remoteTagExists(remote, tag)) {
      return fail("push", "DUPLICATE_TAG", `Tag '${tag}' already exists on remote '${remote}'`);
    }

    const branch = await this.repo.currentBranch();
    if (!branch) {
      return fail("push", "DETACHED_OR_UNKNOWN_BRANCH", "Could not determine current branch");
    }

    const unpushed = await this.repo.unpushedCommits(remote, branch);
    if (unpushed === null) {
      this.reporter.warn(`Could not compare ${branch} with ${remote}/${branch}`);
    } else if (unpushed.length === 0) {
      this.reporter.warn(`No unpushed commits found on branch ${branch}`);
      this.reporter.warn("Make sure you've run 'releasectl commit' first");
    }

    this.reporter.info(`Pushing commit to ${branch}...`);
    await this.repo.push(remote, headsRef(branch));

    this.reporter.info(`Pushing tag ${tag} to ${remote}...`);
    await this.repo.push(remote, tagsRef(tag));

    this.reporter.success(`Release tag ${tag} pushed to remote!`);
    this.reporter.info("The release workflow will now be triggered automatically.");

    const url = await this.repo.remoteUrl(remote);
    const monitorUrl = url ? actionsUrl(url, this.settings.forgeUrl) : null;
    if (monitorUrl) {
      this.reporter.info(`Monitor progress at: ${monitorUrl}`);
    } else {
      this.reporter.warn(`Could not derive a monitoring URL from remote '${remote}'`);
    }

    return ok({ tag, branch, monitorUrl });
  }

  /** A DUPLICATE_TAG error when the tag exists locally or on the remote. */
  private async checkTagFree(phase: ReleasePhase, tag: string): Promise<ReleaseError | null> {
    if (await this.repo.refExists(tagsRef(tag))) {
      return { code: "DUPLICATE_TAG", phase, message: `Tag '${tag}' already exists locally` };
    }
    const { remote } = this.settings;
    if (await this.repo.remoteTagExists(remote, tag)) {
      return { code: "DUPLICATE_TAG", phase, message: `Tag '${tag}' already exists on remote '${remote}'` };
    }
    return null;
  }

  /** Status entries other than modifications of the manifest and lock file. */
  private foreignChanges(entries: StatusEntry[]): StatusEntry[] {
    const own = new Set([this.versions.manifest, this.versions.lockFile]);
    return entries.filter((e) => !(own.has(e.path) && /^[ M]{2}$/.test(e.code)));
  }

  /** Convert a failed git or tool invocation into a phase error. */
  private async guard<T>(
    phase: ReleaseError["phase"],
    fn: () => Promise<PhaseResult<T>>,
  ): Promise<PhaseResult<T>> {
    try {
      return await fn();
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message.trim() : String(e);
      return fail(phase, "GIT_COMMAND_FAILED", message);
    }
  }
}
