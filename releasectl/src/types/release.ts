export type ReleasePhase = "bump" | "commit" | "push";

export type ReleaseStage = "idle" | "bumped" | "committed" | "pushed";

export type ReleaseErrorCode =
  | "INVALID_ARGUMENTS"
  | "INVALID_VERSION"
  | "BUMP_COMPUTATION_FAILED"
  | "DUPLICATE_TAG"
  | "DIRTY_WORKING_TREE"
  | "NOTHING_TO_COMMIT"
  | "BRANCH_NOT_FOUND"
  | "NO_DEFAULT_BRANCH"
  | "DETACHED_OR_UNKNOWN_BRANCH"
  | "VERSION_WRITE_FAILED"
  | "VERSION_WRITE_MISMATCH"
  | "VERSION_UNREADABLE"
  | "TAG_NOT_FOUND_LOCALLY"
  | "ABORTED_BY_USER"
  | "MANIFEST_NOT_FOUND"
  | "TOOL_NOT_FOUND"
  | "GIT_COMMAND_FAILED"
  | "CONFIG_INVALID";

export type ReleaseError = {
  code: ReleaseErrorCode;
  phase: ReleasePhase | "setup" | "status";
  message: string;
  /** Next thing the operator should do. */
  hint?: string;
  /** Raw lines worth showing verbatim (porcelain status, tool output). */
  details?: string[];
};

export type PhaseResult<T> = { ok: true; value: T } | { ok: false; error: ReleaseError };

export type BumpRequest = {
  version?: string;
  bump?: string;
  branch?: string;
};

export type ReleaseSettings = {
  remote: string;
  /** Overrides scheme and host of the monitoring link printed after push. */
  forgeUrl?: string;
};

export function ok<T>(value: T): PhaseResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  phase: ReleaseError["phase"],
  code: ReleaseErrorCode,
  message: string,
  extra?: Pick<ReleaseError, "hint" | "details">,
): PhaseResult<T> {
  return { ok: false, error: { code, phase, message, ...extra } };
}

export function tagFor(version: string): string {
  return `v${version}`;
}
