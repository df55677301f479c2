import { parseBumpRequest, type ReleaseCoordinator, type ReleaseStatus } from "../core/coordinator.js";
import type { Reporter } from "../report/reporter.js";
import type { BumpRequest, ReleaseError } from "../types/release.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ReleaseCommand = "bump" | "all" | "commit" | "push" | "status";

export type ReleaseContext = {
  coordinator: ReleaseCoordinator;
  reporter: Reporter;
  /** Usage text shown after an argument error. */
  usage: () => string;
};

/** Print a phase error with its details and hint. */
export function reportFailure(reporter: Reporter, error: ReleaseError, usage?: () => string): ExitCode {
  // declining a prompt is a clean stop, already reported where it happened
  if (error.code === "ABORTED_BY_USER") return EXIT.SUCCESS;

  reporter.error(`${error.phase}: ${error.message}`, error.code);
  for (const line of error.details ?? []) reporter.detail(line, true);
  if (error.hint) reporter.detail(error.hint, true);
  if (error.code === "INVALID_ARGUMENTS" && usage) reporter.detail(usage(), true);
  return EXIT.FAILURE;
}

function printStatus(reporter: Reporter, st: ReleaseStatus): void {
  if (reporter.format === "jsonl") {
    reporter.info(JSON.stringify(st), "STATUS");
    return;
  }
  const yesNo = (b: boolean) => (b ? "yes" : "no");
  reporter.info(`Version: ${st.version ?? "unknown"}`);
  reporter.info(`Branch: ${st.branch ?? "(detached)"}`);
  reporter.info(`Manifest modified: ${yesNo(st.manifestModified)}, lock file modified: ${yesNo(st.lockModified)}`);
  if (st.tag) {
    reporter.info(`Tag ${st.tag}: local ${yesNo(st.tagLocal)}, remote ${yesNo(st.tagRemote)}`);
  }
  reporter.info(`Stage: ${st.stage}${st.nextPhase ? ` (next: ${st.nextPhase})` : ""}`);
}

/**
 * Run one CLI command against a coordinator and map the outcome to an exit
 * code. Argument errors are caught before any repository or manifest access.
 */
export async function runRelease(
  command: ReleaseCommand,
  req: BumpRequest,
  ctx: ReleaseContext,
): Promise<ExitCode> {
  const { coordinator, reporter, usage } = ctx;

  if (command === "bump" || command === "all") {
    const parsed = parseBumpRequest(req);
    if (!parsed.ok) return reportFailure(reporter, parsed.error, usage);
  }

  const pre = await coordinator.preflight();
  if (!pre.ok) return reportFailure(reporter, pre.error, usage);

  switch (command) {
    case "bump": {
      const res = await coordinator.bump(req);
      return res.ok ? EXIT.SUCCESS : reportFailure(reporter, res.error, usage);
    }
    case "all": {
      const res = await coordinator.all(req);
      return res.ok ? EXIT.SUCCESS : reportFailure(reporter, res.error, usage);
    }
    case "commit": {
      const res = await coordinator.commit();
      return res.ok ? EXIT.SUCCESS : reportFailure(reporter, res.error, usage);
    }
    case "push": {
      const res = await coordinator.push();
      return res.ok ? EXIT.SUCCESS : reportFailure(reporter, res.error, usage);
    }
    case "status": {
      const res = await coordinator.status();
      if (!res.ok) return reportFailure(reporter, res.error, usage);
      printStatus(reporter, res.value);
      return EXIT.SUCCESS;
    }
  }
}
