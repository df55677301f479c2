import type { ReleasePhase, ReleaseStage } from "../types/release.js";

/**
 * Phases in the order a chained run executes them.
 */
export const PHASES = ["bump", "commit", "push"] as const satisfies readonly ReleasePhase[];

const PRODUCES: Record<ReleasePhase, { from: ReleaseStage; to: ReleaseStage }> = {
  bump: { from: "idle", to: "bumped" },
  commit: { from: "bumped", to: "committed" },
  push: { from: "committed", to: "pushed" },
};

/**
 * Pure function: the stage reached by running `phase` from `current`, or null
 * when the phase does not follow from that stage. Stages only move forward.
 */
export function nextStage(current: ReleaseStage, phase: ReleasePhase): ReleaseStage | null {
  const edge = PRODUCES[phase];
  return edge.from === current ? edge.to : null;
}

/** The phase that moves a release out of `stage`; null once pushed. */
export function pendingPhase(stage: ReleaseStage): ReleasePhase | null {
  for (const phase of PHASES) {
    if (PRODUCES[phase].from === stage) return phase;
  }
  return null;
}

export type StageEvidence = {
  manifestModified: boolean;
  tagLocal: boolean;
  tagRemote: boolean;
};

/** Infer the stage from what the repository shows right now. */
export function detectStage(evidence: StageEvidence): ReleaseStage {
  if (evidence.tagRemote) return "pushed";
  if (evidence.tagLocal) return "committed";
  if (evidence.manifestModified) return "bumped";
  return "idle";
}
