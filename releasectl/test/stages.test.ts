import { describe, expect, it } from "vitest";
import { PHASES, detectStage, nextStage, pendingPhase } from "../src/core/stages.js";

describe("release stages", () => {
  it("runs phases in order", () => {
    expect(PHASES).toEqual(["bump", "commit", "push"]);
  });

  it("advances one stage per phase", () => {
    expect(nextStage("idle", "bump")).toBe("bumped");
    expect(nextStage("bumped", "commit")).toBe("committed");
    expect(nextStage("committed", "push")).toBe("pushed");
  });

  it("rejects phases out of order", () => {
    expect(nextStage("idle", "commit")).toBe(null);
    expect(nextStage("idle", "push")).toBe(null);
    expect(nextStage("bumped", "push")).toBe(null);
    expect(nextStage("pushed", "bump")).toBe(null);
  });

  it("names the pending phase", () => {
    expect(pendingPhase("idle")).toBe("bump");
    expect(pendingPhase("bumped")).toBe("commit");
    expect(pendingPhase("committed")).toBe("push");
    expect(pendingPhase("pushed")).toBe(null);
  });

  it("infers the stage from repository evidence", () => {
    expect(detectStage({ manifestModified: false, tagLocal: false, tagRemote: false })).toBe("idle");
    expect(detectStage({ manifestModified: true, tagLocal: false, tagRemote: false })).toBe("bumped");
    expect(detectStage({ manifestModified: false, tagLocal: true, tagRemote: false })).toBe("committed");
    expect(detectStage({ manifestModified: false, tagLocal: true, tagRemote: true })).toBe("pushed");
  });
});
