import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { UvVersionManager, commandErrorMessage, type CommandRunner } from "../src/version/uv.js";

function fakeRunner(stdout = "") {
  return vi.fn<CommandRunner>(async () => ({ stdout, stderr: "" }));
}

function failure(message: string, stderr: string): Error {
  return Object.assign(new Error(message), { stderr });
}

describe("commandErrorMessage", () => {
  it("prefers stderr", () => {
    expect(commandErrorMessage(failure("Command failed: uv version", "error: invalid version\n"))).toBe(
      "error: invalid version",
    );
  });

  it("falls back to the error message", () => {
    expect(commandErrorMessage(failure("spawn uv ENOENT", ""))).toBe("spawn uv ENOENT");
    expect(commandErrorMessage("boom")).toBe("boom");
  });
});

describe("UvVersionManager", () => {
  it("runs uv version with the expected arguments", async () => {
    const run = fakeRunner("1.4.1\n");
    const vm = new UvVersionManager({ cwd: "/repo", uvBin: "uv", run });

    await vm.current();
    await vm.computeBump("patch");
    await vm.validate("2.0.0");
    await vm.bump("minor");
    await vm.set("2.0.0");

    expect(run.mock.calls.map((c) => c[1])).toEqual([
      ["version", "--short"],
      ["version", "--bump", "patch", "--dry-run", "--short"],
      ["version", "2.0.0", "--dry-run"],
      ["version", "--bump", "minor"],
      ["version", "2.0.0"],
    ]);
    expect(run).toHaveBeenCalledWith("uv", ["version", "--short"], { cwd: "/repo" });
  });

  it("resolves a uv path relative to the project", async () => {
    const run = fakeRunner("1.0.0");
    const vm = new UvVersionManager({ cwd: "/repo", uvBin: "./bin/uv", run });
    await vm.current();
    expect(run.mock.calls[0]?.[0]).toBe(path.resolve("/repo", "./bin/uv"));
  });

  it("trims tool output", async () => {
    const vm = new UvVersionManager({ cwd: "/repo", uvBin: "uv", run: fakeRunner("  1.4.0\n") });
    expect(await vm.current()).toBe("1.4.0");
    expect(await vm.computeBump("patch")).toEqual({ ok: true, value: "1.4.0" });
  });

  it("treats empty output as no version", async () => {
    const vm = new UvVersionManager({ cwd: "/repo", uvBin: "uv", run: fakeRunner("\n") });
    expect(await vm.current()).toBe(null);
    expect(await vm.computeBump("patch")).toEqual({ ok: false, message: "uv printed no version for bump 'patch'" });
  });

  it("carries the tool's stderr on failure", async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw failure("Command failed", "error: Invalid version `1.x`\n");
    });
    const vm = new UvVersionManager({ cwd: "/repo", uvBin: "uv", run });

    expect(await vm.validate("1.x")).toEqual({ ok: false, message: "error: Invalid version `1.x`" });
    expect(await vm.current()).toBe(null);
  });

  describe("preflight", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "releasectl-uv-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("requires pyproject.toml", async () => {
      const vm = new UvVersionManager({ cwd: tmpDir, uvBin: "uv", run: fakeRunner() });
      expect(await vm.preflight()).toEqual({
        code: "MANIFEST_NOT_FOUND",
        message: `pyproject.toml not found in ${tmpDir}`,
      });
    });

    it("requires an executable uv at a configured path", async () => {
      fs.writeFileSync(path.join(tmpDir, "pyproject.toml"), '[project]\nname = "demo"\nversion = "1.4.0"\n');
      const vm = new UvVersionManager({ cwd: tmpDir, uvBin: "./bin/uv", run: fakeRunner() });

      const res = await vm.preflight();

      expect(res?.code).toBe("TOOL_NOT_FOUND");
      expect(res?.message).toBe(`uv not found at ${path.join(tmpDir, "bin/uv")}`);
    });

    it("passes with an executable uv", async () => {
      fs.writeFileSync(path.join(tmpDir, "pyproject.toml"), '[project]\nname = "demo"\nversion = "1.4.0"\n');
      fs.mkdirSync(path.join(tmpDir, "bin"));
      fs.writeFileSync(path.join(tmpDir, "bin/uv"), "#!/bin/sh\n", { mode: 0o755 });
      const vm = new UvVersionManager({ cwd: tmpDir, uvBin: "./bin/uv", run: fakeRunner() });

      expect(await vm.preflight()).toBe(null);
    });

    it("leaves a bare tool name to PATH lookup", async () => {
      fs.writeFileSync(path.join(tmpDir, "pyproject.toml"), "");
      const vm = new UvVersionManager({ cwd: tmpDir, uvBin: "uv", run: fakeRunner() });
      expect(await vm.preflight()).toBe(null);
    });
  });
});
