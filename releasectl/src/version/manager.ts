import type { ManagerKind } from "../types/config.js";

export type ToolResult<T = void> = { ok: true; value: T } | { ok: false; message: string };

export type PreflightFailure = {
  code: "MANIFEST_NOT_FOUND" | "TOOL_NOT_FOUND";
  message: string;
  hint?: string;
};

/**
 * Version-manager capability: reads, computes and writes the version held in
 * the project's manifest.
 */
export interface VersionManager {
  readonly kind: ManagerKind;
  /** Manifest path, relative to the repository root. */
  readonly manifest: string;
  /** Lock file the manager may rewrite alongside the manifest. */
  readonly lockFile: string;

  /** Checks that must pass before any phase runs. */
  preflight(): Promise<PreflightFailure | null>;
  /** Current version, or null when the manifest does not yield one. */
  current(): Promise<string | null>;
  /** Next version for a bump keyword, without writing anything. */
  computeBump(keyword: string): Promise<ToolResult<string>>;
  validate(version: string): Promise<ToolResult>;
  bump(keyword: string): Promise<ToolResult>;
  set(version: string): Promise<ToolResult>;
}
