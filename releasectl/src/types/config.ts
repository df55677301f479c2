/** Layered configuration: base.yaml, then the project file, then the environment. */
export type ManagerKind = "uv" | "npm";

export type ReleaseConfig = {
  schema_version: string;
  manager: ManagerKind;
  remote: string;
  uv_bin: string;
  manifest?: string;
  lock_file?: string;
  forge_url?: string;
};

export const CONFIG_KEYS = [
  "schema_version",
  "manager",
  "remote",
  "uv_bin",
  "manifest",
  "lock_file",
  "forge_url",
] as const satisfies readonly (keyof ReleaseConfig)[];
