import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ReleaseConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "manager", "remote", "uv_bin"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    manager: { type: "string", enum: ["uv", "npm"] },
    remote: { type: "string", minLength: 1 },
    uv_bin: { type: "string", minLength: 1 },
    manifest: { type: "string", minLength: 1 },
    lock_file: { type: "string", minLength: 1 },
    forge_url: { type: "string", format: "uri" },
  },
};

type ConfigValidateFn = ((data: unknown) => data is ReleaseConfig) & { errors?: unknown };

type ConfigAjv = {
  compile: (schema: object) => ConfigValidateFn;
  errorsText: (errors: unknown) => string;
};

let compiled: { ajv: ConfigAjv; validate: ConfigValidateFn } | undefined;

function configValidator(): { ajv: ConfigAjv; validate: ConfigValidateFn } {
  if (!compiled) {
    const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): ConfigAjv };
    const add = addFormats as unknown as (ajv: ConfigAjv) => void;

    const ajv = new AjvCtor({ allErrors: true, strict: true });
    add(ajv);
    compiled = { ajv, validate: ajv.compile(CONFIG_SCHEMA) };
  }
  return compiled;
}

export type ConfigValidationResult =
  | { valid: true; config: ReleaseConfig }
  | { valid: false; errors: string };

/** Validate a merged config object against the config schema. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const { ajv, validate } = configValidator();
  if (validate(raw)) {
    return { valid: true, config: raw };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
