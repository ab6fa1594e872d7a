import { compileGuard } from "../schema/ajv.js";
import type { FlowConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "remote"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    remote: { type: "string", minLength: 1, pattern: "^[A-Za-z0-9._-]+$" },
    events_file: { type: "string", minLength: 1 },
    log_level: { type: "string", enum: ["fatal", "error", "warn", "info", "debug", "trace", "silent"] },
    lock: {
      type: "object",
      required: ["stale_ms", "retries"],
      properties: {
        stale_ms: { type: "integer", minimum: 5000 },
        retries: { type: "integer", minimum: 0 },
      },
    },
    identity: {
      type: "object",
      required: ["name", "email"],
      properties: {
        name: { type: "string", minLength: 1 },
        email: { type: "string", format: "email" },
      },
    },
  },
};

const isFlowConfig = compileGuard<FlowConfig>(CONFIG_SCHEMA);

export type ConfigValidationResult =
  | { valid: true; config: FlowConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (isFlowConfig(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: isFlowConfig.errorsText() };
}
