import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../types/errors.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

/** Validate the layered configuration for an environment. */
export function validateAll(opts: { configDir?: string; env?: string }): ValidateResult {
  if (opts.configDir !== undefined) {
    const dir = path.resolve(opts.configDir);
    if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
      return { ok: false, errors: [{ level: "error", code: "CONFIG_DIR_MISSING", message: `Config directory not found: ${dir}`, path: dir }] };
    }
  }

  let loaded: Record<string, unknown>;
  try {
    loaded = loadConfig(opts.env, opts.configDir);
  } catch (e) {
    return { ok: false, errors: [{ level: "error", code: "CONFIG_PARSE", message: errorMessage(e) }] };
  }

  const result = validateConfig(loaded);
  if (!result.valid) {
    return { ok: false, errors: [{ level: "error", code: "CONFIG_INVALID", message: result.errors }] };
  }
  return { ok: true };
}
