import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../types/errors.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "FLOWCTL_";

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`${filePath}: ${errorMessage(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${filePath}: expected a mapping at the top level`);
  return parsed;
}

/** FLOWCTL_EVENTS_FILE → events_file. Nested keys are not reachable from the environment. */
function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (configKey === "run_id") continue;
    result[configKey] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← FLOWCTL_* environment variables.
 * The result is unvalidated; pass it through validateConfig before use.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
