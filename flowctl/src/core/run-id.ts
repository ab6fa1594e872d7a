import crypto from "node:crypto";
import { ConfigError } from "../types/errors.js";

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Generate a run id: {YYYYMMDDHHmmss}-{hex}. */
export function generateRunId(now: Date = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace(/[-:T]/g, "");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

/** Run ids end up in branch names, so only ref-safe characters are accepted. */
export function isValidRunId(id: string): boolean {
  return RUN_ID_PATTERN.test(id) && !id.includes("..") && !id.endsWith(".lock") && !id.endsWith(".");
}

/**
 * Pick the run id for this execution: explicit option, then the CI build
 * number, then a generated one.
 */
export function resolveRunId(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = explicit ?? env.FLOWCTL_RUN_ID ?? env.BUILD_NUMBER;
  if (candidate === undefined || candidate.length === 0) return generateRunId();
  if (!isValidRunId(candidate)) {
    throw new ConfigError(`Invalid run id '${candidate}': use letters, digits, '.', '_' or '-'`);
  }
  return candidate;
}
