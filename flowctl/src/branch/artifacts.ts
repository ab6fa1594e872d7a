import { hotfixSuffix } from "./naming.js";

const COMPLETE_SUFFIX = "-complete";
const RESOLUTION_PREFIX = "merge-hotfix-to-dev-";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Render `yyyyMMdd.HHmmss` in UTC. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}.${time}`;
}

/** `d1` → `d1-complete`; hotfix names keep their slash. */
export function completionTagName(branch: string): string {
  return `${branch}${COMPLETE_SUFFIX}`;
}

/** Inverse of completionTagName, or null for tags that are not completion markers. */
export function completionTarget(tagName: string): string | null {
  if (!tagName.endsWith(COMPLETE_SUFFIX) || tagName.length === COMPLETE_SUFFIX.length) return null;
  return tagName.slice(0, -COMPLETE_SUFFIX.length);
}

export function releaseTagName(releaseBranch: string, at: Date): string {
  return `release-${releaseBranch}-${formatTimestamp(at)}`;
}

export function hotfixTagName(hotfixBranch: string, at: Date): string {
  return `hotfix-${hotfixSuffix(hotfixBranch)}-${formatTimestamp(at)}`;
}

export function resolutionBranchName(runId: string): string {
  return `${RESOLUTION_PREFIX}${runId}`;
}
