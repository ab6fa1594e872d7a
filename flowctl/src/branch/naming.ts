import type { BranchDescriptor } from "../types/branch.js";

export const MASTER_BRANCH = "master";
export const HOTFIX_PREFIX = "hotfix/";

const DEVELOPMENT_PATTERN = /^d(\d+)$/;
const RELEASE_PATTERN = /^r(\d+)$/;
/**
 * First `r<N>` token of a hotfix name. Stricter than a bare `r(\d+)` search:
 * the `r` must start the suffix or follow a non-alphanumeric character, so
 * `hotfix/bugr2` names no release and falls back to the highest `r<N>`.
 */
const HOTFIX_RELEASE_TOKEN = /(?:^|[^A-Za-z0-9])r(\d+)/;

/**
 * Classify a branch name into a descriptor.
 *
 * Rules, in priority order:
 * 1. `master` → master
 * 2. `d<N>` → development
 * 3. `r<N>` → release
 * 4. `hotfix/...` → hotfix, with the parent release taken from the first `r<N>` token if any
 * 5. anything else → unknown
 */
export function classify(name: string): BranchDescriptor {
  if (name === MASTER_BRANCH) {
    return Object.freeze({ rawName: name, kind: "master" });
  }

  const dev = DEVELOPMENT_PATTERN.exec(name);
  if (dev) {
    return Object.freeze({ rawName: name, kind: "development", sequenceId: Number(dev[1]) });
  }

  const release = RELEASE_PATTERN.exec(name);
  if (release) {
    return Object.freeze({ rawName: name, kind: "release", sequenceId: Number(release[1]) });
  }

  if (name.startsWith(HOTFIX_PREFIX) && name.length > HOTFIX_PREFIX.length) {
    const token = HOTFIX_RELEASE_TOKEN.exec(hotfixSuffix(name));
    return Object.freeze(
      token
        ? { rawName: name, kind: "hotfix", parentReleaseId: Number(token[1]) }
        : { rawName: name, kind: "hotfix" },
    );
  }

  return Object.freeze({ rawName: name, kind: "unknown" });
}

/** `hotfix/r1-login-fix` → `r1-login-fix`. */
export function hotfixSuffix(name: string): string {
  return name.startsWith(HOTFIX_PREFIX) ? name.slice(HOTFIX_PREFIX.length) : name;
}

export function releaseBranchName(releaseId: number): string {
  return `r${releaseId}`;
}

/** Pick the descriptor with the highest sequence id, or null when the list is empty. */
export function highestSequence(descriptors: BranchDescriptor[]): BranchDescriptor | null {
  let best: BranchDescriptor | null = null;
  for (const d of descriptors) {
    if (d.sequenceId === undefined) continue;
    if (best === null || (best.sequenceId ?? -1) < d.sequenceId) best = d;
  }
  return best;
}
