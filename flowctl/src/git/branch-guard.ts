/**
 * Branch guard: enforces the promotion flow for every merge the engine issues.
 *
 * Rules:
 * 1. Only a release branch may be merged into master
 * 2. Only a hotfix branch may be merged into a release branch
 * 3. Nothing is merged into development branches (hotfixes reach them by cherry-pick)
 */
import { classify } from "../branch/naming.js";
import type { BranchKind } from "../types/branch.js";

export type BranchGuardResult = {
  allowed: boolean;
  reason?: string;
};

const ALLOWED_SOURCES: Record<BranchKind, BranchKind[]> = {
  master: ["release"],
  release: ["hotfix"],
  development: [],
  hotfix: [],
  unknown: [],
};

/** Check if a merge from source to target is allowed. */
export function checkMergeAllowed(source: string, target: string): BranchGuardResult {
  const sourceKind = classify(source).kind;
  const targetKind = classify(target).kind;
  const allowed = ALLOWED_SOURCES[targetKind];

  if (!allowed.includes(sourceKind)) {
    const expected = allowed.length > 0 ? `only ${allowed.join(", ")} branches may be merged into it` : "it never receives merges";
    return {
      allowed: false,
      reason: `Merge from '${source}' (${sourceKind}) into '${target}' (${targetKind}) is forbidden: ${expected}.`,
    };
  }

  return { allowed: true };
}
