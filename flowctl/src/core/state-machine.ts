import type { BranchDescriptor, BranchKind } from "../types/branch.js";
import type { PromotionAction } from "../types/action.js";
import { releaseBranchName } from "../branch/naming.js";

/**
 * Lifecycle stages in promotion order. Hotfixes re-enter at release.
 */
export const LIFECYCLE = ["development", "release", "master"] as const;

export type LifecycleStage = (typeof LIFECYCLE)[number];

/** Kinds whose promotion waits for a `{name}-complete` tag. */
export function isGated(kind: BranchKind): boolean {
  switch (kind) {
    case "development":
    case "release":
    case "hotfix":
      return true;
    case "master":
    case "unknown":
      return false;
  }
}

/** The stage a branch kind promotes into, or null when it does not promote. */
export function promotesTo(kind: BranchKind): LifecycleStage | null {
  switch (kind) {
    case "development":
      return "release";
    case "release":
      return "master";
    case "hotfix":
      return "release";
    case "master":
    case "unknown":
      return null;
  }
}

/** The action a kind leads to once its gate is open. */
export function primaryAction(kind: BranchKind): PromotionAction["type"] {
  switch (kind) {
    case "development":
      return "create_release";
    case "release":
      return "merge_to_master";
    case "hotfix":
      return "propagate_hotfix";
    case "master":
    case "unknown":
      return "noop";
  }
}

/**
 * Pure function: given a descriptor and its gate result, select the one action for this event.
 * `parentRelease` is the already-resolved release line for hotfixes.
 */
export function selectAction(
  descriptor: BranchDescriptor,
  complete: boolean,
  parentRelease?: string,
): PromotionAction {
  switch (descriptor.kind) {
    case "master":
      return { type: "noop", reason: "master is the end of the promotion flow" };
    case "unknown":
      return { type: "noop", reason: `'${descriptor.rawName}' matches no branch grammar` };
    case "development":
      if (!complete) return { type: "noop", reason: "completion tag missing" };
      if (descriptor.sequenceId === undefined) return { type: "noop", reason: "development branch without sequence id" };
      return { type: "create_release", fromDev: descriptor.rawName, releaseId: descriptor.sequenceId };
    case "release":
      if (!complete) return { type: "noop", reason: "completion tag missing" };
      return { type: "merge_to_master", fromBranch: descriptor.rawName };
    case "hotfix":
      if (!complete) return { type: "noop", reason: "completion tag missing" };
      if (parentRelease === undefined) return { type: "noop", reason: "parent release not resolved" };
      return { type: "propagate_hotfix", hotfixBranch: descriptor.rawName, parentRelease };
  }
}

/** After a hotfix lands on its release line: ship it now, or wait for the release's own tag. */
export function afterHotfixMerged(parentRelease: string, releaseComplete: boolean): PromotionAction {
  return releaseComplete
    ? { type: "merge_to_master", fromBranch: parentRelease }
    : { type: "await_release_completion", parentRelease };
}

/** Branch a development branch is released as (`d7` → `r7`). */
export function releaseFor(descriptor: BranchDescriptor): string | null {
  return descriptor.kind === "development" && descriptor.sequenceId !== undefined
    ? releaseBranchName(descriptor.sequenceId)
    : null;
}
