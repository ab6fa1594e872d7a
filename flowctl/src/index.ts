export { classify, hotfixSuffix, releaseBranchName, MASTER_BRANCH, HOTFIX_PREFIX } from "./branch/naming.js";
export {
  completionTagName,
  formatTimestamp,
  hotfixTagName,
  releaseTagName,
  resolutionBranchName,
} from "./branch/artifacts.js";
export { findCompletionTag, isComplete, resolveCurrentDevBranch, resolveParentRelease } from "./gate/completion-gate.js";
export { selectAction, afterHotfixMerged } from "./core/state-machine.js";
export { PromotionEngine, type PromotionEngineOptions, type PromotionPlan } from "./core/promotion-engine.js";
export { ConflictResolver } from "./core/conflict-resolver.js";
export { withRepositoryLock } from "./core/repo-lock.js";
export { GitOperations } from "./git/operations.js";
export type * from "./git/gateway.js";
export * from "./notify/notifier.js";
export * from "./types/errors.js";
export type * from "./types/action.js";
export type * from "./types/branch.js";
export type * from "./types/events.js";
export type * from "./types/config.js";
