/** Promotion actions and their outcomes. Exactly one action is selected per branch event. */
export type PromotionAction =
  | { type: "create_release"; fromDev: string; releaseId: number }
  | { type: "merge_to_master"; fromBranch: string }
  | { type: "propagate_hotfix"; hotfixBranch: string; parentRelease: string }
  | { type: "await_release_completion"; parentRelease: string }
  | { type: "noop"; reason: string };

export type ConflictReport = {
  sourceRef: string;
  targetBranch: string;
  /** Empty means a conflict was detected but the simulation could not name the files. */
  conflictingPaths: string[];
  resolutionBranch: string;
};

export type PropagationResult =
  | { status: "applied"; targetBranch: string; commit: string }
  | { status: "conflict"; report: ConflictReport }
  | { status: "failed"; targetBranch: string | null; error: { operation: string; message: string } };

export type ActionStatus =
  /** The selected action ran to its terminal step. */
  | "completed"
  /** Completion tag missing; a reminder was emitted. */
  | "gate_closed"
  | "noop"
  /** Completed, but a human must finish a resolution branch. */
  | "attention_required"
  | "failed";

export type ActionResult = {
  status: ActionStatus;
  branch: string;
  action: PromotionAction | null;
  /** Hotfix only: how the release line was left after propagation. */
  releasePath?: "merged_to_master" | "awaiting_release_completion" | "failed";
  propagation?: PropagationResult;
  error?: { code: string; operation?: string; message: string };
};
