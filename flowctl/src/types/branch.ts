/** Branch lifecycle kinds. Every consumer switches over these exhaustively. */
export type BranchKind = "development" | "release" | "hotfix" | "master" | "unknown";

export type BranchDescriptor = Readonly<{
  rawName: string;
  kind: BranchKind;
  /** Present iff kind is development or release (`d7` → 7). */
  sequenceId?: number;
  /** Hotfix only: release id parsed from the name, if any. */
  parentReleaseId?: number;
}>;

/** A release line resolved for a hotfix; produced once per event. */
export type ResolvedRelease = Readonly<{
  branch: string;
  releaseId: number;
  source: "name" | "fallback";
}>;

/** A `{branch}-complete` marker found on the remote. */
export type CompletionTag = {
  targetBranch: string;
  tagName: string;
  createdAt: string;
};
