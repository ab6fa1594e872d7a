import { minimatch } from "minimatch";

/**
 * Version-control capability interface. The promotion core issues only these
 * operations and never holds a repository handle of its own; every method
 * either resolves or rejects with a GatewayError naming the operation.
 */

export type MergeStrategy = "no-fast-forward" | "trial-no-commit";

export type MergeOutcome =
  /** no-fast-forward: the merge commit; trial-no-commit: null (nothing is recorded). */
  | { clean: true; commit: string | null }
  | { clean: false };

/** What to do with a conflicted cherry-pick: abort it, or leave markers in the working tree. */
export type CherryPickConflictMode = "abort" | "keep";

export type CherryPickOutcome =
  | { status: "applied"; commit: string }
  /** The change is already on the branch; nothing was committed and `commit` is the unchanged head. */
  | { status: "empty"; commit: string }
  | { status: "conflict" };

export type RemoteTag = {
  name: string;
  /** ISO-8601 creation date of the tag (or of the tagged commit for lightweight tags). */
  createdAt: string;
};

export interface VcsGateway {
  /** Refresh all remote-tracking refs and tags. */
  fetchAll(): Promise<void>;
  /** Names of branches on the remote starting with prefix ("" for all). */
  listRemoteBranches(prefix: string): Promise<string[]>;
  /** Tags on the remote matching a glob pattern, queried fresh. */
  listRemoteTags(pattern: string): Promise<RemoteTag[]>;
  /** Check out ref; a branch that exists on the remote is reset to its remote tip. */
  checkout(ref: string): Promise<void>;
  /** Create branch name at from and check it out. */
  createBranch(name: string, from: string): Promise<void>;
  /** Push a branch or tag to the remote. */
  push(ref: string): Promise<void>;
  /** Annotated tag at target. */
  tag(name: string, target: string, message: string): Promise<void>;
  /**
   * Merge source into target. A conflicted no-fast-forward merge is aborted and
   * reported as unclean; a trial merge is always aborted, whatever its outcome.
   */
  merge(source: string, target: string, strategy: MergeStrategy): Promise<MergeOutcome>;
  cherryPick(commit: string, onto: string, onConflict: CherryPickConflictMode): Promise<CherryPickOutcome>;
  /** Paths left unmerged in the working tree by the last conflicting operation. */
  diffUnmergedPaths(): Promise<string[]>;
  /**
   * Stage changes to tracked files (including unmerged ones) and commit;
   * untracked files are left out. Records an empty commit when nothing is staged.
   */
  commitAll(message: string): Promise<string>;
  /** Commit id of ref (HEAD by default). */
  currentHeadCommit(ref?: string): Promise<string>;
}

/**
 * Glob match for ref names with brace, extglob, negation and comment syntax
 * turned off. Git forbids `*`, `?`, `[` and `\\` in ref names, so a literal ref
 * name used as the pattern matches only itself.
 */
export function refMatches(name: string, pattern: string): boolean {
  return minimatch(name, pattern, { nobrace: true, noext: true, nonegate: true, nocomment: true });
}
