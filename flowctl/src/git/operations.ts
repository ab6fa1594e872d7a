import fs from "node:fs";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import { GatewayError, errorMessage } from "../types/errors.js";
import type { IdentityConfig } from "../types/config.js";
import { loggers } from "../logging/logger.js";
import {
  refMatches,
  type CherryPickConflictMode,
  type CherryPickOutcome,
  type MergeOutcome,
  type MergeStrategy,
  type RemoteTag,
  type VcsGateway,
} from "./gateway.js";

const log = loggers.git;

export type GitOperationsOptions = {
  remote?: string;
  identity?: IdentityConfig;
};

function splitLines(output: string): string[] {
  return output
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

/**
 * VcsGateway over a local clone, backed by simple-git.
 * Remote-facing reads go to the remote directly (ls-remote) so results are never stale.
 */
export class GitOperations implements VcsGateway {
  private readonly git: SimpleGit;
  private readonly remote: string;
  private readonly repoPath: string;

  constructor(repoPath: string, opts: GitOperationsOptions = {}, git?: SimpleGit) {
    const identity = opts.identity
      ? [`user.name=${opts.identity.name}`, `user.email=${opts.identity.email}`]
      : [];
    this.git = git ?? simpleGit({ baseDir: repoPath, config: identity });
    this.remote = opts.remote ?? "origin";
    this.repoPath = repoPath;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    log.debug({ operation }, "git operation");
    try {
      return await fn();
    } catch (e) {
      if (e instanceof GatewayError) throw e;
      throw new GatewayError(operation, errorMessage(e), e);
    }
  }

  async fetchAll(): Promise<void> {
    await this.run("fetch-all", () => this.git.fetch(["--all", "--tags", "--prune", "--force"]));
  }

  async listRemoteBranches(prefix: string): Promise<string[]> {
    return this.run("list-remote-branches", async () => {
      const output = await this.git.listRemote(["--heads", this.remote]);
      return splitLines(output)
        .map((line) => line.split("\t")[1] ?? "")
        .filter((ref) => ref.startsWith("refs/heads/"))
        .map((ref) => ref.slice("refs/heads/".length))
        .filter((name) => name.startsWith(prefix));
    });
  }

  async listRemoteTags(pattern: string): Promise<RemoteTag[]> {
    return this.run("list-remote-tags", async () => {
      const output = await this.git.listRemote(["--tags", "--refs", this.remote]);
      const names = splitLines(output)
        .map((line) => (line.split("\t")[1] ?? "").slice("refs/tags/".length))
        .filter((name) => name.length > 0 && refMatches(name, pattern));
      if (names.length === 0) return [];

      // Pull the matched tags so their creation dates can be read locally.
      await this.git.fetch([this.remote, "--force", ...names.map((n) => `+refs/tags/${n}:refs/tags/${n}`)]);
      const tags: RemoteTag[] = [];
      for (const name of names) {
        const date = await this.git.raw([
          "for-each-ref",
          "--format=%(creatordate:iso-strict)",
          `refs/tags/${name}`,
        ]);
        tags.push({ name, createdAt: date.trim() });
      }
      return tags;
    });
  }

  private async remoteHas(branch: string): Promise<boolean> {
    const output = await this.git.listRemote(["--heads", this.remote, branch]);
    return splitLines(output).some((line) => line.endsWith(`refs/heads/${branch}`));
  }

  /** A branch that exists on the remote resolves to its freshly fetched tip. */
  private async resolveRef(ref: string): Promise<string> {
    if (await this.remoteHas(ref)) {
      await this.git.fetch([this.remote, `+refs/heads/${ref}:refs/remotes/${this.remote}/${ref}`]);
      return `${this.remote}/${ref}`;
    }
    return ref;
  }

  async checkout(ref: string): Promise<void> {
    await this.run("checkout", async () => {
      const resolved = await this.resolveRef(ref);
      if (resolved === ref) {
        await this.git.checkout(ref);
      } else {
        await this.git.checkout(["-B", ref, resolved]);
      }
    });
  }

  async createBranch(name: string, from: string): Promise<void> {
    await this.run("create-branch", async () => {
      const resolved = await this.resolveRef(from);
      await this.git.checkout(["-b", name, resolved]);
    });
  }

  async push(ref: string): Promise<void> {
    await this.run("push", () => this.git.push(this.remote, ref));
  }

  async tag(name: string, target: string, message: string): Promise<void> {
    await this.run("tag", async () => {
      const resolved = await this.resolveRef(target);
      await this.git.tag(["-a", name, resolved, "-m", message]);
    });
  }

  private async currentBranch(): Promise<string> {
    return (await this.git.revparse(["--abbrev-ref", "HEAD"])).trim();
  }

  private async unmergedPaths(): Promise<string[]> {
    return splitLines(await this.git.diff(["--name-only", "--diff-filter=U"]));
  }

  async merge(source: string, target: string, strategy: MergeStrategy): Promise<MergeOutcome> {
    const operation = strategy === "trial-no-commit" ? "trial-merge" : "merge";
    return this.run(operation, async () => {
      await this.checkout(target);
      const resolved = await this.resolveRef(source);

      if (strategy === "trial-no-commit") {
        const before = await this.currentHeadCommit();
        let clean = true;
        try {
          await this.git.merge([resolved, "--no-commit", "--no-ff"]);
        } catch (e) {
          if ((await this.unmergedPaths()).length === 0) throw e;
          clean = false;
        } finally {
          await this.git.reset(["--hard", before]);
        }
        return clean ? { clean: true, commit: null } : { clean: false };
      }

      try {
        await this.git.merge([resolved, "--no-ff", "-m", `Merge ${source} into ${target}`]);
      } catch (e) {
        if ((await this.unmergedPaths()).length === 0) throw e;
        await this.git.merge(["--abort"]);
        return { clean: false };
      }
      return { clean: true, commit: await this.currentHeadCommit() };
    });
  }

  private async cherryPickInProgress(): Promise<boolean> {
    const marker = (await this.git.revparse(["--git-path", "CHERRY_PICK_HEAD"])).trim();
    return fs.existsSync(path.resolve(this.repoPath, marker));
  }

  private async stagedPaths(): Promise<string[]> {
    return splitLines(await this.git.diff(["--cached", "--name-only"]));
  }

  /**
   * Conflicts are kept or aborted per onConflict. A pick whose change is
   * already on the branch is skipped and reported as empty; any other failure
   * aborts the pick before rethrowing, so no CHERRY_PICK_HEAD is left behind.
   */
  async cherryPick(commit: string, onto: string, onConflict: CherryPickConflictMode): Promise<CherryPickOutcome> {
    return this.run("cherry-pick", async () => {
      if ((await this.currentBranch()) !== onto) await this.checkout(onto);
      try {
        await this.git.raw(["cherry-pick", commit]);
      } catch (e) {
        if ((await this.unmergedPaths()).length > 0) {
          if (onConflict === "abort") await this.git.raw(["cherry-pick", "--abort"]);
          return { status: "conflict" };
        }
        if ((await this.cherryPickInProgress()) && (await this.stagedPaths()).length === 0) {
          await this.git.raw(["cherry-pick", "--skip"]);
          return { status: "empty", commit: await this.currentHeadCommit() };
        }
        if (await this.cherryPickInProgress()) await this.git.raw(["cherry-pick", "--abort"]);
        throw e;
      }
      return { status: "applied", commit: await this.currentHeadCommit() };
    });
  }

  async diffUnmergedPaths(): Promise<string[]> {
    return this.run("diff-unmerged-paths", () => this.unmergedPaths());
  }

  async commitAll(message: string): Promise<string> {
    return this.run("commit", async () => {
      await this.git.add(["-u"]);
      await this.git.raw(["commit", "--allow-empty", "--no-verify", "-m", message]);
      return this.currentHeadCommit();
    });
  }

  async currentHeadCommit(ref = "HEAD"): Promise<string> {
    return this.run("current-head-commit", async () => (await this.git.revparse([ref])).trim());
  }
}
