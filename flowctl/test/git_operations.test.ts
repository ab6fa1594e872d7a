import { describe, expect, it, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { simpleGit, type SimpleGit } from "simple-git";
import { checkMergeAllowed } from "../src/git/branch-guard.js";
import { GitOperations } from "../src/git/operations.js";
import { ConflictResolver } from "../src/core/conflict-resolver.js";
import { handle } from "../src/commands/handle.js";
import { GatewayError } from "../src/types/errors.js";

describe("branch-guard", () => {
  it("allows release → master", () => {
    expect(checkMergeAllowed("r3", "master")).toEqual({ allowed: true });
  });

  it("allows hotfix → release", () => {
    expect(checkMergeAllowed("hotfix/r1-login-fix", "r1").allowed).toBe(true);
  });

  it("rejects development → master (must be released first)", () => {
    const result = checkMergeAllowed("d4", "master");
    expect(result.allowed).toBe(false);
    expect(result.reason).toBe(
      "Merge from 'd4' (development) into 'master' (master) is forbidden: only release branches may be merged into it.",
    );
  });

  it("rejects hotfix → master", () => {
    expect(checkMergeAllowed("hotfix/x", "master").allowed).toBe(false);
  });

  it("rejects any merge into a development branch", () => {
    const result = checkMergeAllowed("hotfix/r1-x", "d2");
    expect(result.allowed).toBe(false);
    expect(result.reason).toContain("never receives merges");
  });

  it("rejects release → release", () => {
    expect(checkMergeAllowed("r1", "r2").allowed).toBe(false);
  });
});

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");
const IDENTITY = { name: "flowctl", email: "flowctl@example.com" };

type Repos = { tmpDir: string; remotePath: string; seed: SimpleGit; seedPath: string };

/** A bare remote plus a seed clone with `login.txt` on master. */
async function createRepos(): Promise<Repos> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowctl-git-"));
  const remotePath = path.join(tmpDir, "remote.git");
  const seedPath = path.join(tmpDir, "seed");

  await simpleGit().raw(["init", "--bare", "--initial-branch=master", remotePath]);
  await simpleGit().raw(["init", "--initial-branch=master", seedPath]);
  const seed = simpleGit(seedPath);
  await seed.addRemote("origin", remotePath);
  await seed.addConfig("user.name", "test");
  await seed.addConfig("user.email", "test@example.com");
  const repos = { tmpDir, remotePath, seed, seedPath };
  await seedCommit(repos, "login.txt", "login v1\n", "initial");
  await seed.push("origin", "master");
  return repos;
}

async function seedCommit(repos: Repos, file: string, content: string, message: string): Promise<void> {
  fs.writeFileSync(path.join(repos.seedPath, file), content);
  await repos.seed.add([file]);
  await repos.seed.commit(message);
}

/** Create branch from base in the seed, commit one file change on it and push it. */
async function seedBranch(repos: Repos, branch: string, base: string, file: string, content: string): Promise<void> {
  await repos.seed.checkout(["-b", branch, base]);
  await seedCommit(repos, file, content, `change ${file} on ${branch}`);
  await repos.seed.push("origin", branch);
}

async function cloneOf(repos: Repos, name: string): Promise<string> {
  const clonePath = path.join(repos.tmpDir, name);
  await simpleGit().clone(repos.remotePath, clonePath);
  return clonePath;
}

describe("git operations (local bare remote)", () => {
  let repos: Repos;
  let clonePath: string;
  let gw: GitOperations;

  beforeAll(async () => {
    repos = await createRepos();
    await seedBranch(repos, "d2", "master", "login.txt", "login v2\n");
    await seedBranch(repos, "d3", "master", "feature.txt", "feature\n");
    await seedBranch(repos, "hotfix/r1-login", "master", "login.txt", "login v1 fixed\n");
    await repos.seed.tag(["d3-complete", "d3"]);
    await repos.seed.push("origin", "d3-complete");
    await repos.seed.tag(["hotfix/r1-{a,b}-complete", "hotfix/r1-login"]);
    await repos.seed.push("origin", "hotfix/r1-{a,b}-complete");

    clonePath = await cloneOf(repos, "clone");
    gw = new GitOperations(clonePath, { remote: "origin", identity: IDENTITY });
  });

  afterAll(() => {
    fs.rmSync(repos.tmpDir, { recursive: true, force: true });
  });

  it("lists remote branches by prefix", async () => {
    expect((await gw.listRemoteBranches("d")).sort()).toEqual(["d2", "d3"]);
    expect(await gw.listRemoteBranches("hotfix/")).toEqual(["hotfix/r1-login"]);
  });

  it("lists remote tags matching a pattern", async () => {
    const tags = await gw.listRemoteTags("d3-complete");
    expect(tags.map((t) => t.name)).toEqual(["d3-complete"]);
    expect(await gw.listRemoteTags("d2-complete")).toEqual([]);
  });

  it("looks up tags whose names contain braces literally", async () => {
    const tags = await gw.listRemoteTags("hotfix/r1-{a,b}-complete");
    expect(tags.map((t) => t.name)).toEqual(["hotfix/r1-{a,b}-complete"]);
  });

  it("trial merge reports a conflict and leaves no residue", async () => {
    await gw.checkout("hotfix/r1-login");
    const hotfixHead = await gw.currentHeadCommit();
    await gw.checkout("d2");
    const before = await gw.currentHeadCommit();

    const outcome = await gw.merge(hotfixHead, "d2", "trial-no-commit");

    expect(outcome).toEqual({ clean: false });
    expect(await gw.currentHeadCommit()).toBe(before);
    expect((await simpleGit(clonePath).status()).isClean()).toBe(true);
  });

  it("trial merge reports a clean merge without committing", async () => {
    await gw.checkout("hotfix/r1-login");
    const hotfixHead = await gw.currentHeadCommit();
    await gw.checkout("d3");
    const before = await gw.currentHeadCommit();

    expect(await gw.merge(hotfixHead, "d3", "trial-no-commit")).toEqual({ clean: true, commit: null });
    expect(await gw.currentHeadCommit()).toBe(before);
    expect((await simpleGit(clonePath).status()).isClean()).toBe(true);
  });

  it("cherry-picks cleanly and pushes", async () => {
    await gw.checkout("hotfix/r1-login");
    const hotfixHead = await gw.currentHeadCommit();
    const outcome = await gw.cherryPick(hotfixHead, "d3", "abort");
    expect(outcome.status).toBe("applied");
    await gw.push("d3");
    expect(await gw.currentHeadCommit("origin/d3")).toBe(await gw.currentHeadCommit("HEAD"));
  });

  it("keeps conflict markers when asked and reports unmerged paths", async () => {
    await gw.checkout("hotfix/r1-login");
    const hotfixHead = await gw.currentHeadCommit();
    await gw.createBranch("merge-hotfix-to-dev-t1", "d2");

    expect(await gw.cherryPick(hotfixHead, "merge-hotfix-to-dev-t1", "keep")).toEqual({ status: "conflict" });
    expect(await gw.diffUnmergedPaths()).toEqual(["login.txt"]);

    await gw.commitAll("WIP conflicts");
    await gw.push("merge-hotfix-to-dev-t1");
    expect(await gw.listRemoteBranches("merge-hotfix-to-dev-")).toEqual(["merge-hotfix-to-dev-t1"]);
  });

  it("wraps failures in GatewayError with the operation name", async () => {
    const err = await gw.checkout("no-such-branch").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GatewayError);
    expect(err instanceof GatewayError ? err.operation : null).toBe("checkout");
  });
});

describe("hotfix propagation against a real repository", () => {
  let repos: Repos;

  beforeEach(async () => {
    repos = await createRepos();
  });

  afterEach(() => {
    fs.rmSync(repos.tmpDir, { recursive: true, force: true });
  });

  it("propagating an already-applied hotfix again succeeds and leaves no cherry-pick in progress", async () => {
    await seedBranch(repos, "d2", "master", "feature.txt", "feature\n");
    await seedBranch(repos, "hotfix/r1-login", "master", "login.txt", "login v1 fixed\n");
    const hotfixHead = (await repos.seed.revparse(["hotfix/r1-login"])).trim();
    const clonePath = await cloneOf(repos, "clone");
    const resolver = new ConflictResolver(new GitOperations(clonePath, { identity: IDENTITY }));

    const first = await resolver.propagate(hotfixHead, "d2", "a");
    const second = await resolver.propagate(hotfixHead, "d2", "b");

    expect(first.status).toBe("applied");
    expect(second).toEqual(first);
    expect(fs.existsSync(path.join(clonePath, ".git", "CHERRY_PICK_HEAD"))).toBe(false);
    const remoteLog = await simpleGit(repos.remotePath).raw(["rev-list", "--count", "master..d2"]);
    expect(remoteLog.trim()).toBe("2");
  });

  it("pushes a resolution branch holding only repository files", async () => {
    await seedBranch(repos, "r1", "master", "release.txt", "r1\n");
    await seedBranch(repos, "d2", "master", "login.txt", "login v2\n");
    await seedBranch(repos, "hotfix/r1-login", "r1", "login.txt", "login v1 fixed\n");
    await repos.seed.tag(["hotfix/r1-login-complete", "hotfix/r1-login"]);
    await repos.seed.push("origin", "hotfix/r1-login-complete");
    const clonePath = await cloneOf(repos, "clone");
    fs.writeFileSync(path.join(clonePath, "notes.txt"), "scratch\n");

    const res = await handle({ branch: "hotfix/r1-login", runId: "t2", configDir: CONFIG_DIR, repoPath: clonePath });

    expect(res.exitCode).toBe(2);
    const tree = await simpleGit(repos.remotePath).raw(["ls-tree", "-r", "--name-only", "merge-hotfix-to-dev-t2"]);
    expect(tree).toBe("login.txt\n");
    expect(fs.existsSync(path.join(clonePath, ".git", "flowctl", "events.jsonl"))).toBe(true);
  });
});
