import fs from "node:fs";
import path from "node:path";
import { lock, check } from "proper-lockfile";
import { RepositoryLockedError } from "../types/errors.js";
import type { LockConfig } from "../types/config.js";

export const LOCK_FILE = "flowctl.lock";

const DEFAULT_LOCK: LockConfig = { stale_ms: 10 * 60 * 1000, retries: 0 };

/** Where flowctl keeps its own files: the clone's .git directory, so nothing it writes is ever committed. */
export function stateDirFor(repoPath: string): string {
  const gitDir = path.join(repoPath, ".git");
  return fs.existsSync(gitDir) && fs.statSync(gitDir).isDirectory() ? gitDir : repoPath;
}

export function lockPathFor(repoPath: string): string {
  return path.join(stateDirFor(repoPath), LOCK_FILE);
}

function ensureFileExists(filePath: string): void {
  if (!fs.existsSync(filePath)) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "");
  }
}

function isLockHeld(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ELOCKED";
}

/**
 * Run operation while holding the repository lock: at most one promotion
 * action touches a working tree at a time, across processes.
 */
export async function withRepositoryLock<T>(
  repoPath: string,
  operation: () => Promise<T>,
  config: LockConfig = DEFAULT_LOCK,
): Promise<T> {
  const lockPath = lockPathFor(repoPath);
  ensureFileExists(lockPath);

  let release: () => Promise<void>;
  try {
    release = await lock(lockPath, { stale: config.stale_ms, retries: config.retries });
  } catch (e) {
    if (isLockHeld(e)) throw new RepositoryLockedError(lockPath);
    throw e;
  }

  try {
    return await operation();
  } finally {
    await release();
  }
}

export async function isRepositoryLocked(repoPath: string): Promise<boolean> {
  const lockPath = lockPathFor(repoPath);
  if (!fs.existsSync(lockPath)) return false;
  return check(lockPath);
}
