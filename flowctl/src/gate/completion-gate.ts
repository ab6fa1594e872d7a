import { classify, highestSequence, releaseBranchName } from "../branch/naming.js";
import { completionTagName, completionTarget } from "../branch/artifacts.js";
import type { BranchDescriptor, CompletionTag, ResolvedRelease } from "../types/branch.js";
import { NoDevelopmentBranchError, NoReleaseBranchError } from "../types/errors.js";
import type { VcsGateway } from "../git/gateway.js";
import { loggers } from "../logging/logger.js";

const log = loggers.gate;

/**
 * Look up the completion marker for a branch. Always asks the remote; a tag
 * pushed moments ago must be visible to the next event.
 */
export async function findCompletionTag(
  descriptor: BranchDescriptor,
  gateway: VcsGateway,
): Promise<CompletionTag | null> {
  const expected = completionTagName(descriptor.rawName);
  const tags = await gateway.listRemoteTags(expected);
  const match = tags.find((t) => t.name === expected);
  if (!match) return null;
  return { targetBranch: completionTarget(match.name) ?? descriptor.rawName, tagName: match.name, createdAt: match.createdAt };
}

/** Master is never gated; every other branch needs `{name}-complete` on the remote. */
export async function isComplete(descriptor: BranchDescriptor, gateway: VcsGateway): Promise<boolean> {
  switch (descriptor.kind) {
    case "master":
      return true;
    case "development":
    case "release":
    case "hotfix":
    case "unknown": {
      const tag = await findCompletionTag(descriptor, gateway);
      log.debug({ branch: descriptor.rawName, complete: tag !== null }, "completion gate checked");
      return tag !== null;
    }
  }
}

async function remoteDescriptors(gateway: VcsGateway, prefix: string, kind: BranchDescriptor["kind"]): Promise<BranchDescriptor[]> {
  const names = await gateway.listRemoteBranches(prefix);
  return names.map(classify).filter((d) => d.kind === kind);
}

/**
 * Resolve the release line a hotfix belongs to.
 *
 * The `r<N>` token in the hotfix name wins when that release exists on the
 * remote; otherwise the highest-numbered release branch is used.
 */
export async function resolveParentRelease(
  descriptor: BranchDescriptor,
  gateway: VcsGateway,
): Promise<ResolvedRelease> {
  const releases = await remoteDescriptors(gateway, "r", "release");

  if (descriptor.parentReleaseId !== undefined) {
    const named = releaseBranchName(descriptor.parentReleaseId);
    if (releases.some((r) => r.rawName === named)) {
      return Object.freeze({ branch: named, releaseId: descriptor.parentReleaseId, source: "name" });
    }
    log.warn({ hotfix: descriptor.rawName, named }, "release named by hotfix not found on remote, falling back");
  }

  const latest = highestSequence(releases);
  if (latest === null || latest.sequenceId === undefined) {
    throw new NoReleaseBranchError(descriptor.rawName);
  }
  return Object.freeze({ branch: latest.rawName, releaseId: latest.sequenceId, source: "fallback" });
}

/** The development branch with the highest sequence id on the remote. */
export async function resolveCurrentDevBranch(gateway: VcsGateway): Promise<BranchDescriptor> {
  const latest = highestSequence(await remoteDescriptors(gateway, "d", "development"));
  if (latest === null) throw new NoDevelopmentBranchError();
  return latest;
}
