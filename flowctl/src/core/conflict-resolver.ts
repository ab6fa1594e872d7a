import type { VcsGateway } from "../git/gateway.js";
import type { ConflictReport, PropagationResult } from "../types/action.js";
import { GatewayError } from "../types/errors.js";
import { resolutionBranchName } from "../branch/artifacts.js";
import { loggers } from "../logging/logger.js";

const log = loggers.resolver;

/**
 * Conflict detector and resolver. Carries one commit onto a branch.
 *
 * 1. Check out the target at its remote tip
 * 2. Trial merge (never committed, always reverted) to detect conflicts
 * 3. Clean → cherry-pick and push; a change the target already has is
 *    reported as applied at the unchanged tip, so re-runs are harmless
 * 4. Conflicted → seed `merge-hotfix-to-dev-{runId}` with the conflicted
 *    cherry-pick, commit it as-is and push it for a human to finish
 *
 * Gateway failures come back as `failed`; nothing is retried. Stateless apart from runId.
 */
export class ConflictResolver {
  constructor(private readonly gateway: VcsGateway) {}

  async propagate(sourceCommit: string, targetBranch: string, runId: string): Promise<PropagationResult> {
    try {
      await this.gateway.checkout(targetBranch);
      const trial = await this.gateway.merge(sourceCommit, targetBranch, "trial-no-commit");

      if (trial.clean) {
        const picked = await this.gateway.cherryPick(sourceCommit, targetBranch, "abort");
        if (picked.status === "empty") {
          log.info({ sourceCommit, targetBranch, commit: picked.commit }, "hotfix already present");
          return { status: "applied", targetBranch, commit: picked.commit };
        }
        if (picked.status === "applied") {
          await this.gateway.push(targetBranch);
          log.info({ sourceCommit, targetBranch, commit: picked.commit }, "hotfix applied");
          return { status: "applied", targetBranch, commit: picked.commit };
        }
        log.warn({ sourceCommit, targetBranch }, "trial merge was clean but cherry-pick conflicted");
      }

      const report = await this.materializeResolution(sourceCommit, targetBranch, runId);
      log.warn({ report }, "conflict detected, resolution branch pushed");
      return { status: "conflict", report };
    } catch (e) {
      if (!(e instanceof GatewayError)) throw e;
      log.error({ sourceCommit, targetBranch, operation: e.operation, err: e.detail }, "propagation failed");
      return { status: "failed", targetBranch, error: { operation: e.operation, message: e.message } };
    }
  }

  private async materializeResolution(sourceCommit: string, targetBranch: string, runId: string): Promise<ConflictReport> {
    const resolutionBranch = resolutionBranchName(runId);
    await this.gateway.createBranch(resolutionBranch, targetBranch);

    // Expected to conflict; the markers stay in the tree as the human's starting point.
    await this.gateway.cherryPick(sourceCommit, resolutionBranch, "keep");
    const conflictingPaths = await this.gateway.diffUnmergedPaths();

    await this.gateway.commitAll(
      `WIP: unresolved conflicts cherry-picking ${sourceCommit} onto ${targetBranch}`,
    );
    await this.gateway.push(resolutionBranch);

    return {
      sourceRef: sourceCommit,
      targetBranch,
      conflictingPaths: [...new Set(conflictingPaths)].sort(),
      resolutionBranch,
    };
  }
}
