import type { VcsGateway } from "../git/gateway.js";
import type { EventNotifier } from "../notify/notifier.js";
import type { BranchDescriptor } from "../types/branch.js";
import type { ActionResult, PromotionAction, PropagationResult } from "../types/action.js";
import type { FlowEventBody } from "../types/events.js";
import { FlowError, FlowViolationError, GatewayError } from "../types/errors.js";
import { MASTER_BRANCH, classify } from "../branch/naming.js";
import { hotfixTagName, releaseTagName } from "../branch/artifacts.js";
import { isComplete, resolveCurrentDevBranch, resolveParentRelease } from "../gate/completion-gate.js";
import { checkMergeAllowed } from "../git/branch-guard.js";
import { afterHotfixMerged, isGated, primaryAction, releaseFor, selectAction } from "./state-machine.js";
import { ConflictResolver } from "./conflict-resolver.js";
import {
  awaitReleaseSteps,
  conflictResolutionSteps,
  manualPropagationSteps,
  retrySteps,
  tagCommand,
} from "../notify/instructions.js";
import { loggers } from "../logging/logger.js";

const log = loggers.engine;

export type PromotionEngineOptions = {
  /** Distinct per pipeline execution; names resolution branches. */
  runId: string;
  remote?: string;
  clock?: () => Date;
};

type ErrorInfo = { code: string; operation?: string; message: string };

export type PromotionPlan = {
  descriptor: BranchDescriptor;
  gated: boolean;
  complete: boolean;
  action: PromotionAction;
  parentRelease?: string;
  currentDev?: string;
  nextStep?: string;
  error?: ErrorInfo;
};

function errorInfo(e: FlowError): ErrorInfo {
  return e instanceof GatewayError
    ? { code: e.code, operation: e.operation, message: e.message }
    : { code: e.code, message: e.message };
}

/**
 * Promotion engine: executes the one action a branch event calls for.
 *
 * Every Gateway call is awaited in sequence; sub-steps that succeeded stay in
 * place when a later one fails. The caller serializes engines per repository.
 */
export class PromotionEngine {
  private readonly resolver: ConflictResolver;
  private readonly runId: string;
  private readonly remote: string;
  private readonly clock: () => Date;

  constructor(
    private readonly gateway: VcsGateway,
    private readonly notifier: EventNotifier,
    opts: PromotionEngineOptions,
  ) {
    this.resolver = new ConflictResolver(gateway);
    this.runId = opts.runId;
    this.remote = opts.remote ?? "origin";
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Handle one branch event end to end. */
  async handle(branchName: string): Promise<ActionResult> {
    const descriptor = classify(branchName);

    if (!isGated(descriptor.kind)) {
      const action = selectAction(descriptor, true);
      log.info({ branch: branchName, kind: descriptor.kind, action }, "nothing to promote");
      return { status: "noop", branch: branchName, action };
    }

    let current: PromotionAction | null = null;
    try {
      await this.gateway.fetchAll();
      if (!(await isComplete(descriptor, this.gateway))) {
        await this.emit({
          kind: "TagReminder",
          branchKind: descriptor.kind,
          branchName,
          tagCommandText: tagCommand(branchName, this.remote),
        });
        return { status: "gate_closed", branch: branchName, action: null };
      }

      switch (descriptor.kind) {
        case "development":
          current = selectAction(descriptor, true);
          await this.createRelease(descriptor);
          return { status: "completed", branch: branchName, action: current };
        case "release":
          current = selectAction(descriptor, true);
          await this.mergeToMaster(branchName);
          return { status: "completed", branch: branchName, action: current };
        case "hotfix":
          return await this.propagateHotfix(descriptor);
        case "master":
        case "unknown":
          return { status: "noop", branch: branchName, action: selectAction(descriptor, true) };
      }
    } catch (e) {
      if (!(e instanceof FlowError)) throw e;
      const error = errorInfo(e);
      log.error({ branch: branchName, error }, "promotion failed");
      await this.emit({
        kind: "ActionFailed",
        branchName,
        action: current?.type ?? primaryAction(descriptor.kind),
        error,
        nextStep: this.nextStepFor(e, branchName),
      });
      return { status: "failed", branch: branchName, action: current, error };
    }
  }

  /**
   * Read-only preview of what handle() would do. Issues only queries; emits nothing.
   */
  async plan(branchName: string): Promise<PromotionPlan> {
    const descriptor = classify(branchName);
    if (!isGated(descriptor.kind)) {
      return { descriptor, gated: false, complete: true, action: selectAction(descriptor, true) };
    }

    const complete = await isComplete(descriptor, this.gateway);
    const plan: PromotionPlan = { descriptor, gated: true, complete, action: selectAction(descriptor, complete) };
    if (!complete) {
      return { ...plan, nextStep: tagCommand(branchName, this.remote) };
    }

    if (descriptor.kind === "hotfix") {
      try {
        const parent = await resolveParentRelease(descriptor, this.gateway);
        plan.parentRelease = parent.branch;
        plan.action = selectAction(descriptor, true, parent.branch);
        plan.currentDev = (await resolveCurrentDevBranch(this.gateway)).rawName;
      } catch (e) {
        if (!(e instanceof FlowError)) throw e;
        plan.error = errorInfo(e);
      }
    }
    return plan;
  }

  private nextStepFor(e: FlowError, branch: string): string {
    switch (e.code) {
      case "NO_RELEASE_BRANCH":
        return `Create the release branch this hotfix targets (git push ${this.remote} <commit>:refs/heads/r<N>), then re-run: flowctl handle ${branch}`;
      default:
        return retrySteps(branch);
    }
  }

  private async emit(body: FlowEventBody): Promise<void> {
    await this.notifier.emit({ runId: this.runId, occurredAt: this.clock().toISOString(), ...body });
  }

  private async createRelease(dev: BranchDescriptor): Promise<void> {
    const release = releaseFor(dev);
    if (release === null) throw new FlowViolationError(`'${dev.rawName}' cannot be released`);

    const existing = await this.gateway.listRemoteBranches(release);
    if (existing.includes(release)) {
      throw new FlowViolationError(`Release branch '${release}' already exists on ${this.remote}; '${dev.rawName}' was released before`);
    }

    await this.gateway.createBranch(release, dev.rawName);
    await this.gateway.push(release);
    log.info({ from: dev.rawName, release }, "release branch created");
    await this.emit({ kind: "ReleaseCreated", fromDev: dev.rawName, newRelease: release });
  }

  private async mergeChecked(source: string, target: string): Promise<void> {
    const guard = checkMergeAllowed(source, target);
    if (!guard.allowed) throw new FlowViolationError(guard.reason ?? `Merge from '${source}' into '${target}' is forbidden`);

    const outcome = await this.gateway.merge(source, target, "no-fast-forward");
    if (!outcome.clean) {
      throw new GatewayError("merge", `'${source}' does not merge cleanly into '${target}'; the merge was aborted`);
    }
    await this.gateway.push(target);
  }

  /** Tag the release head, merge it into master, push. Returns the release tag. */
  private async mergeToMaster(release: string): Promise<string> {
    const tagName = releaseTagName(release, this.clock());
    await this.gateway.tag(tagName, release, `Release ${release}`);
    await this.gateway.push(tagName);
    await this.mergeChecked(release, MASTER_BRANCH);
    log.info({ release, tagName }, "release merged to master");
    await this.emit({ kind: "ReleaseDeployed", releaseBranch: release, tagName });
    return tagName;
  }

  /**
   * Hotfix dual propagation:
   * 1. tag the hotfix head (fatal on failure)
   * 2. merge into the parent release and push
   * 3. ship the release now if it is already complete, else wait for its tag
   * 4. cherry-pick into the current development branch, regardless of 2–3
   */
  private async propagateHotfix(hotfix: BranchDescriptor): Promise<ActionResult> {
    const parent = await resolveParentRelease(hotfix, this.gateway);
    const action = selectAction(hotfix, true, parent.branch);
    log.info({ hotfix: hotfix.rawName, parent }, "propagating hotfix");

    await this.gateway.checkout(hotfix.rawName);
    const sourceCommit = await this.gateway.currentHeadCommit();
    const shipTag = hotfixTagName(hotfix.rawName, this.clock());
    await this.gateway.tag(shipTag, hotfix.rawName, `Hotfix ${hotfix.rawName}`);
    await this.gateway.push(shipTag);

    let releasePath: ActionResult["releasePath"];
    let failure: ErrorInfo | undefined;
    try {
      await this.mergeChecked(hotfix.rawName, parent.branch);
      const next = afterHotfixMerged(parent.branch, await isComplete(classify(parent.branch), this.gateway));
      if (next.type === "merge_to_master") {
        await this.mergeToMaster(parent.branch);
        releasePath = "merged_to_master";
      } else {
        await this.emit({
          kind: "AwaitingReleaseCompletion",
          parentRelease: parent.branch,
          nextStep: awaitReleaseSteps(parent.branch, this.remote),
        });
        releasePath = "awaiting_release_completion";
      }
    } catch (e) {
      if (!(e instanceof FlowError)) throw e;
      failure = errorInfo(e);
      releasePath = "failed";
      log.error({ hotfix: hotfix.rawName, parent: parent.branch, error: failure }, "hotfix did not reach its release line");
      await this.emit({
        kind: "ActionFailed",
        branchName: hotfix.rawName,
        action: action.type,
        error: failure,
        nextStep: retrySteps(hotfix.rawName),
      });
    }

    const propagation = await this.propagateToDevelopment(sourceCommit);

    const status =
      failure !== undefined || propagation.status === "failed"
        ? "failed"
        : propagation.status === "conflict"
          ? "attention_required"
          : "completed";
    return {
      status,
      branch: hotfix.rawName,
      action,
      releasePath,
      propagation,
      ...(failure ? { error: failure } : {}),
    };
  }

  private async propagateToDevelopment(sourceCommit: string): Promise<PropagationResult> {
    let targetDev: string;
    try {
      targetDev = (await resolveCurrentDevBranch(this.gateway)).rawName;
    } catch (e) {
      if (!(e instanceof FlowError)) throw e;
      const error = errorInfo(e);
      await this.emit({
        kind: "PropagationFailed",
        targetDev: null,
        error,
        nextStep: manualPropagationSteps(sourceCommit, null, this.remote),
      });
      return { status: "failed", targetBranch: null, error: { operation: error.operation ?? "resolve-current-dev", message: error.message } };
    }

    const result = await this.resolver.propagate(sourceCommit, targetDev, this.runId);
    switch (result.status) {
      case "applied":
        await this.emit({ kind: "HotfixPropagated", targetDev, commit: result.commit });
        break;
      case "conflict":
        await this.emit({
          kind: "ConflictDetected",
          report: result.report,
          nextStep: conflictResolutionSteps(result.report, this.remote),
        });
        break;
      case "failed":
        await this.emit({
          kind: "PropagationFailed",
          targetDev,
          error: { code: "GATEWAY_FAILURE", ...result.error },
          nextStep: manualPropagationSteps(sourceCommit, targetDev, this.remote),
        });
        break;
    }
    return result;
  }
}
