import { completionTagName } from "../branch/artifacts.js";
import type { ConflictReport } from "../types/action.js";

/** Copy-pasteable next steps carried in event payloads. */

export function tagCommand(branch: string, remote = "origin"): string {
  const tag = completionTagName(branch);
  return `git tag ${tag} ${remote}/${branch} && git push ${remote} ${tag}`;
}

export function conflictResolutionSteps(report: ConflictReport, remote = "origin"): string {
  const files = report.conflictingPaths.length > 0 ? report.conflictingPaths.join(" ") : "<conflicted files>";
  return [
    `git fetch ${remote} && git checkout ${report.resolutionBranch}`,
    `# resolve the conflict markers in: ${files}`,
    `git add -A && git commit -m "Resolve hotfix conflicts for ${report.targetBranch}"`,
    `git checkout ${report.targetBranch} && git merge --no-ff ${report.resolutionBranch} && git push ${remote} ${report.targetBranch}`,
  ].join("\n");
}

export function awaitReleaseSteps(parentRelease: string, remote = "origin"): string {
  return `Release ${parentRelease} is not complete; merge to master happens once it is tagged: ${tagCommand(parentRelease, remote)}`;
}

export function manualPropagationSteps(sourceCommit: string | null, targetDev: string | null, remote = "origin"): string {
  const target = targetDev ?? "<current development branch>";
  const commit = sourceCommit ?? "<hotfix head commit>";
  return `git fetch ${remote} && git checkout ${target} && git cherry-pick ${commit} && git push ${remote} ${target}`;
}

export function retrySteps(branch: string): string {
  return `Fix the failure above, then re-run: flowctl handle ${branch}`;
}
