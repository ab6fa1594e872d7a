import { PromotionEngine, type PromotionPlan } from "../core/promotion-engine.js";
import { promotesTo } from "../core/state-machine.js";
import { isRepositoryLocked } from "../core/repo-lock.js";
import { FlowError } from "../types/errors.js";
import { createContext, type CommandDeps, type CommandOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type PlanResult =
  /** locked: another promotion currently holds the repository lock; handle would exit 4. */
  | { ok: true; plan: PromotionPlan; promotesTo: string | null; locked: boolean }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

/** Show what `handle` would do for a branch without changing anything. */
export async function plan(opts: CommandOpts & { branch: string }, deps: CommandDeps = {}): Promise<PlanResult> {
  try {
    const ctx = createContext(opts, deps);
    const engine = new PromotionEngine(ctx.gateway, ctx.notifier, { runId: "plan", remote: ctx.config.remote });
    const result = await engine.plan(opts.branch);
    const locked = await isRepositoryLocked(ctx.repoPath);
    return { ok: true, plan: result, promotesTo: promotesTo(result.descriptor.kind), locked };
  } catch (e) {
    if (!(e instanceof FlowError)) throw e;
    const exitCode = e.code === "CONFIG_ERROR" ? EXIT.INVALID_ARGS : EXIT.ACTION_FAILED;
    return { ok: false, error: { code: e.code, message: e.message }, exitCode };
  }
}

export function formatPlan(result: PromotionPlan, target: string | null, locked = false): string[] {
  const d = result.descriptor;
  const lines = [`branch:    ${d.rawName} (${d.kind}${d.sequenceId !== undefined ? ` #${d.sequenceId}` : ""})`];
  if (target) lines.push(`promotes:  ${target}`);
  if (result.gated) lines.push(`complete:  ${result.complete ? "yes" : "no"}`);
  if (result.parentRelease) lines.push(`release:   ${result.parentRelease}`);
  if (result.currentDev) lines.push(`dev:       ${result.currentDev}`);
  lines.push(`action:    ${result.action.type}${result.action.type === "noop" ? ` (${result.action.reason})` : ""}`);
  if (result.nextStep) lines.push(`next:      ${result.nextStep}`);
  if (result.error) lines.push(`error:     ${result.error.code}: ${result.error.message}`);
  if (locked) lines.push("lock:      held by another promotion; handle would exit without acting");
  return lines;
}
