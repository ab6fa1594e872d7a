import { PromotionEngine } from "../core/promotion-engine.js";
import { withRepositoryLock } from "../core/repo-lock.js";
import { resolveRunId } from "../core/run-id.js";
import type { ActionResult } from "../types/action.js";
import { FlowError, errorMessage } from "../types/errors.js";
import { loggers } from "../logging/logger.js";
import { createContext, type CommandDeps, type CommandOpts } from "./context.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

const log = loggers.cli;

export type HandleOpts = CommandOpts & {
  branch: string;
  runId?: string;
};

export type HandleResult =
  | { ok: true; runId: string; result: ActionResult; exitCode: ExitCode }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

/**
 * Process one branch event: lock the repository, then classify, gate and
 * promote. Events go to the configured notifier as they happen.
 */
export async function handle(opts: HandleOpts, deps: CommandDeps = {}): Promise<HandleResult> {
  try {
    const ctx = createContext(opts, deps);
    const runId = resolveRunId(opts.runId);
    const engine = new PromotionEngine(ctx.gateway, ctx.notifier, {
      runId,
      remote: ctx.config.remote,
      clock: deps.clock,
    });

    log.info({ branch: opts.branch, runId }, "handling branch event");
    const result = await withRepositoryLock(ctx.repoPath, () => engine.handle(opts.branch), ctx.config.lock);
    return { ok: true, runId, result, exitCode: exitCodeFor(result.status) };
  } catch (e) {
    if (!(e instanceof FlowError)) throw e;
    const exitCode =
      e.code === "REPOSITORY_LOCKED" ? EXIT.REPOSITORY_LOCKED
      : e.code === "CONFIG_ERROR" ? EXIT.INVALID_ARGS
      : EXIT.ACTION_FAILED;
    log.error({ branch: opts.branch, code: e.code, err: errorMessage(e) }, "branch event not handled");
    return { ok: false, error: { code: e.code, message: e.message }, exitCode };
  }
}
