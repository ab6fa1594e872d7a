#!/usr/bin/env node

import { Command } from "commander";
import { classify } from "./branch/naming.js";
import { handle } from "./commands/handle.js";
import { plan, formatPlan } from "./commands/plan.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";

type Format = "human" | "jsonl";

type CommonOpts = {
  config?: string;
  env?: string;
  repo?: string;
  format: Format;
};

const program = new Command();

program
  .name("flowctl")
  .description("Promote d<N> → r<N> → master and carry hotfixes back into development")
  .version("0.1.0");

function writeJsonl(value: unknown): void {
  process.stdout.write(JSON.stringify(value) + "\n");
}

program
  .command("handle")
  .description("Handle a branch event: check the completion tag and run the next promotion step")
  .argument("<branch>", "Branch that received commits or a completion tag")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--repo <path>", "Path to the local clone", ".")
  .option("--run-id <id>", "Pipeline run id (default: $FLOWCTL_RUN_ID, $BUILD_NUMBER, or generated)")
  .option("--events <path>", "Append events as JSONL to this file ('-' for stdout)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (branch: string, opts: CommonOpts & { runId?: string; events?: string }) => {
    const res = await handle({
      branch,
      configDir: opts.config,
      env: opts.env,
      repoPath: opts.repo,
      runId: opts.runId,
      eventsFile: opts.events,
    });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        writeJsonl({ level: "error", code: res.error.code, message: res.error.message });
      } else {
        console.error(res.error.message);
      }
      process.exit(res.exitCode);
    }

    if (opts.format === "jsonl") {
      writeJsonl({ level: "info", runId: res.runId, ...res.result });
    } else {
      const action = res.result.action ? res.result.action.type : "none";
      console.log(`${res.result.branch}: ${res.result.status} (action: ${action}, run: ${res.runId})`);
      if (res.result.error) console.error(res.result.error.message);
    }
    process.exitCode = res.exitCode;
  });

program
  .command("plan")
  .description("Show what handle would do for a branch, without changing anything")
  .argument("<branch>", "Branch name")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--repo <path>", "Path to the local clone", ".")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (branch: string, opts: CommonOpts) => {
    const res = await plan({ branch, configDir: opts.config, env: opts.env, repoPath: opts.repo });
    if (!res.ok) {
      if (opts.format === "jsonl") {
        writeJsonl({ level: "error", code: res.error.code, message: res.error.message });
      } else {
        console.error(res.error.message);
      }
      process.exit(res.exitCode);
    }

    if (opts.format === "jsonl") {
      writeJsonl({ ...res.plan, promotesTo: res.promotesTo, locked: res.locked });
    } else {
      for (const line of formatPlan(res.plan, res.promotesTo, res.locked)) console.log(line);
    }
  });

program
  .command("classify")
  .description("Print how a branch name is classified")
  .argument("<branch>", "Branch name")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((branch: string, opts: { format: Format }) => {
    const descriptor = classify(branch);
    if (opts.format === "jsonl") {
      writeJsonl(descriptor);
      return;
    }
    const seq = descriptor.sequenceId !== undefined ? ` #${descriptor.sequenceId}` : "";
    const parent = descriptor.parentReleaseId !== undefined ? ` (release r${descriptor.parentReleaseId})` : "";
    console.log(`${descriptor.rawName}: ${descriptor.kind}${seq}${parent}`);
  });

program
  .command("validate")
  .description("Validate configuration")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: { config?: string; env?: string; format: Format }) => {
    const res = validateAll({ configDir: opts.config, env: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) writeJsonl(err);
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      writeJsonl({ level: "info", code: "OK", message: "OK" });
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
