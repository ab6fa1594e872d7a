import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { GitOperations } from "../git/operations.js";
import type { VcsGateway } from "../git/gateway.js";
import { FanoutNotifier, JsonlNotifier, LogNotifier, type EventNotifier } from "../notify/notifier.js";
import type { FlowConfig } from "../types/config.js";
import { ConfigError } from "../types/errors.js";
import { setLogLevel } from "../logging/logger.js";
import { stateDirFor } from "../core/repo-lock.js";

export type CommandOpts = {
  configDir?: string;
  env?: string;
  repoPath?: string;
  eventsFile?: string;
};

/** Collaborators a command may be given instead of building its own. */
export type CommandDeps = {
  gateway?: VcsGateway;
  notifier?: EventNotifier;
  clock?: () => Date;
};

export type CommandContext = {
  config: FlowConfig;
  repoPath: string;
  gateway: VcsGateway;
  notifier: EventNotifier;
};

/** Load and validate config, then wire the gateway and notifier a command runs against. */
export function createContext(opts: CommandOpts, deps: CommandDeps = {}): CommandContext {
  const checked = validateConfig(loadConfig(opts.env, opts.configDir));
  if (!checked.valid) throw new ConfigError(`Invalid configuration: ${checked.errors}`);
  const config = checked.config;
  if (config.log_level) setLogLevel(config.log_level);

  const repoPath = path.resolve(opts.repoPath ?? process.cwd());
  const gateway = deps.gateway ?? new GitOperations(repoPath, { remote: config.remote, identity: config.identity });

  const notifier = deps.notifier ?? buildNotifier(repoPath, opts.eventsFile, config.events_file);

  return { config, repoPath, gateway, notifier };
}

/**
 * `--events` paths resolve against the clone; a relative `events_file` from
 * config resolves against the clone's .git directory, outside the worktree.
 */
function eventsTarget(repoPath: string, fromOption: string | undefined, fromConfig: string | undefined): string | undefined {
  if (fromOption !== undefined) return fromOption === "-" ? fromOption : path.resolve(repoPath, fromOption);
  if (fromConfig !== undefined) return fromConfig === "-" ? fromConfig : path.resolve(stateDirFor(repoPath), fromConfig);
  return undefined;
}

function buildNotifier(repoPath: string, fromOption: string | undefined, fromConfig: string | undefined): EventNotifier {
  const target = eventsTarget(repoPath, fromOption, fromConfig);
  if (target === undefined) return new LogNotifier();
  return new FanoutNotifier(new LogNotifier(), new JsonlNotifier(target === "-" ? process.stdout : target));
}
