/** Layered config (base.yaml ← {env}.yaml ← FLOWCTL_* variables). */
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type LockConfig = {
  /** Lock considered stale after this many ms. */
  stale_ms: number;
  retries: number;
};

export type IdentityConfig = {
  name: string;
  email: string;
};

export type FlowConfig = {
  schema_version: string;
  remote: string;
  /** JSONL file the notifier appends events to, relative to the clone's .git directory; "-" for stdout. */
  events_file?: string;
  log_level?: LogLevel;
  lock?: LockConfig;
  identity?: IdentityConfig;
};
