/** Error taxonomy for branch promotion. `code` is stable and appears in events and JSONL output. */
export type FlowErrorCode =
  | "CLASSIFICATION_AMBIGUOUS"
  | "NO_COMPLETION_TAG"
  | "NO_RELEASE_BRANCH"
  | "NO_DEVELOPMENT_BRANCH"
  | "GATEWAY_FAILURE"
  | "FLOW_VIOLATION"
  | "REPOSITORY_LOCKED"
  | "CONFIG_ERROR";

export class FlowError extends Error {
  readonly code: FlowErrorCode;

  constructor(code: FlowErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FlowError";
    this.code = code;
  }
}

/** A hotfix could not be tied to any release line. */
export class NoReleaseBranchError extends FlowError {
  constructor(hotfixBranch: string) {
    super("NO_RELEASE_BRANCH", `No release branch (r<N>) found on the remote for '${hotfixBranch}'`);
    this.name = "NoReleaseBranchError";
  }
}

export class NoDevelopmentBranchError extends FlowError {
  constructor() {
    super("NO_DEVELOPMENT_BRANCH", "No development branch (d<N>) found on the remote");
    this.name = "NoDevelopmentBranchError";
  }
}

/** Any failed version-control command (network, auth, non-conflict merge failure). */
export class GatewayError extends FlowError {
  readonly operation: string;
  readonly detail: string;

  constructor(operation: string, detail: string, cause?: unknown) {
    super("GATEWAY_FAILURE", `${operation} failed: ${detail}`, { cause });
    this.name = "GatewayError";
    this.operation = operation;
    this.detail = detail;
  }
}

/** A merge that would bypass the promotion lifecycle. */
export class FlowViolationError extends FlowError {
  constructor(reason: string) {
    super("FLOW_VIOLATION", reason);
    this.name = "FlowViolationError";
  }
}

export class RepositoryLockedError extends FlowError {
  constructor(lockPath: string) {
    super("REPOSITORY_LOCKED", `Another promotion is running against this repository (lock: ${lockPath})`);
    this.name = "RepositoryLockedError";
  }
}

export class ConfigError extends FlowError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
