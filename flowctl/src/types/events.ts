import type { BranchKind } from "./branch.js";
import type { ConflictReport } from "./action.js";

/** Fields every emitted event carries. */
export type EventEnvelope = {
  runId: string;
  occurredAt: string;
};

export type TagReminderEvent = {
  kind: "TagReminder";
  branchKind: BranchKind;
  branchName: string;
  tagCommandText: string;
};

export type ReleaseCreatedEvent = {
  kind: "ReleaseCreated";
  fromDev: string;
  newRelease: string;
};

export type ReleaseDeployedEvent = {
  kind: "ReleaseDeployed";
  releaseBranch: string;
  tagName: string;
};

export type AwaitingReleaseCompletionEvent = {
  kind: "AwaitingReleaseCompletion";
  parentRelease: string;
  nextStep: string;
};

export type HotfixPropagatedEvent = {
  kind: "HotfixPropagated";
  targetDev: string;
  commit: string;
};

export type ConflictDetectedEvent = {
  kind: "ConflictDetected";
  report: ConflictReport;
  nextStep: string;
};

export type PropagationFailedEvent = {
  kind: "PropagationFailed";
  targetDev: string | null;
  error: { code: string; operation?: string; message: string };
  nextStep: string;
};

/** Main-path failure (anything other than hotfix-to-dev propagation). */
export type ActionFailedEvent = {
  kind: "ActionFailed";
  branchName: string;
  action: string;
  error: { code: string; operation?: string; message: string };
  nextStep: string;
};

export type FlowEventBody =
  | TagReminderEvent
  | ReleaseCreatedEvent
  | ReleaseDeployedEvent
  | AwaitingReleaseCompletionEvent
  | HotfixPropagatedEvent
  | ConflictDetectedEvent
  | PropagationFailedEvent
  | ActionFailedEvent;

export type FlowEventKind = FlowEventBody["kind"];

export type FlowEvent = EventEnvelope & FlowEventBody;
