import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { FlowEvent } from "../types/events.js";
import { loggers } from "../logging/logger.js";

/**
 * Hand-off point to the external messaging collaborator. The core calls
 * emit once per decision point, in order, and never batches or deduplicates.
 */
export interface EventNotifier {
  emit(event: FlowEvent): Promise<void>;
}

/** One JSON object per line, appended to a file or written to a stream. */
export class JsonlNotifier implements EventNotifier {
  constructor(private readonly target: string | NodeJS.WritableStream) {}

  async emit(event: FlowEvent): Promise<void> {
    const line = JSON.stringify(event) + "\n";
    if (typeof this.target === "string") {
      fs.mkdirSync(path.dirname(this.target), { recursive: true });
      fs.appendFileSync(this.target, line, "utf8");
      return;
    }
    const stream = this.target;
    await new Promise<void>((resolve, reject) => {
      stream.write(line, (err) => (err ? reject(err) : resolve()));
    });
  }
}

/** Routes events into the structured log; failures log at error level. */
export class LogNotifier implements EventNotifier {
  constructor(private readonly log: Logger = loggers.notify) {}

  async emit(event: FlowEvent): Promise<void> {
    if (event.kind === "ActionFailed" || event.kind === "PropagationFailed") {
      this.log.error({ event }, event.kind);
    } else if (event.kind === "ConflictDetected" || event.kind === "TagReminder") {
      this.log.warn({ event }, event.kind);
    } else {
      this.log.info({ event }, event.kind);
    }
  }
}

export class FanoutNotifier implements EventNotifier {
  private readonly targets: EventNotifier[];

  constructor(...targets: EventNotifier[]) {
    this.targets = targets;
  }

  async emit(event: FlowEvent): Promise<void> {
    for (const target of this.targets) {
      await target.emit(event);
    }
  }
}

/** Keeps events in memory; used for dry runs and tests. */
export class RecordingNotifier implements EventNotifier {
  readonly events: FlowEvent[] = [];

  async emit(event: FlowEvent): Promise<void> {
    this.events.push(event);
  }

  kinds(): string[] {
    return this.events.map((e) => e.kind);
  }
}
