/**
 * Event logger — append-only JSONL event log, one file per day.
 *
 * Used for structured tool-input/tool-output records. Events are
 * `{ eventId, type, timestamp, actor, payload }`.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

export type SessionEventType =
  | "tool.input"
  | "tool.output"
  | "context.pinned"
  | "context.cleared"
  | "operation.supervised";

export interface SessionEvent {
  eventId: number;
  type: SessionEventType;
  timestamp: string;
  actor: string;
  payload: Record<string, unknown>;
}

export type EventCallback = (event: SessionEvent) => void;

export interface EventLoggerOptions {
  /** Called after each event is written. */
  onEvent?: EventCallback;
  now?: () => Date;
}

export class EventLogger {
  private eventId = 0;
  private dirReady?: Promise<string | undefined>;
  private readonly onEvent?: EventCallback;
  private readonly now: () => Date;

  constructor(private readonly eventsDir: string, options: EventLoggerOptions = {}) {
    this.onEvent = options.onEvent;
    this.now = options.now ?? (() => new Date());
  }

  async log(type: SessionEventType, actor: string, payload: Record<string, unknown> = {}): Promise<SessionEvent> {
    const now = this.now();
    this.eventId += 1;
    const event: SessionEvent = {
      eventId: this.eventId,
      type,
      timestamp: now.toISOString(),
      actor,
      payload,
    };

    this.dirReady ??= mkdir(this.eventsDir, { recursive: true });
    await this.dirReady;
    const file = join(this.eventsDir, `${event.timestamp.slice(0, 10)}.jsonl`);
    await appendFile(file, `${JSON.stringify(event)}\n`, "utf-8");

    this.onEvent?.(event);
    return event;
  }

  async logToolInput(tool: string, actor: string, args: Record<string, unknown>): Promise<SessionEvent> {
    return this.log("tool.input", actor, { tool, arguments: args });
  }

  async logToolOutput(tool: string, actor: string, result: unknown): Promise<SessionEvent> {
    return this.log("tool.output", actor, { tool, result });
  }
}
