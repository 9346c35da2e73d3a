/**
 * Tests for the session event logger.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { EventLogger } from "../logger.js";
import { findEvents, readEventLogEntries } from "../../testing/event-log-reader.js";

describe("EventLogger", () => {
  let eventsDir: string;

  beforeEach(() => {
    eventsDir = join(tmpdir(), `session-test-events-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  });

  afterEach(async () => {
    await rm(eventsDir, { recursive: true, force: true });
  });

  it("appends events to the day's JSONL file", async () => {
    const logger = new EventLogger(eventsDir, { now: () => new Date("2026-03-01T09:30:00.000Z") });

    await logger.logToolInput("read_project", "MCP Server", { projectId: 1 });
    await logger.logToolOutput("read_project", "MCP Server", { success: true });

    const lines = (await readFile(join(eventsDir, "2026-03-01.jsonl"), "utf-8")).trim().split("\n");
    expect(lines.map(line => JSON.parse(line))).toEqual([
      {
        eventId: 1,
        type: "tool.input",
        timestamp: "2026-03-01T09:30:00.000Z",
        actor: "MCP Server",
        payload: { tool: "read_project", arguments: { projectId: 1 } },
      },
      {
        eventId: 2,
        type: "tool.output",
        timestamp: "2026-03-01T09:30:00.000Z",
        actor: "MCP Server",
        payload: { tool: "read_project", result: { success: true } },
      },
    ]);
  });

  it("starts a new file each day", async () => {
    let now = new Date("2026-03-01T23:59:59.000Z");
    const logger = new EventLogger(eventsDir, { now: () => now });

    await logger.log("context.pinned", "agent", { domain: "project" });
    now = new Date("2026-03-02T00:00:01.000Z");
    await logger.log("context.cleared", "agent", { domain: "project" });

    const entries = await readEventLogEntries(eventsDir);
    expect(entries.map(e => [e.eventId, e.type, e.timestamp.slice(0, 10)])).toEqual([
      [1, "context.pinned", "2026-03-01"],
      [2, "context.cleared", "2026-03-02"],
    ]);
    expect(findEvents(entries, "context.cleared")).toHaveLength(1);
  });

  it("notifies the callback after writing", async () => {
    const onEvent = vi.fn();
    const logger = new EventLogger(eventsDir, { onEvent });

    const event = await logger.log("operation.supervised", "agent", { operation: "create_backtest" });

    expect(onEvent).toHaveBeenCalledWith(event);
  });
});
