import { describe, it, expect } from "vitest";
import { classifyStatus, readPath } from "../status.js";

describe("readPath", () => {
  it("follows object keys and array indexes", () => {
    const payload = { optimizations: [{ status: "running" }], backtest: { status: "Completed." } };

    expect(readPath(payload, "optimizations.0.status")).toBe("running");
    expect(readPath(payload, "backtest.status")).toBe("Completed.");
    expect(readPath(payload, "backtest.missing.deeper")).toBeUndefined();
    expect(readPath("text", "status")).toBeUndefined();
  });
});

describe("classifyStatus", () => {
  const rules = {
    fields: ["backtest.status", "status"],
    completedFlag: "backtest.completed",
    completed: ["Completed"],
    failed: ["Runtime Error", "Error"],
    cancelled: ["Aborted"],
  };

  it.each([
    ["Completed.", "completed"],
    ["Runtime Error", "failed"],
    ["runtimeError", "failed"],
    ["Aborted", "cancelled"],
    ["In Queue...", "in_progress"],
    ["Running", "in_progress"],
  ])("classifies %s as %s", (status, state) => {
    expect(classifyStatus({ backtest: { status } }, rules)).toEqual({ state, detail: status });
  });

  it("probes fields in order", () => {
    expect(classifyStatus({ status: "Completed" }, rules)).toEqual({ state: "completed", detail: "Completed" });
  });

  it("treats the completion flag as completed", () => {
    expect(classifyStatus({ backtest: { completed: true } }, rules)).toEqual({ state: "completed", detail: undefined });
  });

  it("counts a missing status as still in progress", () => {
    expect(classifyStatus({}, rules)).toEqual({ state: "in_progress", detail: undefined });
    expect(classifyStatus(null, rules)).toEqual({ state: "in_progress", detail: undefined });
  });
});
