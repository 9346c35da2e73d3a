import { describe, it, expect, beforeAll, beforeEach, vi, type Mock } from "vitest";
import { loadOperationRegistry, type OperationRegistry } from "../../registry/catalog.js";
import { ScriptedInvoker, fault } from "../../testing/scripted-invoker.js";
import { TradingSession, type TradingSessionOptions } from "../session.js";

type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

function waitForAbort(_ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

function createdProject(projectId: number, name: string) {
  return { projects: [{ projectId, name, language: "Py" }], success: true };
}

function compile(compileId: string, projectId: number, state: string) {
  return { compileId, projectId, state, logs: [], success: true };
}

function backtest(status: string) {
  return { backtest: { backtestId: "bt-1", projectId: 42, name: "Run", status }, success: true };
}

describe("TradingSession", () => {
  let registry: OperationRegistry;
  let invoker: ScriptedInvoker;
  let sleep: Mock<Sleep>;

  function createSession(options: Partial<TradingSessionOptions> = {}): TradingSession {
    return new TradingSession({
      registry,
      invoker,
      supervisor: { initialIntervalMs: 10, maxIntervalMs: 40, multiplier: 2, sleep },
      ...options,
    });
  }

  beforeAll(async () => {
    registry = await loadOperationRegistry();
  });

  beforeEach(() => {
    invoker = new ScriptedInvoker();
    sleep = vi.fn<Sleep>(async () => {});
  });

  it("resolves the same arguments for the same request", async () => {
    const session = createSession();
    session.store.set("project", "id", 42);
    invoker.reply("read_backtest", backtest("Completed."));

    await session.execute("read_backtest", { backtestId: "bt-1" });
    await session.execute("read_backtest", { backtestId: "bt-1" });

    const [first, second] = invoker.callsTo("read_backtest");
    expect(first?.args).toEqual({ projectId: 42, backtestId: "bt-1" });
    expect(second?.args).toEqual(first?.args);
  });

  it("compiles the project that was just created", async () => {
    const session = createSession();
    invoker.reply("create_project", createdProject(101, "Alpha"));
    invoker.reply("create_compile", compile("c-1", 101, "BuildSuccess"));

    await session.execute("create_project", { name: "Alpha", language: "Py" });
    const outcome = await session.execute("create_compile");

    expect(outcome).toMatchObject({
      success: true,
      args: { projectId: 101 },
      sources: { projectId: "pinned" },
      status: { state: "completed", detail: "BuildSuccess" },
      attempts: 1,
    });
    expect(invoker.callsTo("read_compile")).toEqual([]);
  });

  it("forgets the previous project's work when a new project is created", async () => {
    const session = createSession();
    invoker.reply("create_project", createdProject(101, "P1"), createdProject(102, "P2"));
    invoker.reply("create_compile", compile("c-1", 101, "BuildSuccess"), compile("c-2", 102, "BuildSuccess"));

    await session.execute("create_project", { name: "P1", language: "Py" });
    await session.execute("create_compile");
    session.store.set("backtest", "id", "bt-old");
    await session.execute("create_project", { name: "P2", language: "Py" });

    expect(session.store.getPinned("compile")).toEqual({});
    expect(session.store.getPinned("backtest")).toEqual({});
    expect(session.store.getRecent("compile")).toEqual([{ id: "c-1", projectId: 101 }]);

    await session.execute("create_compile");
    expect(invoker.callsTo("create_compile")[1]?.args).toEqual({ projectId: 102 });
  });

  it("serializes overlapping requests", async () => {
    const session = createSession();
    invoker.reply("create_project", createdProject(101, "Alpha"));
    invoker.reply("create_compile", compile("c-1", 101, "BuildSuccess"));

    const [, compiled] = await Promise.all([
      session.execute("create_project", { name: "Alpha", language: "Py" }),
      session.execute("create_compile"),
    ]);

    expect(compiled.success && compiled.args).toEqual({ projectId: 101 });
  });

  describe("names", () => {
    it("uses the exact match, not a name containing it", async () => {
      const session = createSession();
      invoker.reply("list_projects", {
        projects: [
          { projectId: 1, name: "Alpha-Research" },
          { projectId: 2, name: "Alpha" },
        ],
      });
      invoker.reply("read_project", { projects: [{ projectId: 2, name: "Alpha" }] });

      const outcome = await session.execute("read_project", { projectName: "Alpha" });

      expect(outcome.success).toBe(true);
      expect(invoker.callsTo("read_project")[0]?.args).toEqual({ projectId: 2 });
      expect(session.store.getSlot("project", "id")).toMatchObject({ value: 2, provenance: "explicit" });
    });

    it("asks instead of picking between two exact matches", async () => {
      const session = createSession();
      invoker.reply("list_projects", {
        projects: [
          { projectId: 1, name: "Alpha" },
          { projectId: 2, name: "ALPHA" },
        ],
      });

      const outcome = await session.execute("read_project", { projectName: "alpha" });

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.failure.kind).toBe("Disambiguation");
      expect(outcome.question).toBe(
        `More than one project is named "alpha": "Alpha" (1), "ALPHA" (2). Which one should be used for 'projectId'?`,
      );
      expect(invoker.callsTo("read_project")).toEqual([]);
    });
  });

  it("does not pin a looked-up name when the call fails", async () => {
    const session = createSession();
    invoker.reply("list_projects", {
      projects: [
        { projectId: 1, name: "Alpha" },
        { projectId: 2, name: "Beta" },
      ],
    });
    invoker.on("read_project", fault("api-http-error", "HTTP 500: boom", 500));

    const outcome = await session.execute("read_project", { projectName: "Beta" });

    expect(outcome.success).toBe(false);
    expect(invoker.callsTo("read_project")[0]?.args).toEqual({ projectId: 2 });
    expect(session.store.getSlot("project", "id")).toMatchObject({ value: 1, provenance: "inferred" });
  });

  it("keeps a late poll result from re-pinning a replaced project", async () => {
    const session = createSession();
    let release: () => void = () => {};
    sleep.mockImplementation(() => new Promise<void>(resolve => {
      release = resolve;
    }));
    const run = (status: string) => ({
      backtest: { backtestId: "bt-1", projectId: 101, name: "Run", status },
      success: true,
    });
    invoker.reply("create_project", createdProject(101, "P1"), createdProject(202, "P2"));
    invoker.reply("create_compile", compile("c-1", 101, "BuildSuccess"));
    invoker.reply("create_backtest", run("In Queue..."));
    invoker.reply("read_backtest", run("Completed."));

    await session.execute("create_project", { name: "P1", language: "Py" });
    await session.execute("create_compile");
    const started = await session.execute("create_backtest", { backtestName: "Run" }, { wait: false });
    expect(started.success && started.status?.state).toBe("in_progress");
    await session.execute("create_project", { name: "P2", language: "Py" });

    expect(session.store.get("project", "id")).toBe(202);
    expect(session.store.getPinned("backtest")).toEqual({});

    release();
    await vi.waitFor(() => expect(session.pending()).toEqual([]));

    expect(invoker.callsTo("read_backtest")[0]?.args).toEqual({ projectId: 101, backtestId: "bt-1" });
    expect(session.store.get("project", "id")).toBe(202);
    expect(session.store.getPinned("backtest")).toEqual({});
    expect(session.store.getStatus("backtest")?.state).toBe("completed");
    expect(session.store.getRecent("backtest")[0]).toEqual({ id: "bt-1", name: "Run", projectId: 101 });
  });

  it("commits cross-linked identifiers in a single revision", async () => {
    const session = createSession();
    invoker.reply("read_backtest", { backtest: { projectId: 7, backtestId: "bt-7", status: "Completed." } });
    const before = session.store.revision;

    await session.execute("read_backtest", { projectId: 7, backtestId: "bt-7" });

    expect(session.store.revision).toBe(before + 1);
    expect(session.store.get("project", "id")).toBe(7);
    expect(session.store.get("backtest", "id")).toBe("bt-7");
  });

  it("does not reuse a stopped deployment", async () => {
    const session = createSession();
    session.store.set("project", "id", 42);
    session.store.set("live", "id", "L-1");
    invoker.reply("stop_live_algorithm", { success: true });

    await session.execute("stop_live_algorithm");
    const outcome = await session.execute("read_live_algorithm");

    expect(outcome).toEqual({
      success: false,
      operation: "read_live_algorithm",
      failure: { kind: "MissingContext", operation: "read_live_algorithm", parameter: "deployId", domain: "live" },
      question: "Which live should 'read_live_algorithm' use? Please provide 'deployId'.",
    });
  });

  describe("long-running operations", () => {
    let session: TradingSession;

    beforeEach(() => {
      session = createSession();
      session.store.set("project", "id", 42);
      session.store.set("compile", "id", "c-1");
    });

    it("waits for a terminal status", async () => {
      invoker.reply("create_backtest", backtest("In Queue..."));
      invoker.reply("read_backtest", backtest("Running"), backtest("Running"), backtest("Completed."));

      const outcome = await session.execute("create_backtest", { backtestName: "Run" });

      expect(outcome).toMatchObject({
        success: true,
        attempts: 4,
        status: { state: "completed", detail: "Completed." },
        payload: backtest("Completed."),
      });
      expect(sleep.mock.calls.map(call => call[0])).toEqual([10, 20, 40]);
      expect(session.store.getStatus("backtest")?.state).toBe("completed");
      expect(session.pending()).toEqual([]);
    });

    it("returns a remote failure as a completed request", async () => {
      invoker.reply("create_compile", compile("c-9", 42, "BuildError"));

      const outcome = await session.execute("create_compile");

      expect(outcome).toMatchObject({ success: true, status: { state: "failed", detail: "BuildError" } });
    });

    it("reports a timeout distinctly from a failed status", async () => {
      session = createSession({
        supervisor: { initialIntervalMs: 10, maxIntervalMs: 40, multiplier: 2, maxAttempts: 2, sleep },
      });
      session.store.set("project", "id", 42);
      session.store.set("compile", "id", "c-1");
      invoker.reply("create_backtest", backtest("In Queue..."));
      invoker.reply("read_backtest", backtest("Running"));

      const outcome = await session.execute("create_backtest", { backtestName: "Run" });

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.failure).toEqual({
        kind: "Timeout",
        operation: "create_backtest",
        domain: "backtest",
        attempts: 2,
        lastState: "Running",
      });
      expect(outcome.question).toBe(
        "The backtest is still running after 2 checks (last status: Running). Check again later with the backtest read tool.",
      );
    });

    it("can hand back a pending id instead of waiting", async () => {
      sleep.mockImplementation(waitForAbort);
      invoker.reply("create_backtest", backtest("In Queue..."));

      const outcome = await session.execute("create_backtest", { backtestName: "Run" }, { wait: false });

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;
      expect(outcome.status?.state).toBe("in_progress");
      expect(session.pending().map(p => p.id)).toEqual([outcome.pendingId]);

      expect(session.cancel(outcome.pendingId ?? "")).toBe(true);
      await vi.waitFor(() => expect(session.pending()).toEqual([]));
    });
  });

  describe("failures", () => {
    it("surfaces remote errors without touching context", async () => {
      const session = createSession();
      session.store.set("project", "id", 42);
      invoker.on("delete_project", fault("api-http-error", "HTTP 403: forbidden", 403));

      const outcome = await session.execute("delete_project");

      expect(outcome).toMatchObject({
        success: false,
        failure: { kind: "InvocationError", code: "api-http-error", status: 403, domain: "project" },
        question: "HTTP 403: forbidden",
      });
      expect(session.store.get("project", "id")).toBe(42);
    });

    it("keeps working when persisting fails", async () => {
      const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const onCommit = vi.fn(async () => {
        throw new Error("disk full");
      });
      const session = createSession({ logger, onCommit });
      invoker.reply("read_account", { balance: 10 });

      const outcome = await session.execute("read_account");

      expect(outcome.success).toBe(true);
      expect(onCommit).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith("Failed to persist session context", { error: "disk full" });
    });
  });

  describe("overrides", () => {
    it("keeps a pinned choice across list refreshes", async () => {
      const session = createSession();
      invoker.reply("list_projects", {
        projects: [
          { projectId: 1, name: "Alpha" },
          { projectId: 5, name: "Five" },
        ],
      });

      await session.pin("project", "id", 5);
      await session.execute("list_projects");

      expect(session.store.getSlot("project", "id")).toMatchObject({ value: 5, provenance: "explicit" });
      expect(session.store.getRecent("project").map(item => item["id"])).toEqual([1, 5]);
    });

    it("clears a domain on request", async () => {
      const session = createSession();
      await session.pin("file", "name", "main.py");

      await session.clear("file");

      expect(session.store.getPinned("file")).toEqual({});
      expect(session.store.getRecent("file")).toEqual([{ name: "main.py" }]);
    });
  });
});
