import { describe, it, expect, beforeEach } from "vitest";
import { ContextStore } from "../../context/store.js";
import { Harvester, type HarvestReport } from "../../harvest/harvester.js";
import { ResetPolicy } from "../policy.js";

describe("ResetPolicy", () => {
  let store: ContextStore;
  let policy: ResetPolicy;

  beforeEach(() => {
    store = new ContextStore();
    policy = new ResetPolicy(store);
  });

  it("ignores operations without a rule", () => {
    store.set("backtest", "id", "b1");

    expect(policy.onOperationCompleted("read_project", { args: {} })).toBe(false);
    expect(store.revision).toBe(1);
  });

  it("lists its triggers", () => {
    expect(policy.triggers()).toEqual(expect.arrayContaining([
      "create_project",
      "delete_project",
      "create_live_algorithm",
      "stop_live_algorithm",
    ]));
  });

  describe("create_project", () => {
    it("clears project-scoped work but keeps live and recent lists", () => {
      store.transact(tx => {
        tx.set("compile", "id", "c1");
        tx.set("backtest", "id", "b1");
        tx.set("optimization", "id", "o1");
        tx.set("live", "id", "L1");
        tx.pushRecent("backtest", { id: "b1" });
      });

      policy.onOperationCompleted("create_project", { domain: "project", args: { name: "New", language: "Py" } });

      expect(store.getPinned("compile")).toEqual({});
      expect(store.getPinned("backtest")).toEqual({});
      expect(store.getPinned("optimization")).toEqual({});
      expect(store.getPinned("live")).toEqual({ id: "L1" });
      expect(store.getRecent("backtest")).toEqual([{ id: "b1" }]);
    });

    it("is idempotent", () => {
      store.set("compile", "id", "c1");

      policy.onOperationCompleted("create_project", { args: {} });
      const once = store.snapshot();
      policy.onOperationCompleted("create_project", { args: {} });

      expect(store.snapshot()).toEqual(once);
    });
  });

  describe("delete_project", () => {
    beforeEach(() => {
      store.transact(tx => {
        tx.set("project", "id", 1);
        tx.set("compile", "id", "c1");
        tx.set("backtest", "id", "b1");
        tx.set("backtest", "projectId", 1);
        tx.set("live", "id", "L2");
        tx.set("live", "projectId", 2);
        tx.pushRecent("project", { id: 2 });
        tx.pushRecent("project", { id: 1 });
        tx.pushRecent("backtest", { id: "b9", projectId: 2 });
        tx.pushRecent("backtest", { id: "b1", projectId: 1 });
      });
    });

    it("clears everything that belonged to the deleted project", () => {
      policy.onOperationCompleted("delete_project", { domain: "project", args: { projectId: 1 } });

      expect(store.getPinned("project")).toEqual({});
      expect(store.getPinned("compile")).toEqual({});
      expect(store.getPinned("backtest")).toEqual({});
      expect(store.getPinned("live")).toEqual({ id: "L2", projectId: 2 });
      expect(store.getRecent("project")).toEqual([{ id: 2 }]);
      expect(store.getRecent("backtest")).toEqual([{ id: "b9", projectId: 2 }]);
    });

    it("is idempotent", () => {
      policy.onOperationCompleted("delete_project", { args: { projectId: 1 } });
      const once = store.snapshot();
      policy.onOperationCompleted("delete_project", { args: { projectId: 1 } });

      expect(store.snapshot()).toEqual(once);
    });

    it("targets the pinned project when no id was passed", () => {
      policy.onOperationCompleted("delete_project", { args: {} });

      expect(store.getPinned("project")).toEqual({});
      expect(store.getPinned("backtest")).toEqual({});
    });

    it("leaves the pinned project alone when another one is deleted", () => {
      policy.onOperationCompleted("delete_project", { args: { projectId: 2 } });

      expect(store.get("project", "id")).toBe(1);
      expect(store.getPinned("backtest")).toEqual({ id: "b1", projectId: 1 });
      expect(store.getPinned("live")).toEqual({});
      expect(store.getRecent("project")).toEqual([{ id: 1 }]);
      expect(store.getRecent("backtest")).toEqual([{ id: "b1", projectId: 1 }]);
    });
  });

  describe("create_live_algorithm", () => {
    let harvester: Harvester;

    beforeEach(() => {
      harvester = new Harvester(store);
    });

    function deploy(deployId: string): HarvestReport {
      const report = harvester.harvest("create_live_algorithm", { deployId, projectId: 1 }, {
        domain: "live",
        kind: "create",
      });
      policy.onOperationCompleted("create_live_algorithm", { domain: "live", args: { projectId: 1 }, report });
      return report;
    }

    it("keeps a deployment the caller named in the recent list once it is replaced", () => {
      harvester.harvest("read_live_algorithm", {}, {
        domain: "live",
        explicit: [{ slot: { domain: "live", field: "id" }, value: "L-old" }],
      });
      expect(store.getRecent("live")).toEqual([]);

      const report = deploy("L-new");
      policy.onOperationCompleted("create_live_algorithm", { domain: "live", args: { projectId: 1 }, report });

      expect(report.changes).toContainEqual({ domain: "live", field: "id", previous: "L-old", value: "L-new" });
      expect(store.get("live", "id")).toBe("L-new");
      expect(store.getRecent("live")).toEqual([{ id: "L-new", projectId: 1 }, { id: "L-old" }]);
    });

    it("adds nothing when no deployment was pinned", () => {
      deploy("L-1");

      expect(store.getRecent("live")).toEqual([{ id: "L-1", projectId: 1 }]);
    });
  });

  describe("stop and liquidate", () => {
    it.each(["stop_live_algorithm", "liquidate_live_algorithm"])("%s clears only the deployment id", (operation) => {
      store.transact(tx => {
        tx.set("live", "id", "L1");
        tx.set("live", "command", "cmd-1");
      });

      policy.onOperationCompleted(operation, { domain: "live", args: { projectId: 1 } });

      expect(store.getPinned("live")).toEqual({ command: "cmd-1" });
    });
  });

  describe("deletes", () => {
    it.each([
      ["delete_backtest", "backtest"],
      ["delete_optimization", "optimization"],
      ["abort_optimization", "optimization"],
      ["delete_file", "file"],
      ["delete_object", "object"],
    ] as const)("%s clears the %s pin", (operation, domain) => {
      store.set(domain, "id", "x1");

      policy.onOperationCompleted(operation, { domain, args: {} });

      expect(store.getPinned(domain)).toEqual({});
    });
  });

  it("clear() drops what the user asks for", () => {
    store.set("file", "name", "main.py");
    store.pushRecent("file", { name: "main.py" });

    policy.clear("file", { recent: true });

    expect(store.getPinned("file")).toEqual({});
    expect(store.getRecent("file")).toEqual([]);
  });
});
