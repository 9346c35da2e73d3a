import { describe, it, expect, beforeEach } from "vitest";
import { ContextStore } from "../../context/store.js";
import { Harvester } from "../harvester.js";

describe("Harvester", () => {
  let store: ContextStore;
  let harvester: Harvester;

  beforeEach(() => {
    store = new ContextStore();
    harvester = new Harvester(store);
  });

  describe("single objects", () => {
    it("pins nested identifiers and their relations together", () => {
      const report = harvester.harvest("create_backtest", {
        backtest: { projectId: 42, backtestId: "bt-1", name: "Momentum run", status: "In Queue..." },
        success: true,
      }, { domain: "backtest", kind: "create" });

      expect(store.getPinned("backtest")).toEqual({ id: "bt-1", name: "Momentum run", projectId: 42 });
      expect(store.get("project", "id")).toBe(42);
      expect(store.getRecent("backtest")).toEqual([{ id: "bt-1", name: "Momentum run", projectId: 42 }]);
      expect(store.lastId()).toEqual({ key: "backtestId", value: "bt-1" });
      expect(report.domains.sort()).toEqual(["backtest", "project"]);
      expect(report.identifiers).toBe(2);
    });

    it("reads top-level identifiers of the operation's domain", () => {
      harvester.harvest("create_compile", { projectId: 42, compileId: "c-1", state: "InQueue" }, {
        domain: "compile",
        kind: "create",
      });

      expect(store.getPinned("compile")).toEqual({ id: "c-1", projectId: 42 });
      expect(store.get("project", "id")).toBe(42);
    });

    it("infers the domain from the operation name", () => {
      harvester.harvest("read_backtest", { backtest: { backtestId: "bt-9" } });

      expect(store.get("backtest", "id")).toBe("bt-9");
    });

    it("drops the previous entity's fields when a different one is pinned", () => {
      harvester.harvest("read_backtest", { backtest: { backtestId: "b1", name: "Old", projectId: 1 } });
      harvester.harvest("read_backtest", { backtest: { backtestId: "b2", name: "New" } });

      expect(store.getPinned("backtest")).toEqual({ id: "b2", name: "New" });
    });

    it("keeps the explicit tag when the same value is harvested again", () => {
      store.set("project", "id", 42, "explicit");

      harvester.harvest("read_project", { projectId: 42, name: "Alpha" }, { domain: "project", kind: "read" });

      expect(store.getSlot("project", "id")?.provenance).toBe("explicit");
      expect(store.getSlot("project", "name")?.provenance).toBe("inferred");
    });

    it("sends unmapped identifiers to overflow and last.id", () => {
      harvester.harvest("read_project_nodes", { nodeId: "N-7" }, { domain: "project", kind: "read" });

      expect(store.getOverflow("nodeId")).toBe("N-7");
      expect(store.lastId()).toEqual({ key: "nodeId", value: "N-7" });
      expect(store.getPinned("project")).toEqual({});
    });

    it("skips blank and non-positive identifiers", () => {
      harvester.harvest("read_backtest", { backtest: { backtestId: "  ", projectId: 0 } });

      expect(store.get("backtest", "id")).toBeUndefined();
      expect(store.get("project", "id")).toBeUndefined();
      expect(store.lastId()).toBeUndefined();
    });
  });

  describe("lists", () => {
    const projects = {
      projects: [
        { projectId: 1, name: "Alpha", language: "Py" },
        { projectId: 2, name: "Beta", language: "C#" },
      ],
      success: true,
    };

    it("refreshes the recent list and pins the first item", () => {
      const report = harvester.harvest("list_projects", projects, { domain: "project", kind: "list" });

      expect(store.getRecent("project")).toEqual([
        { id: 1, name: "Alpha" },
        { id: 2, name: "Beta" },
      ]);
      expect(store.getPinned("project")).toEqual({ id: 1, name: "Alpha" });
      expect(report.listed).toBe("project");
    });

    it("never replaces an explicit pin", () => {
      harvester.pin("project", { id: 2 });

      harvester.harvest("list_projects", projects, { domain: "project", kind: "list" });

      expect(store.getSlot("project", "id")).toMatchObject({ value: 2, provenance: "explicit" });
    });
  });

  describe("explicit values", () => {
    it("pins caller-supplied values as explicit", () => {
      harvester.harvest("read_project", { projectId: 5, name: "Five" }, {
        domain: "project",
        kind: "read",
        explicit: [{ slot: { domain: "project", field: "id" }, value: 5 }],
      });

      expect(store.getSlot("project", "id")?.provenance).toBe("explicit");
    });

    it("pin() records an override and moves it to the front of recent", () => {
      store.pushRecent("project", { id: 1, name: "Alpha" });

      const report = harvester.pin("project", { id: 2, name: "Beta" });

      expect(store.getPinned("project")).toEqual({ id: 2, name: "Beta" });
      expect(store.getRecent("project")).toEqual([{ id: 2, name: "Beta" }, { id: 1, name: "Alpha" }]);
      expect(report.domains).toEqual(["project"]);
    });
  });

  describe("replacements", () => {
    it("pins an id and name of one entity together", () => {
      store.transact(tx => {
        tx.set("project", "id", 2);
        tx.set("project", "name", "Old");
      });

      harvester.harvest("read_project", {}, {
        domain: "project",
        explicit: [
          { slot: { domain: "project", field: "id" }, value: 2 },
          { slot: { domain: "project", field: "name" }, value: "New" },
        ],
      });

      expect(store.getPinned("project")).toEqual({ id: 2, name: "New" });
      expect(store.getSlot("project", "name")?.provenance).toBe("explicit");
    });

    it("reports the value a new entity replaced", () => {
      store.set("live", "id", "L-old", "explicit");

      const report = harvester.harvest("create_live_algorithm", { deployId: "L-new" }, { domain: "live", kind: "create" });

      expect(report.changes).toEqual([{ domain: "live", field: "id", previous: "L-old", value: "L-new" }]);
    });
  });

  describe("detached results", () => {
    it("only refreshes the recent list", () => {
      store.set("project", "id", 202);

      const report = harvester.harvest("read_backtest", {
        backtest: { backtestId: "bt-1", projectId: 101, status: "Completed." },
      }, { domain: "backtest", kind: "read", detached: true });

      expect(store.get("project", "id")).toBe(202);
      expect(store.getPinned("backtest")).toEqual({});
      expect(store.getRecent("backtest")).toEqual([{ id: "bt-1", projectId: 101 }]);
      expect(store.lastId()).toBeUndefined();
      expect(store.lastOperation()).toBeUndefined();
      expect(report.changes).toEqual([]);
    });
  });

  describe("malformed payloads", () => {
    it.each([null, "plain text", 17, [1, 2, 3], { projects: "nope" }])("ignores %j", (payload) => {
      expect(() => harvester.harvest("list_projects", payload, { domain: "project", kind: "list" })).not.toThrow();
      expect(store.getPinned("project")).toEqual({});
    });

    it("records the operation even when nothing was harvested", () => {
      harvester.harvest("read_account", { balance: 10 }, { domain: "server", kind: "read" });

      expect(store.lastOperation()).toEqual({ name: "read_account", domain: "server", kind: "read" });
    });
  });
});
