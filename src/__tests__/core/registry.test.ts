import { describe, expect, it } from "vitest";
import { hasAction, outputOf, TaskRegistry } from "../../core/registry";

describe("TaskRegistry", () => {
  describe("define", () => {
    it("fills in defaults", () => {
      const registry = new TaskRegistry();
      const task = registry.define({ name: "build" });

      expect(task).toEqual({ name: "build", phony: false, prerequisites: [] });
      expect(registry.lookup("build")).toBe(task);
    });

    it("drops an empty action", () => {
      const registry = new TaskRegistry();
      const task = registry.define({ action: [], name: "group" });

      expect(task.action).toBeUndefined();
      expect(hasAction(task)).toBe(false);
    });

    it("copies prerequisites so later changes to the input do not leak in", () => {
      const registry = new TaskRegistry();
      const prerequisites = ["a.txt"];
      registry.define({ name: "build", prerequisites });
      prerequisites.push("b.txt");

      expect(registry.lookup("build")?.prerequisites).toEqual(["a.txt"]);
    });

    it("replaces a redefined task in its original position", () => {
      const registry = new TaskRegistry();
      registry.define({ doc: "first", name: "a" });
      registry.define({ name: "b" });
      registry.define({ doc: "second", name: "a" });

      expect(registry.size).toBe(2);
      expect(registry.all().map((t) => t.name)).toEqual(["a", "b"]);
      expect(registry.lookup("a")?.doc).toBe("second");
    });
  });

  describe("lookup", () => {
    it("returns undefined for unknown names", () => {
      const registry = new TaskRegistry();
      expect(registry.lookup("missing")).toBeUndefined();
      expect(registry.has("missing")).toBe(false);
    });
  });

  describe("all", () => {
    it("lists tasks in declaration order", () => {
      const registry = new TaskRegistry();
      for (const name of ["zeta", "alpha", "mid"]) {
        registry.define({ name });
      }
      expect(registry.all().map((t) => t.name)).toEqual([
        "zeta",
        "alpha",
        "mid",
      ]);
    });
  });

  describe("defaultTarget", () => {
    it("is undefined for an empty registry", () => {
      expect(new TaskRegistry().defaultTarget()).toBeUndefined();
    });

    it("falls back to the first declared task", () => {
      const registry = new TaskRegistry();
      registry.define({ name: "all" });
      registry.define({ name: "build" });
      expect(registry.defaultTarget()).toBe("all");
    });

    it("prefers an explicit default", () => {
      const registry = new TaskRegistry();
      registry.define({ name: "all" });
      registry.define({ name: "build" });
      registry.setDefault("build");
      expect(registry.defaultTarget()).toBe("build");
    });
  });

  describe("outputOf", () => {
    it("defaults to the task name", () => {
      const registry = new TaskRegistry();
      const task = registry.define({ name: ".venv/bin/activate" });
      expect(outputOf(task)).toBe(".venv/bin/activate");
    });

    it("uses the declared output", () => {
      const registry = new TaskRegistry();
      const task = registry.define({ name: "build", output: "dist/lib.js" });
      expect(outputOf(task)).toBe("dist/lib.js");
    });
  });
});
