import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Runner } from "../../execution/runner";
import type { TaskInput } from "../../types";
import {
  clearLog,
  createWorkspace,
  readLog,
  recordCommand,
  removeWorkspace,
  setMtime,
  T1,
  T2,
  T3,
  T4,
  writeFile,
} from "../helpers/workspace";

describe("Incremental builds", () => {
  let dir: string;

  const writeTasks = (tasks: TaskInput[]) => {
    writeFile(dir, "makeshift.json", JSON.stringify({ tasks }));
  };

  const build = (target: string) =>
    new Runner().run([target], { cwd: dir, quiet: true });

  beforeEach(() => {
    dir = createWorkspace();
    vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeWorkspace(dir);
  });

  describe("a target with a file task and a phony task", () => {
    beforeEach(() => {
      writeFile(dir, "file.txt", "", T1);
      writeFile(dir, "B", "", T2);
      writeFile(dir, "A", "", T3);
      writeTasks([
        { action: [recordCommand("A", "A")], name: "A", prerequisites: ["B", "C"] },
        { action: [recordCommand("B", "B")], name: "B", prerequisites: ["file.txt"] },
        { action: [recordCommand("C")], name: "C", phony: true },
      ]);
    });

    it("runs only the phony task when nothing changed", async () => {
      expect(await build("A")).toBe(0);
      expect(readLog(dir)).toEqual(["C"]);
    });

    it("rebuilds the chain after its source is touched", async () => {
      setMtime(dir, "file.txt", T4);

      expect(await build("A")).toBe(0);
      expect(readLog(dir)).toEqual(["B", "C", "A"]);
    });

    it("settles after one rebuild", async () => {
      setMtime(dir, "file.txt", T4);
      await build("A");
      clearLog(dir);

      expect(await build("A")).toBe(0);
      expect(readLog(dir)).toEqual(["C"]);
    });
  });

  it("rebuilds only the dependents of a touched source", async () => {
    writeFile(dir, "one.txt", "", T1);
    writeFile(dir, "two.txt", "", T1);
    writeFile(dir, "lib-one", "", T2);
    writeFile(dir, "lib-two", "", T2);
    writeFile(dir, "app", "", T3);
    writeTasks([
      { action: [recordCommand("app", "app")], name: "app", prerequisites: ["lib-one", "lib-two"] },
      { action: [recordCommand("lib-one", "lib-one")], name: "lib-one", prerequisites: ["one.txt"] },
      { action: [recordCommand("lib-two", "lib-two")], name: "lib-two", prerequisites: ["two.txt"] },
    ]);
    setMtime(dir, "two.txt", T4);

    expect(await build("app")).toBe(0);
    expect(readLog(dir)).toEqual(["lib-two", "app"]);
  });

  it("rebuilds through a phony task after a leaf is touched", async () => {
    writeFile(dir, "file.txt", "", T1);
    writeFile(dir, "B", "", T2);
    writeFile(dir, "A", "", T3);
    writeTasks([
      { action: [recordCommand("A", "A")], name: "A", prerequisites: ["P"] },
      { action: [recordCommand("P")], name: "P", phony: true, prerequisites: ["B"] },
      { action: [recordCommand("B", "B")], name: "B", prerequisites: ["file.txt"] },
    ]);

    await build("A");
    expect(readLog(dir)).toEqual(["P"]);

    clearLog(dir);
    setMtime(dir, "file.txt", T4);
    await build("A");
    expect(readLog(dir)).toEqual(["B", "P", "A"]);
  });

  it("picks up an output built on its own below a grouping task", async () => {
    writeFile(dir, "src.txt", "", T1);
    writeFile(dir, "lib", "", T2);
    writeFile(dir, "app", "", T3);
    writeTasks([
      { action: [recordCommand("app", "app")], name: "app", prerequisites: ["libs"] },
      { name: "libs", prerequisites: ["lib"] },
      { action: [recordCommand("lib", "lib")], name: "lib", prerequisites: ["src.txt"] },
    ]);
    setMtime(dir, "src.txt", T4);

    await build("lib");
    await build("app");

    expect(readLog(dir)).toEqual(["lib", "app"]);
  });

  it("builds a missing output from scratch, then does nothing", async () => {
    writeFile(dir, "main.c", "", T1);
    writeTasks([
      { action: [recordCommand("compile", "main.o")], name: "compile", output: "main.o", prerequisites: ["main.c"] },
    ]);

    await build("compile");
    await build("compile");

    expect(readLog(dir)).toEqual(["compile"]);
  });

  describe("globbed sources", () => {
    beforeEach(() => {
      writeFile(dir, "src/app.js", "", T1);
      writeFile(dir, "src/lib/util.js", "", T1);
      writeFile(dir, "src/app.test.js", "", T4);
      writeFile(dir, "bundle.js", "", T3);
      writeTasks([
        {
          action: [recordCommand("bundle", "bundle.js")],
          name: "bundle",
          output: "bundle.js",
          prerequisites: ["src/**/*.js", "!src/**/*.test.js"],
        },
      ]);
    });

    it("ignores changes to excluded files", async () => {
      expect(await build("bundle")).toBe(0);
      expect(readLog(dir)).toEqual([]);
    });

    it("rebuilds when a matched file changes", async () => {
      setMtime(dir, "src/lib/util.js", T4);

      expect(await build("bundle")).toBe(0);
      expect(readLog(dir)).toEqual(["bundle"]);
    });
  });

  it("inherits the files of an action-less grouping task", async () => {
    writeFile(dir, "a.txt", "", T1);
    writeFile(dir, "b.txt", "", T4);
    writeFile(dir, "out", "", T3);
    writeTasks([
      { action: [recordCommand("out", "out")], name: "out", prerequisites: ["sources"] },
      { name: "sources", prerequisites: ["a.txt", "b.txt"] },
    ]);

    expect(await build("out")).toBe(0);
    expect(readLog(dir)).toEqual(["out"]);
  });

  it("runs a task whose explicit file input is missing", async () => {
    writeFile(dir, "generated", "", T3);
    writeTasks([
      {
        action: [recordCommand("generate", "generated")],
        name: "generate",
        output: "generated",
        prerequisites: [{ file: "schema.json" }],
      },
    ]);

    expect(await build("generate")).toBe(0);
    expect(readLog(dir)).toEqual(["generate"]);
  });

  it("treats a target that names an existing file as done", async () => {
    writeFile(dir, "README.md", "", T1);
    writeTasks([{ action: [recordCommand("other", "other")], name: "other" }]);

    expect(await build("README.md")).toBe(0);
    expect(readLog(dir)).toEqual([]);
  });
});
