import { existsSync } from "node:fs";
import { resolve as resolvePath } from "node:path";
import debug from "debug";
import graphlib from "graphlib";
import { CycleError, UnknownPrerequisiteError } from "../errors";
import type { PlanEntry, ResolutionPlan, Task } from "../types";
import { FileMatcher } from "./file-matcher";
import { hasAction, outputOf, type TaskRegistry } from "./registry";

const { Graph, alg } = graphlib;

const log = debug("makeshift:resolver");

const EXCLUSION_PREFIX = "!";

type Visited = {
  // Present unless the task is a transparent grouping of files.
  entry?: PlanEntry;
  inputs: string[];
  // Files a dependent compares its output against.
  outputs: string[];
};

export class DependencyResolver {
  private readonly registry: TaskRegistry;
  private readonly cwd: string;
  private readonly matcher: FileMatcher;

  constructor(registry: TaskRegistry, cwd: string = process.cwd()) {
    this.registry = registry;
    this.cwd = cwd;
    this.matcher = new FileMatcher(cwd);
  }

  /**
   * Expand a target into the ordered list of tasks to consider, prerequisites
   * first, each task at most once
   */
  resolve(target: string): ResolutionPlan {
    log("=== Resolving target:", target);

    const task = this.registry.lookup(target);
    if (!task) {
      if (this.fileExists(target)) {
        log(`${target} is an existing file with no task, nothing to do`);
        return { entries: [], target };
      }
      throw new UnknownPrerequisiteError(target);
    }

    const entries: PlanEntry[] = [];
    const completed = new Map<string, Visited>();
    const inProgress: string[] = [];

    const visit = (current: Task): Visited => {
      const done = completed.get(current.name);
      if (done) {
        log(`Already resolved ${current.name}, skipping`);
        return done;
      }

      const cycleStart = inProgress.indexOf(current.name);
      if (cycleStart !== -1) {
        throw new CycleError([
          ...inProgress.slice(cycleStart),
          current.name,
        ]);
      }
      inProgress.push(current.name);

      const upstream: Task[] = [];
      const upstreamOutputs: string[] = [];
      let inputs: string[] = [];

      for (const reference of current.prerequisites) {
        if (typeof reference !== "string") {
          inputs.push(reference.file);
          continue;
        }

        if (reference.startsWith(EXCLUSION_PREFIX)) {
          inputs = this.matcher.exclude(
            inputs,
            reference.slice(EXCLUSION_PREFIX.length)
          );
          continue;
        }

        const dependency = this.registry.lookup(reference);
        if (dependency) {
          const resolved = visit(dependency);
          upstreamOutputs.push(...resolved.outputs);
          if (resolved.entry) {
            if (!upstream.includes(dependency)) {
              upstream.push(dependency);
            }
          } else {
            log(`${reference} is transparent, inheriting its inputs`);
            inputs.push(...resolved.inputs);
          }
          continue;
        }

        if (this.fileExists(reference)) {
          inputs.push(reference);
          continue;
        }

        if (this.matcher.isPattern(reference)) {
          inputs.push(...this.matcher.expand(reference));
          continue;
        }

        throw new UnknownPrerequisiteError(reference, current.name);
      }

      inProgress.pop();

      const closure = [...new Set(upstreamOutputs)];
      const visited: Visited = {
        inputs: [...new Set(inputs)],
        // Phony and grouping tasks have no file of their own to compare.
        outputs:
          hasAction(current) && !current.phony ? [outputOf(current)] : closure,
      };
      if (hasAction(current) || upstream.length > 0) {
        visited.entry = {
          inputs: visited.inputs,
          task: current,
          upstream,
          upstreamOutputs: closure,
        };
        entries.push(visited.entry);
        log(`Planned ${current.name}`, {
          inputs: visited.inputs,
          upstream: upstream.map((t) => t.name),
        });
      }
      completed.set(current.name, visited);
      return visited;
    };

    visit(task);

    log(
      "Resolution plan:",
      entries.map((e) => e.task.name)
    );
    return { entries, target };
  }

  /**
   * Check every task in the registry, not just one target, for unknown
   * prerequisites and cycles
   */
  validate(): void {
    const graph = new Graph();

    for (const task of this.registry.all()) {
      graph.setNode(task.name);
    }

    for (const task of this.registry.all()) {
      for (const reference of task.prerequisites) {
        if (
          typeof reference !== "string" ||
          reference.startsWith(EXCLUSION_PREFIX)
        ) {
          continue;
        }
        if (this.registry.has(reference)) {
          graph.setEdge(task.name, reference);
          continue;
        }
        if (!(this.fileExists(reference) || this.matcher.isPattern(reference))) {
          throw new UnknownPrerequisiteError(reference, task.name);
        }
      }
    }

    log("Nodes:", graph.nodes());
    log("Edges:", graph.edges());

    if (alg.isAcyclic(graph)) {
      return;
    }

    const [component] = alg.findCycles(graph);
    const start = component?.[0];
    if (start === undefined) {
      return;
    }
    // Resolving from inside the component reports the cycle as a path.
    this.resolve(start);
    throw new CycleError(component ?? [start]);
  }

  private fileExists(reference: string): boolean {
    return existsSync(resolvePath(this.cwd, reference));
  }
}
