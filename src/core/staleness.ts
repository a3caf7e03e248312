import { statSync } from "node:fs";
import { resolve } from "node:path";
import debug from "debug";
import type { PlanEntry, Verdict } from "../types";
import { hasAction, outputOf } from "./registry";

const log = debug("makeshift:staleness");

export type StalenessOptions = {
  cwd?: string;
  /** Treat every task with an action as stale (`-B`). */
  alwaysMake?: boolean;
};

export class StalenessEvaluator {
  private readonly cwd: string;
  private readonly alwaysMake: boolean;

  constructor(options: StalenessOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.alwaysMake = options.alwaysMake ?? false;
  }

  mustRun(entry: PlanEntry, changed: ReadonlySet<string>): boolean {
    return this.evaluate(entry, changed).mustRun;
  }

  /**
   * Decide whether a planned task's action must run. `changed` holds the
   * tasks whose output changed earlier in this invocation.
   */
  evaluate(entry: PlanEntry, changed: ReadonlySet<string>): Verdict {
    const verdict = this.decide(entry, changed);
    log(`${entry.task.name}: ${verdict.reason}`, verdict.path ?? "");
    return verdict;
  }

  private decide(entry: PlanEntry, changed: ReadonlySet<string>): Verdict {
    const { task } = entry;

    if (task.phony) {
      return { mustRun: true, reason: "phony" };
    }
    if (!hasAction(task)) {
      return { mustRun: false, reason: "no-action" };
    }
    if (this.alwaysMake) {
      return { mustRun: true, reason: "always-make" };
    }

    const changedUpstream = entry.upstream.find((u) => changed.has(u.name));
    if (changedUpstream) {
      return {
        mustRun: true,
        path: changedUpstream.name,
        reason: "upstream-changed",
      };
    }

    const output = outputOf(task);
    const outputTime = this.modifiedAt(output);
    if (outputTime === undefined) {
      return { mustRun: true, path: output, reason: "missing-output" };
    }

    for (const input of entry.inputs) {
      const inputTime = this.modifiedAt(input);
      if (inputTime === undefined) {
        return { mustRun: true, path: input, reason: "missing-input" };
      }
      if (inputTime > outputTime) {
        return { mustRun: true, path: input, reason: "newer-input" };
      }
    }

    for (const upstreamOutput of entry.upstreamOutputs) {
      const upstreamTime = this.modifiedAt(upstreamOutput);
      if (upstreamTime !== undefined && upstreamTime > outputTime) {
        return { mustRun: true, path: upstreamOutput, reason: "newer-input" };
      }
    }

    return { mustRun: false, reason: "up-to-date" };
  }

  private modifiedAt(path: string): number | undefined {
    const stats = statSync(resolve(this.cwd, path), { throwIfNoEntry: false });
    return stats?.mtimeMs;
  }
}
