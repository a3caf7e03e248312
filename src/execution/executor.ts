import debug from "debug";
import { hasAction } from "../core/registry";
import { StalenessEvaluator } from "../core/staleness";
import { ActionFailure, formatCommand, InterruptedError } from "../errors";
import type {
  ExecutionSummary,
  PlanEntry,
  ResolutionPlan,
  RunOptions,
  Task,
} from "../types";
import { Logger } from "../utils/logger";
import { ActionRunner } from "./action-runner";

const log = debug("makeshift:executor");

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export type ExecutorDependencies = {
  logger?: Logger;
  runner?: ActionRunner;
  evaluator?: StalenessEvaluator;
};

/**
 * Walks a resolution plan in order, one action at a time, and stops at the
 * first command that exits non-zero
 */
export class Executor {
  private readonly options: RunOptions;
  private readonly logger: Logger;
  private readonly runner: ActionRunner;
  private readonly evaluator: StalenessEvaluator;
  private aborted = false;

  constructor(options: RunOptions = {}, dependencies: ExecutorDependencies = {}) {
    this.options = options;
    this.logger = dependencies.logger ?? new Logger(options);
    this.runner =
      dependencies.runner ?? new ActionRunner({ cwd: options.cwd });
    this.evaluator =
      dependencies.evaluator ??
      new StalenessEvaluator({
        alwaysMake: options.alwaysMake,
        cwd: options.cwd,
      });
  }

  async execute(plan: ResolutionPlan): Promise<ExecutionSummary> {
    log("=== Starting execution ===");
    log("Plan:", plan.entries.map((e) => e.task.name));

    for (const entry of plan.entries) {
      this.logger.registerTask(entry.task.name);
    }

    const onSignal = (): void => this.abort();
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, onSignal);
    }

    try {
      return await this.executePlan(plan);
    } finally {
      for (const signal of SHUTDOWN_SIGNALS) {
        process.off(signal, onSignal);
      }
    }
  }

  private async executePlan(plan: ResolutionPlan): Promise<ExecutionSummary> {
    const summary: ExecutionSummary = { ran: [], skipped: [] };
    const changed = new Set<string>();

    for (const entry of plan.entries) {
      const { task } = entry;
      const verdict = this.evaluator.evaluate(entry, changed);

      if (!(verdict.mustRun && hasAction(task))) {
        // Grouping tasks pass upstream changes on to their dependents.
        if (!hasAction(task) && propagates(entry, changed)) {
          changed.add(task.name);
        }
        log(`Skipping ${task.name} (${verdict.reason})`);
        summary.skipped.push(task.name);
        continue;
      }

      await this.runTask(task);
      summary.ran.push(task.name);
      // A phony task only passes on changes from below it.
      if (!task.phony || propagates(entry, changed)) {
        changed.add(task.name);
      }
    }

    if (this.aborted) {
      throw new InterruptedError();
    }

    if (summary.ran.length === 0) {
      this.logger.info(`Nothing to be done for '${plan.target}'`);
    }
    return summary;
  }

  private async runTask(task: Task): Promise<void> {
    const commands = task.action ?? [];
    const taskLogger = this.logger.createTaskLogger(task.name);
    const env = { ...this.options.env, ...task.env };

    for (const command of commands) {
      if (this.aborted) {
        throw new InterruptedError(task.name);
      }

      taskLogger.command(formatCommand(command));
      if (this.options.dryRun) {
        continue;
      }

      const status = await this.runner.run(command, { env, logger: taskLogger });
      if (this.aborted) {
        throw new InterruptedError(task.name);
      }
      if (status !== 0) {
        this.logger.fail(`Failed: ${task.name}`);
        throw new ActionFailure(task.name, command, status);
      }
    }

    if (!this.options.dryRun) {
      this.logger.success(`Completed: ${task.name}`);
    }
  }

  /**
   * Stop starting new commands. A command already running is left to exit.
   */
  abort(): void {
    if (this.aborted) {
      return;
    }
    this.aborted = true;
    this.logger.info("Interrupted, waiting for the current command to exit...");
  }
}

function propagates(entry: PlanEntry, changed: ReadonlySet<string>): boolean {
  return entry.upstream.some((u) => changed.has(u.name));
}
