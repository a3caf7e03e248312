export { Runner, USAGE } from "./execution/runner";
export { Executor } from "./execution/executor";
export { ActionRunner } from "./execution/action-runner";
export { Parser, parseCommand } from "./core/parser";
export { TaskRegistry, outputOf, hasAction } from "./core/registry";
export { DependencyResolver } from "./core/resolver";
export { StalenessEvaluator } from "./core/staleness";
export { HelpCatalog } from "./core/help-catalog";
export { FileMatcher } from "./core/file-matcher";
export {
  DEFAULT_TASK_FILE,
  createRegistry,
  loadTaskFile,
  parseTaskFile,
} from "./config/loader";
export {
  ActionFailure,
  ConfigError,
  CycleError,
  InterruptedError,
  MakeshiftError,
  UnknownPrerequisiteError,
  UsageError,
  formatCommand,
} from "./errors";
export { Logger, TaskLogger } from "./utils/logger";

export type {
  Command,
  Config,
  ExecutionSummary,
  HelpRow,
  ParsedCommand,
  PlanEntry,
  Prerequisite,
  ResolutionPlan,
  RunOptions,
  StaleReason,
  Task,
  TaskInput,
  Verdict,
} from "./types";
export type { TaskDefinition, TaskFile } from "./config/loader";
