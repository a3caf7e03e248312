export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
  dryRun?: boolean;
  alwaysMake?: boolean;
};

/**
 * One recipe line: an argument list run without a shell, or a string run
 * through the shell.
 */
export type Command = string | readonly string[];

/**
 * A prerequisite reference. Bare strings are resolved at resolution time
 * (task, existing file, glob, or `!` exclusion); `{ file }` is always a file.
 */
export type Prerequisite = string | { file: string };

export type Task = {
  name: string;
  prerequisites: readonly Prerequisite[];
  phony: boolean;
  action?: readonly Command[];
  /** Designated output artifact. Defaults to the task name. */
  output?: string;
  env?: Readonly<Record<string, string>>;
  doc?: string;
};

export type TaskInput = {
  name: string;
  prerequisites?: readonly Prerequisite[];
  phony?: boolean;
  action?: readonly Command[];
  output?: string;
  env?: Readonly<Record<string, string>>;
  doc?: string;
};

export type PlanEntry = {
  task: Task;
  /** Direct task prerequisites that have an entry of their own, in declared order. */
  upstream: Task[];
  /** File inputs, including those inherited from transparent grouping tasks. */
  inputs: string[];
  /**
   * Outputs of the file-producing tasks below this one, seen through phony
   * and grouping tasks.
   */
  upstreamOutputs: string[];
};

export type ResolutionPlan = {
  target: string;
  entries: PlanEntry[];
};

export type StaleReason =
  | "phony"
  | "no-action"
  | "always-make"
  | "upstream-changed"
  | "missing-output"
  | "missing-input"
  | "newer-input"
  | "up-to-date";

export type Verdict = {
  mustRun: boolean;
  reason: StaleReason;
  /** The path that triggered a file-based verdict. */
  path?: string;
};

export type ExecutionSummary = {
  ran: string[];
  skipped: string[];
};

export type ParsedCommand = {
  target?: string;
  config: Config;
  env: Record<string, string>;
  file?: string;
  directory?: string;
  help: boolean;
  check: boolean;
  warnings: string[];
};

export type HelpRow = {
  name: string;
  doc: string;
};

export interface RunOptions extends Config {
  cwd?: string;
  env?: Record<string, string>;
  file?: string;
}
