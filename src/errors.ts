import type { Command } from "./types";

const RESOLUTION_EXIT_CODE = 2;
const INTERRUPTED_EXIT_CODE = 130;

/**
 * Base class for every error the engine reports at the invocation boundary.
 * `exitCode` is the process status the CLI exits with.
 */
export class MakeshiftError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = RESOLUTION_EXIT_CODE) {
    super(message);
    this.name = "MakeshiftError";
    this.exitCode = exitCode;
  }
}

export class CycleError extends MakeshiftError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(" -> ")}`);
    this.name = "CycleError";
    this.cycle = cycle;
  }
}

export class UnknownPrerequisiteError extends MakeshiftError {
  readonly reference: string;
  readonly dependent?: string;

  constructor(reference: string, dependent?: string) {
    super(
      dependent === undefined
        ? `No task or file named "${reference}"`
        : `Unknown prerequisite "${reference}" of task "${dependent}": no task or file by that name`
    );
    this.name = "UnknownPrerequisiteError";
    this.reference = reference;
    if (dependent !== undefined) {
      this.dependent = dependent;
    }
  }
}

export class ActionFailure extends MakeshiftError {
  readonly task: string;
  readonly command: Command;

  constructor(task: string, command: Command, exitCode: number) {
    super(
      `Task "${task}" failed: ${formatCommand(command)} exited with status ${exitCode}`,
      exitCode
    );
    this.name = "ActionFailure";
    this.task = task;
    this.command = command;
  }
}

export class ConfigError extends MakeshiftError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends MakeshiftError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class InterruptedError extends MakeshiftError {
  constructor(task?: string) {
    super(
      task === undefined
        ? "Interrupted"
        : `Interrupted during task "${task}"`,
      INTERRUPTED_EXIT_CODE
    );
    this.name = "InterruptedError";
  }
}

/**
 * Renders a command the way it would be typed at a shell prompt.
 */
export function formatCommand(command: Command): string {
  if (typeof command === "string") {
    return command;
  }
  return command.map(quote).join(" ");
}

function quote(arg: string): string {
  if (arg.length === 0) {
    return "''";
  }
  if (!/[^\w@%+=:,./-]/.test(arg)) {
    return arg;
  }
  return `'${arg.replaceAll("'", `'"'"'`)}'`;
}
