import ansis from "ansis";
import type { Config } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.gray,
  ansis.white,
] as const;

type LoggerConfig = Pick<Config, "quiet" | "prefix">;

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      prefix: true,
      quiet: false,
      ...config,
    };
  }

  registerTask(taskName: string): void {
    if (!this.colorMap.has(taskName)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(taskName, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, taskName.length);
    }
  }

  log(taskName: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    for (const line of splitLines(message)) {
      console.log(this.formatLine(taskName, line));
    }
  }

  error(taskName: string, message: string): void {
    for (const line of splitLines(message)) {
      console.error(this.formatLine(taskName, ansis.red(line)));
    }
  }

  /**
   * Echo a command about to run, the way make prints recipe lines
   */
  command(taskName: string, commandLine: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(this.formatLine(taskName, ansis.dim(`$ ${commandLine}`)));
  }

  info(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} ${message}`);
  }

  success(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  fail(message: string): void {
    console.error(`${ansis.red("✗")} ${message}`);
  }

  /**
   * Unprefixed output that is shown even in quiet mode (help, listings)
   */
  print(message: string): void {
    console.log(message);
  }

  private formatLine(taskName: string, line: string): string {
    if (this.config.prefix === false) {
      return line;
    }

    const color = this.colorMap.get(taskName) ?? ansis.white;

    if (typeof this.config.prefix === "string") {
      return `${color(this.config.prefix)} ${line}`;
    }
    const prefix = `[${taskName}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2); // +2 for brackets
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }

  createTaskLogger(taskName: string): TaskLogger {
    this.registerTask(taskName);
    return new TaskLogger(this, taskName);
  }
}

export class TaskLogger {
  private readonly parent: Logger;
  readonly taskName: string;

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  log(message: string): void {
    this.parent.log(this.taskName, message);
  }

  error(message: string): void {
    this.parent.error(this.taskName, message);
  }

  command(commandLine: string): void {
    this.parent.command(this.taskName, commandLine);
  }
}

function splitLines(message: string): string[] {
  return message
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}
