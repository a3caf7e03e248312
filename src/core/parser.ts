import { UsageError } from "../errors";
import type { ParsedCommand } from "../types";

const ASSIGNMENT_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/s;
const END_OF_OPTIONS = "--";

type ArgCursor = {
  args: string[];
  index: number;
};

export class Parser {
  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      check: false,
      config: {},
      env: {},
      help: false,
      warnings: [],
    };
    const targets: string[] = [];
    const cursor: ArgCursor = { args, index: 0 };
    let optionsEnded = false;

    while (cursor.index < args.length) {
      const arg = args[cursor.index] ?? "";
      cursor.index++;

      if (!optionsEnded && arg === END_OF_OPTIONS) {
        optionsEnded = true;
      } else if (this.processAssignment(arg, result)) {
        // NAME=value
      } else if (!optionsEnded && arg.startsWith("--")) {
        this.processLongFlag(arg.substring(2), cursor, result);
      } else if (!optionsEnded && arg.startsWith("-") && arg.length > 1) {
        this.processShortFlags(arg.substring(1), cursor, result);
      } else {
        targets.push(arg);
      }
    }

    if (targets.length > 1) {
      throw new UsageError(
        `Only one target may be named, got: ${targets.join(", ")}`
      );
    }
    const [target] = targets;
    if (target !== undefined) {
      result.target = target;
    }

    return result;
  }

  private processAssignment(arg: string, result: ParsedCommand): boolean {
    const match = arg.match(ASSIGNMENT_PATTERN);
    if (!(match?.[1] && match[2] !== undefined)) {
      return false;
    }
    result.env[match[1]] = match[2];
    return true;
  }

  private processLongFlag(
    flag: string,
    cursor: ArgCursor,
    result: ParsedCommand
  ): void {
    const [name = "", inlineValue] = splitOnce(flag, "=");

    if (name === "quiet") {
      result.config.quiet = true;
    } else if (name === "dry-run") {
      result.config.dryRun = true;
    } else if (name === "always-make") {
      result.config.alwaysMake = true;
    } else if (name === "no-prefix") {
      result.config.prefix = false;
    } else if (name === "prefix" && inlineValue !== undefined) {
      result.config.prefix = inlineValue;
    } else if (name === "check") {
      result.check = true;
    } else if (name === "help") {
      result.help = true;
    } else if (name === "file") {
      result.file = inlineValue ?? this.takeValue(cursor, "--file");
    } else if (name === "directory") {
      result.directory = inlineValue ?? this.takeValue(cursor, "--directory");
    } else {
      result.warnings.push(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(
    flags: string,
    cursor: ArgCursor,
    result: ParsedCommand
  ): void {
    for (let i = 0; i < flags.length; i++) {
      const flag = flags[i];
      if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "n") {
        result.config.dryRun = true;
      } else if (flag === "B") {
        result.config.alwaysMake = true;
      } else if (flag === "h") {
        result.help = true;
      } else if (flag === "f" || flag === "C") {
        // The value is the rest of this argument (-fpath) or the next one.
        const attached = flags.slice(i + 1);
        const value = attached || this.takeValue(cursor, `-${flag}`);
        if (flag === "f") {
          result.file = value;
        } else {
          result.directory = value;
        }
        return;
      } else {
        result.warnings.push(`Unknown flag: -${flag}`);
      }
    }
  }

  private takeValue(cursor: ArgCursor, flag: string): string {
    const value = cursor.args[cursor.index];
    if (value === undefined) {
      throw new UsageError(`Option ${flag} requires a value`);
    }
    cursor.index++;
    return value;
  }
}

function splitOnce(input: string, separator: string): [string, string?] {
  const index = input.indexOf(separator);
  if (index === -1) {
    return [input];
  }
  return [input.slice(0, index), input.slice(index + separator.length)];
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}
