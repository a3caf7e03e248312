import { once } from "node:events";
import { constants } from "node:os";
import { delimiter, join } from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import debug from "debug";
import { type ExecaChildProcess, execa } from "execa";
import { formatCommand } from "../errors";
import type { Command } from "../types";
import type { TaskLogger } from "../utils/logger";

const log = debug("makeshift:runner");

const COMMAND_NOT_FOUND = 127;
const SIGNAL_EXIT_BASE = 128;

export type ActionRunnerOptions = {
  cwd?: string;
  /** Environment the overrides are merged over. Defaults to `process.env`. */
  baseEnv?: NodeJS.ProcessEnv;
};

export type RunCommandOptions = {
  env?: Readonly<Record<string, string>>;
  logger: TaskLogger;
};

export class ActionRunner {
  private readonly cwd: string;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: ActionRunnerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.baseEnv = options.baseEnv ?? process.env;
  }

  /**
   * Run one command to completion, forwarding its output live, and return
   * its exit status
   */
  async run(command: Command, options: RunCommandOptions): Promise<number> {
    const env = this.environment(options.env, command);
    log(`Running for ${options.logger.taskName}: ${formatCommand(command)}`);

    const proc = this.spawn(command, env);
    const [result] = await Promise.all([
      proc,
      forwardLines(proc.stdout, (line) => options.logger.log(line)),
      forwardLines(proc.stderr, (line) => options.logger.error(line)),
    ]);
    const status = exitStatus(result);
    log(`Exited with status ${status}`);
    return status;
  }

  /**
   * Ambient environment with the overrides on top. Shell commands also find
   * the project's node_modules/.bin first on PATH, unless the overrides set
   * PATH themselves.
   */
  environment(
    overrides: Readonly<Record<string, string>> = {},
    command?: Command
  ): NodeJS.ProcessEnv {
    const merged: NodeJS.ProcessEnv = { ...this.baseEnv, ...overrides };
    if (typeof command !== "string" || "PATH" in overrides) {
      return merged;
    }
    const npmBinPath = join(this.cwd, "node_modules", ".bin");
    merged.PATH = merged.PATH ? npmBinPath + delimiter + merged.PATH : npmBinPath;
    return merged;
  }

  private spawn(command: Command, env: NodeJS.ProcessEnv): ExecaChildProcess {
    const options = {
      buffer: false,
      cwd: this.cwd,
      env,
      extendEnv: false,
      reject: false,
      stderr: "pipe",
      stdin: "inherit",
      stdout: "pipe",
    } as const;

    if (typeof command === "string") {
      // Uses /bin/sh on Unix, cmd.exe on Windows
      return execa(command, { ...options, shell: true });
    }
    const [file, ...args] = command;
    if (file === undefined) {
      throw new TypeError("Cannot run an empty argument list");
    }
    return execa(file, args, options);
  }
}

async function forwardLines(
  stream: Readable | null,
  write: (line: string) => void
): Promise<void> {
  if (!stream) {
    return;
  }
  const lines = createInterface({
    crlfDelay: Number.POSITIVE_INFINITY,
    input: stream,
  });
  lines.on("line", write);
  await once(lines, "close");
}

function exitStatus(result: {
  exitCode?: number;
  signal?: string;
}): number {
  if (typeof result.exitCode === "number") {
    return result.exitCode;
  }
  if (result.signal) {
    const signalNumber: unknown = Reflect.get(constants.signals, result.signal);
    return (
      SIGNAL_EXIT_BASE + (typeof signalNumber === "number" ? signalNumber : 0)
    );
  }
  return COMMAND_NOT_FOUND;
}
