import { existsSync } from "node:fs";
import { resolve } from "node:path";
import debug from "debug";
import ansis from "ansis";
import { DEFAULT_TASK_FILE, loadTaskFile } from "../config/loader";
import { HelpCatalog } from "../core/help-catalog";
import { parseCommand } from "../core/parser";
import type { TaskRegistry } from "../core/registry";
import { DependencyResolver } from "../core/resolver";
import { MakeshiftError, UsageError } from "../errors";
import type { RunOptions } from "../types";
import { Logger } from "../utils/logger";
import { Executor } from "./executor";

const log = debug("makeshift:runner");

const HELP_TARGET = "help";
const FATAL_EXIT_CODE = 1;

export const USAGE = `
${ansis.bold("makeshift")} - run tasks whose inputs changed

${ansis.bold("Usage:")}
  makeshift [options] [target] [NAME=value ...]

${ansis.bold("Options:")}
  -f, --file=FILE       Task file (default: makeshift.json)
  -C, --directory=DIR   Run from DIR
  -n, --dry-run         Print the commands that would run
  -B, --always-make     Run every task with an action
  -q, --quiet           Suppress output
  --no-prefix           Disable output prefixes
  --prefix=<str>        Custom prefix
  --check               Validate the whole task graph and exit
  -h, --help            Show this help and the documented tasks
`;

export class Runner {
  /**
   * Run one invocation and return its exit status
   */
  async run(args: string[], options: RunOptions = {}): Promise<number> {
    let logger = new Logger(options);
    try {
      const parsed = parseCommand(args);

      const config = { ...parsed.config, ...options };
      logger = new Logger(config);
      for (const warning of parsed.warnings) {
        logger.warn(warning);
      }

      const baseCwd = options.cwd ?? process.cwd();
      const cwd = parsed.directory ? resolve(baseCwd, parsed.directory) : baseCwd;
      const file = parsed.file ?? options.file ?? DEFAULT_TASK_FILE;

      if (parsed.help) {
        logger.print(USAGE);
        // The task list is shown only when there is a task file to list.
        if (existsSync(resolve(cwd, file))) {
          this.printCatalog(loadTaskFile(cwd, file).registry, logger);
        }
        return 0;
      }

      const loaded = loadTaskFile(cwd, file);
      const { registry } = loaded;

      const resolver = new DependencyResolver(registry, cwd);

      if (parsed.check) {
        resolver.validate();
        logger.success(`${registry.size} task(s) checked, no problems found`);
        return 0;
      }

      const target = parsed.target ?? registry.defaultTarget();
      if (target === undefined) {
        throw new UsageError(`No target named and ${loaded.path} declares no tasks`);
      }

      if (target === HELP_TARGET && !registry.has(HELP_TARGET)) {
        this.printCatalog(registry, logger);
        return 0;
      }

      const plan = resolver.resolve(target);
      log("Resolved plan for", target, plan.entries.map((e) => e.task.name));

      const executor = new Executor(
        {
          ...config,
          cwd,
          env: { ...loaded.env, ...parsed.env, ...options.env },
        },
        { logger }
      );
      await executor.execute(plan);
      return 0;
    } catch (error) {
      if (error instanceof MakeshiftError) {
        logger.fail(error.message);
        return error.exitCode;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.fail(`Fatal error: ${message}`);
      return FATAL_EXIT_CODE;
    }
  }

  private printCatalog(registry: TaskRegistry, logger: Logger): void {
    const catalog = new HelpCatalog(registry);
    for (const line of catalog.render()) {
      logger.print(line);
    }
  }
}
