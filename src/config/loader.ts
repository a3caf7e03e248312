import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import debug from "debug";
import { z } from "zod";
import { TaskRegistry } from "../core/registry";
import { ConfigError } from "../errors";

const log = debug("makeshift:config");

export const DEFAULT_TASK_FILE = "makeshift.json";

const EnvSchema = z.record(z.string(), z.string());

const CommandSchema = z.union([
  z.string().min(1),
  z.array(z.string()).min(1),
]);

const PrerequisiteSchema = z.union([
  z.string().min(1),
  z.object({ file: z.string().min(1) }).strict(),
]);

export const TaskDefinitionSchema = z
  .object({
    name: z.string().min(1),
    prerequisites: z.array(PrerequisiteSchema).default([]),
    phony: z.boolean().default(false),
    action: z.array(CommandSchema).optional(),
    output: z.string().min(1).optional(),
    env: EnvSchema.optional(),
    doc: z.string().optional(),
  })
  .strict();

export const TaskFileSchema = z
  .object({
    default: z.string().min(1).optional(),
    env: EnvSchema.default({}),
    tasks: z.array(TaskDefinitionSchema),
  })
  .strict();

export type TaskDefinition = z.infer<typeof TaskDefinitionSchema>;
export type TaskFile = z.infer<typeof TaskFileSchema>;

export type LoadedTaskFile = {
  path: string;
  registry: TaskRegistry;
  /** File-level environment overrides, below command-line assignments. */
  env: Record<string, string>;
};

/**
 * Validate an already-parsed task file object
 */
export function parseTaskFile(data: unknown, source = "task file"): TaskFile {
  const parsed = TaskFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid ${source}:\n${issues.join("\n")}`);
  }
  return parsed.data;
}

export function createRegistry(file: TaskFile): TaskRegistry {
  const registry = new TaskRegistry();
  for (const definition of file.tasks) {
    registry.define(definition);
  }
  if (file.default !== undefined) {
    if (!registry.has(file.default)) {
      throw new ConfigError(
        `Default target "${file.default}" is not a defined task`
      );
    }
    registry.setDefault(file.default);
  }
  return registry;
}

export function loadTaskFile(
  cwd: string = process.cwd(),
  file: string = DEFAULT_TASK_FILE
): LoadedTaskFile {
  const path = resolve(cwd, file);
  log(`Loading ${path}`);

  if (!existsSync(path)) {
    throw new ConfigError(`No task file found at ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Error reading ${path}: ${message}`);
  }

  const taskFile = parseTaskFile(data, path);
  const registry = createRegistry(taskFile);
  log(`Loaded ${registry.size} task(s)`);
  return { env: taskFile.env, path, registry };
}
