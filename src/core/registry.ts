import debug from "debug";
import type { Task, TaskInput } from "../types";

const log = debug("makeshift:registry");

export class TaskRegistry {
  // Map keeps insertion order, and set() on an existing key keeps its position.
  private readonly tasks = new Map<string, Task>();
  private defaultName: string | undefined;

  /**
   * Insert a task, replacing any earlier task of the same name
   */
  define(input: TaskInput): Task {
    const task = normalizeTask(input);
    if (this.tasks.has(task.name)) {
      log(`Redefining task ${task.name}`);
    }
    this.tasks.set(task.name, task);
    return task;
  }

  lookup(name: string): Task | undefined {
    return this.tasks.get(name);
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  all(): Task[] {
    return Array.from(this.tasks.values());
  }

  get size(): number {
    return this.tasks.size;
  }

  setDefault(name: string): void {
    this.defaultName = name;
  }

  /**
   * The configured default target, or the first declared task
   */
  defaultTarget(): string | undefined {
    if (this.defaultName !== undefined) {
      return this.defaultName;
    }
    const first = this.tasks.keys().next();
    return first.done ? undefined : first.value;
  }
}

function normalizeTask(input: TaskInput): Task {
  const task: Task = {
    name: input.name,
    phony: input.phony ?? false,
    prerequisites: [...(input.prerequisites ?? [])],
  };
  if (input.action && input.action.length > 0) {
    task.action = [...input.action];
  }
  if (input.output !== undefined) {
    task.output = input.output;
  }
  if (input.env !== undefined) {
    task.env = { ...input.env };
  }
  if (input.doc !== undefined) {
    task.doc = input.doc;
  }
  return task;
}

/**
 * The file a task's freshness is measured against
 */
export function outputOf(task: Task): string {
  return task.output ?? task.name;
}

export function hasAction(task: Task): boolean {
  return task.action !== undefined && task.action.length > 0;
}
