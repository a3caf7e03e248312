import ansis from "ansis";
import type { HelpRow } from "../types";
import type { TaskRegistry } from "./registry";

const SEPARATOR = "|";

export type RenderOptions = {
  color?: boolean;
};

/**
 * Read-only listing of the tasks that carry a documentation string
 */
export class HelpCatalog {
  private readonly registry: TaskRegistry;

  constructor(registry: TaskRegistry) {
    this.registry = registry;
  }

  rows(): HelpRow[] {
    const rows: HelpRow[] = [];
    for (const task of this.registry.all()) {
      if (task.doc !== undefined) {
        rows.push({ doc: task.doc, name: task.name });
      }
    }
    return rows.sort((a, b) => compareNames(a.name, b.name));
  }

  render(options: RenderOptions = {}): string[] {
    const rows = this.rows();
    const width = Math.max(0, ...rows.map((row) => row.name.length));
    const color = options.color ?? true;

    return rows.map((row) => {
      const name = row.name.padEnd(width);
      return color
        ? `${ansis.cyan(name)} ${ansis.gray(SEPARATOR)} ${row.doc}`
        : `${name} ${SEPARATOR} ${row.doc}`;
    });
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
