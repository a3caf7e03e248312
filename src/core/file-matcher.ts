import { readdirSync, statSync } from "node:fs";
import { posix, resolve, sep } from "node:path";
import debug from "debug";
import micromatch from "micromatch";

const log = debug("makeshift:files");

const CURRENT_DIR_PREFIX = "./";

export class FileMatcher {
  private readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  isPattern(reference: string): boolean {
    return micromatch.scan(stripCurrentDir(reference)).isGlob;
  }

  /**
   * Expands a glob to the files it matches, relative to the working
   * directory, sorted. A pattern matching nothing yields an empty list.
   */
  expand(pattern: string): string[] {
    const normalized = stripCurrentDir(pattern);
    const { base } = micromatch.scan(normalized);
    const candidates = this.listFiles(base);
    const matches = micromatch(candidates, normalized, { dot: true }).sort();
    log(`Expanded ${pattern} to ${matches.length} file(s)`);
    return matches;
  }

  /**
   * Removes the entries matching an exclusion (an exact path or a glob)
   */
  exclude(files: string[], excludePattern: string): string[] {
    const normalized = stripCurrentDir(excludePattern);
    if (this.isPattern(normalized)) {
      const toRemove = new Set(micromatch(files, normalized, { dot: true }));
      return files.filter((file) => !toRemove.has(file));
    }
    return files.filter((file) => stripCurrentDir(file) !== normalized);
  }

  private listFiles(base: string): string[] {
    const root = resolve(this.cwd, base || ".");
    let entries: string[];
    try {
      entries = readdirSync(root, { encoding: "utf8", recursive: true });
    } catch (error) {
      if (isMissingPath(error)) {
        log(`Glob base ${root} does not exist`);
        return [];
      }
      throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
      // Dangling symlinks stat as missing.
      const stats = statSync(resolve(root, entry), { throwIfNoEntry: false });
      if (!stats?.isFile()) {
        continue;
      }
      const relative = entry.split(sep).join("/");
      files.push(base ? posix.join(base, relative) : relative);
    }
    return files;
  }
}

function stripCurrentDir(reference: string): string {
  return reference.startsWith(CURRENT_DIR_PREFIX)
    ? reference.slice(CURRENT_DIR_PREFIX.length)
    : reference;
}

function isMissingPath(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
