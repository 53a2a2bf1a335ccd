/**
 * Compose project discovery.
 * Walks a directory tree to a bounded depth and collects compose files.
 */

import { readdirSync, statSync, type Dirent, type Stats } from "fs";
import path from "path";
import { COMPOSE_FILENAMES } from "../infrastructure/compose";
import { ConfigError, NotFoundError } from "../errors";
import type { ProjectDefinition } from "../types";
import { getErrorCode, getErrorMessage } from "../utils/helpers";
import { logger } from "../utils/logger";

export type WarningHandler = (
  message: string,
  details?: Record<string, string>,
) => void;

export type DiscoverOptions = {
  onWarning?: WarningHandler;
  /** Lists a directory; defaults to `readdirSync` with file types */
  readDir?: (dir: string) => Dirent[];
};

function readEntries(dir: string): Dirent[] {
  return readdirSync(dir, { withFileTypes: true });
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function statRoot(root: string): Stats {
  try {
    return statSync(root);
  } catch (err) {
    if (getErrorCode(err) === "ENOENT") {
      throw new NotFoundError(root, "Root directory not found");
    }
    throw err;
  }
}

/**
 * Find compose project definitions under `root`.
 *
 * `maxDepth` counts directory levels below root: 0 searches root only,
 * 1 also its immediate subdirectories. Results are in depth-first order
 * with entries sorted by name; symbolic links are never followed.
 */
export function discoverProjects(
  root: string,
  maxDepth: number,
  options: DiscoverOptions = {},
): ProjectDefinition[] {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new ConfigError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }

  const rootDir = path.resolve(root);
  if (!statRoot(rootDir).isDirectory()) {
    throw new NotFoundError(rootDir, "Root is not a directory");
  }

  const warn: WarningHandler =
    options.onWarning ?? ((message, details) => logger.warn(message, details));
  const readDir = options.readDir ?? readEntries;
  const found: ProjectDefinition[] = [];

  const visit = (dir: string, depth: number): void => {
    let entries: Dirent[];
    try {
      entries = readDir(dir);
    } catch (err) {
      if (dir === rootDir) {
        throw new NotFoundError(rootDir, "Root directory is not readable");
      }
      warn("Skipping unreadable directory", {
        Directory: dir,
        Error: getErrorMessage(err),
      });
      return;
    }

    entries.sort(byName);

    const files = new Set(entries.filter((e) => e.isFile()).map((e) => e.name));
    const matches = COMPOSE_FILENAMES.filter((name) => files.has(name));

    if (matches.length > 0) {
      if (matches.length > 1) {
        warn("Multiple compose files in one directory", {
          Directory: dir,
          Using: matches[0],
          Ignored: matches.slice(1).join(", "),
        });
      }
      found.push({
        projectId: path.basename(dir),
        dir,
        file: path.join(dir, matches[0]),
      });
    }

    if (depth >= maxDepth) return;

    for (const entry of entries) {
      if (entry.isDirectory()) {
        visit(path.join(dir, entry.name), depth + 1);
      }
    }
  };

  visit(rootDir, 0);
  return found;
}
