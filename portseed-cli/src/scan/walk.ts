import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { ScanCancelledError } from "../core/errors.js";

export interface WalkOptions {
  ignoreDirs?: string[];
  /** Maximum directory depth below the root; 0 means unlimited. */
  maxDepth?: number;
  signal?: AbortSignal;
}

export interface WalkStats {
  filesVisited: number;
  envFilesParsed: number;
  skippedIgnore: number;
  skippedMaxDepth: number;
}

export interface WalkEntry {
  path: string;
  /** Path relative to the walk root, always with "/" separators. */
  rel: string;
  name: string;
}

export type WalkVisitor = (entry: WalkEntry, stats: WalkStats) => void | Promise<void>;

export function emptyStats(): WalkStats {
  return { filesVisited: 0, envFilesParsed: 0, skippedIgnore: 0, skippedMaxDepth: 0 };
}

export function isHiddenDir(name: string): boolean {
  return name.startsWith(".") && name !== ".";
}

function checkSignal(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ScanCancelledError();
  }
}

function toRel(root: string, path: string): string {
  return relative(root, path).split(sep).join("/");
}

/**
 * Depth-first, lexicographic walk shared by the key scanner and the link
 * resolver's source collector. The visitor sees files only.
 */
export async function walkProject(
  root: string,
  options: WalkOptions,
  visit: WalkVisitor,
): Promise<WalkStats> {
  const stats = emptyStats();
  const ignoreDirs = new Set((options.ignoreDirs ?? []).filter(Boolean));
  const maxDepth = options.maxDepth ?? 0;

  const walkDir = async (dir: string, depth: number): Promise<void> => {
    checkSignal(options.signal);

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      checkSignal(options.signal);
      const path = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (isHiddenDir(entry.name)) continue;
        if (ignoreDirs.has(entry.name)) {
          stats.skippedIgnore++;
          continue;
        }
        // depth of a directory is the number of separators in its relative path
        const childDepth = depth + 1;
        if (maxDepth > 0 && childDepth > maxDepth) {
          stats.skippedMaxDepth++;
          continue;
        }
        await walkDir(path, childDepth);
        continue;
      }

      if (!entry.isFile()) continue;
      stats.filesVisited++;
      await visit({ path, rel: toRel(root, path), name: entry.name }, stats);
    }
  };

  await walkDir(root, -1);
  return stats;
}
