import { readFile } from "node:fs/promises";
import { environToEntries, isEnvFileName, isPortKey, parseDotenv } from "./dotenv.js";
import { walkProject, type WalkStats } from "./walk.js";

export type DiscoverySource = "env" | "default" | "manual" | (string & {});

export interface Discovery {
  key: string;
  source: DiscoverySource;
  /** Set when an ignore prefix matched but the include list kept the key. */
  ignoredBy?: string;
}

export type ScanStats = WalkStats;

export interface ScanOptions {
  cwd: string;
  environ?: Record<string, string | undefined>;
  ignores?: string[];
  includes?: string[];
  ignoreDirs?: string[];
  maxDepth?: number;
  signal?: AbortSignal;
}

export interface ScanResult {
  discoveries: Discovery[];
  stats: ScanStats;
}

function matchIgnore(key: string, ignores: string[]): string | undefined {
  return ignores.find((prefix) => prefix !== "" && key.startsWith(prefix));
}

export async function scanPortKeys(options: ScanOptions): Promise<ScanResult> {
  const ignores = options.ignores ?? [];
  const includes = new Set(options.includes ?? []);
  const found = new Map<string, Discovery>();

  const consider = (key: string, source: string): void => {
    if (!isPortKey(key) || found.has(key)) return;
    const ignoredBy = matchIgnore(key, ignores);
    if (ignoredBy === undefined) {
      found.set(key, { key, source });
    } else if (includes.has(key)) {
      found.set(key, { key, source, ignoredBy });
    }
  };

  for (const [key] of environToEntries(options.environ ?? {})) {
    consider(key, "env");
  }

  const stats = await walkProject(
    options.cwd,
    { ignoreDirs: options.ignoreDirs, maxDepth: options.maxDepth, signal: options.signal },
    async (entry, walkStats) => {
      if (!isEnvFileName(entry.name)) return;
      walkStats.envFilesParsed++;

      let content: string;
      try {
        content = await readFile(entry.path, "utf-8");
      } catch {
        return;
      }
      for (const [key] of parseDotenv(content)) {
        consider(key, entry.rel);
      }
    },
  );

  consider("PORT", "default");

  const discoveries = [...found.values()].sort((a, b) => compareKeys(a.key, b.key));
  return { discoveries, stats };
}

export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortKeys(keys: Iterable<string>): string[] {
  return [...keys].sort(compareKeys);
}
