import { resolve } from "node:path";
import { emptyConfig, resolveOptions } from "../config/loader.js";
import type { PortseedConfig, ResolvedOptions, SelectionInputs } from "../config/types.js";
import { parseTargetEnvs } from "../link/directive.js";
import { resolveLinks, type LinkRewrite } from "../link/resolver.js";
import { lockfilePath, loadTrustedLockfile } from "../lockfile/store.js";
import { scanPortKeys, type Discovery, type ScanStats } from "../scan/scanner.js";
import { selectKeys, type Decision } from "../scan/selection.js";
import { createBranchCache, type BranchResolver } from "../utils/branch.js";
import { parseRange, type IsFree, type PortRange } from "../utils/port.js";
import { assignPorts, toOverrides, type Assignment } from "./allocate.js";
import { deriveSeed } from "./seed.js";

export interface PlanOptions extends SelectionInputs {
  cwd: string;
  config?: PortseedConfig;
  namespace?: string;
  seed?: number;
  seedBranch?: boolean;
  branch?: string;
  manualKeys?: string[];
  targetEnvs?: string[];
  useLock?: boolean;
  environ?: Record<string, string | undefined>;
  isFree?: IsFree;
  resolveBranch?: BranchResolver;
  signal?: AbortSignal;
}

export interface Plan {
  cwd: string;
  seed: number;
  range: PortRange;
  rangeSpec: string;
  resolved: ResolvedOptions;
  discoveries: Discovery[];
  stats: ScanStats;
  decisions: Decision[];
  keys: string[];
  assignments: Assignment[];
  rewrites: LinkRewrite[];
  /** Assigned ports plus rewritten link values, keyed by env name. */
  overrides: Record<string, string>;
  warnings: string[];
}

/**
 * Runs one full resolution for a project: seed, scan, selection,
 * allocation (or lockfile substitution) and link rewrites.
 */
export async function buildPlan(options: PlanOptions): Promise<Plan> {
  const cwd = resolve(options.cwd);
  const config = options.config ?? emptyConfig();
  const environ = options.environ ?? {};

  const resolved = resolveOptions(config, options);
  const range = parseRange(resolved.range);
  const directives = parseTargetEnvs(options.targetEnvs ?? []);
  const warnings = [...resolved.warnings];

  const branches = createBranchCache(options.resolveBranch);
  const derived = deriveSeed(
    {
      cwd,
      namespace: options.namespace,
      seed: options.seed,
      seedBranch: options.seedBranch,
      branch: options.branch,
    },
    branches,
  );
  warnings.push(...derived.warnings);

  const { discoveries, stats } = await scanPortKeys({
    cwd,
    environ,
    ignores: resolved.ignores,
    includes: resolved.includes,
    ignoreDirs: resolved.ignoreDirs,
    maxDepth: resolved.maxDepth,
    signal: options.signal,
  });

  const { keys, decisions } = selectKeys(discoveries, {
    includes: resolved.includes,
    excludes: resolved.excludes,
    manual: options.manualKeys,
  });

  let locked: Map<string, string> | undefined;
  if (options.useLock) {
    const trusted = loadTrustedLockfile(cwd, options.range);
    locked = trusted.locked;
    warnings.push(...trusted.warnings);
  }

  const assignments = await assignPorts(keys, {
    seed: derived.seed,
    range,
    isFree: options.isFree,
    locked,
    lockPath: lockfilePath(cwd),
  });

  const links = await resolveLinks(
    {
      cwd,
      range,
      environ,
      ignoreDirs: resolved.ignoreDirs,
      maxDepth: resolved.maxDepth,
      signal: options.signal,
      branch: options.branch,
      seedBranch: options.seedBranch,
      branches,
    },
    { directives, links: config.links },
  );
  warnings.push(...links.warnings);

  return {
    cwd,
    seed: derived.seed,
    range,
    rangeSpec: resolved.range,
    resolved,
    discoveries,
    stats,
    decisions,
    keys,
    assignments,
    rewrites: links.rewrites,
    overrides: { ...toOverrides(assignments), ...links.overrides },
    warnings,
  };
}
