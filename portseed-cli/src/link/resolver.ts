import { readFile } from "node:fs/promises";
import { statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { LinkRule } from "../config/types.js";
import { errorMessage, isCancellation } from "../core/errors.js";
import { isMissingLockfile, lockfilePath, readLockfile, type LockAssignment } from "../lockfile/store.js";
import { environToEntries, isEnvFileName, isPortKey, normalizeEnvKey, parseDotenv } from "../scan/dotenv.js";
import { scanPortKeys } from "../scan/scanner.js";
import { walkProject } from "../scan/walk.js";
import type { BranchCache } from "../utils/branch.js";
import {
  parseRange,
  preferredPort,
  seedFor,
  withBranch,
  type PortRange,
} from "../utils/port.js";
import type { TargetEnvDirective } from "./directive.js";
import { parseLoopbackUrl, replaceLoopbackPort } from "./url.js";

const FALLBACK_TARGET_KEYS = ["APP_PORT", "PORT"];

export interface LinkCandidate {
  sourceKey: string;
  targetRepo: string;
  targetPortKey?: string;
  targetNamespace?: string;
  sameBranch: boolean;
  description: string;
}

export type PortSource = "lockfile" | "deterministic";

export interface LinkRewrite {
  sourceKey: string;
  oldValue: string;
  newValue: string;
  targetRepo: string;
  targetKey: string;
  portSource: PortSource;
}

export type TargetPort =
  | { kind: "lockfile"; port: number; key: string }
  | { kind: "deterministic"; port: number; key: string }
  | { kind: "unresolved"; reason: string };

export interface LinkContext {
  cwd: string;
  /** Range used for deterministic targets whose lockfile does not name one. */
  range: PortRange;
  environ: Record<string, string | undefined>;
  ignoreDirs?: string[];
  maxDepth?: number;
  signal?: AbortSignal;
  /** Explicit branch of the current project; skips the resolver for it. */
  branch?: string;
  seedBranch?: boolean;
  branches: BranchCache;
}

export interface LinkInputs {
  directives: TargetEnvDirective[];
  links: LinkRule[];
}

export interface LinkResult {
  rewrites: LinkRewrite[];
  overrides: Record<string, string>;
  warnings: string[];
}

/** Current-project values keyed case-insensitively, first occurrence wins. */
export class SourceSnapshot {
  private byNorm = new Map<string, { key: string; value: string }>();

  add(key: string, value: string): void {
    const norm = normalizeEnvKey(key);
    if (this.byNorm.has(norm)) return;
    this.byNorm.set(norm, { key, value });
  }

  lookup(key: string): { key: string; value: string } | undefined {
    return this.byNorm.get(normalizeEnvKey(key));
  }

  entries(): Array<{ key: string; value: string }> {
    return [...this.byNorm.values()];
  }
}

export async function collectSourceValues(
  ctx: LinkContext,
): Promise<{ snapshot: SourceSnapshot; warnings: string[] }> {
  const snapshot = new SourceSnapshot();
  const warnings: string[] = [];

  for (const [key, value] of environToEntries(ctx.environ)) {
    snapshot.add(key, value);
  }

  await walkProject(
    ctx.cwd,
    { ignoreDirs: ctx.ignoreDirs, maxDepth: ctx.maxDepth, signal: ctx.signal },
    async (entry) => {
      if (!isEnvFileName(entry.name)) return;
      let content: string;
      try {
        content = await readFile(entry.path, "utf-8");
      } catch (err) {
        warnings.push(`source env read failed (${entry.rel}): ${errorMessage(err)}`);
        return;
      }
      for (const [key, value] of parseDotenv(content)) {
        snapshot.add(key, value);
      }
    },
  );

  return { snapshot, warnings };
}

async function inferSmartCandidates(
  ctx: LinkContext,
  directive: Extract<TargetEnvDirective, { mode: "smart" }>,
  snapshot: SourceSnapshot,
): Promise<{ candidates: LinkCandidate[]; warnings: string[] }> {
  const description = `target-env smart (${directive.raw})`;
  const targetPath = resolve(ctx.cwd, directive.envPath);

  let content: string;
  try {
    content = await readFile(targetPath, "utf-8");
  } catch (err) {
    return { candidates: [], warnings: [`${description}: open failed: ${errorMessage(err)}`] };
  }

  const portToKeys = new Map<number, string[]>();
  const seen = new Set<string>();
  for (const [key, value] of parseDotenv(content)) {
    if (seen.has(key)) continue;
    seen.add(key);
    if (!isPortKey(key) || !/^\d+$/.test(value)) continue;
    const port = parseInt(value, 10);
    portToKeys.set(port, [...(portToKeys.get(port) ?? []), key]);
  }

  const candidates: LinkCandidate[] = [];
  const warnings: string[] = [];
  for (const { key, value } of snapshot.entries()) {
    const parsed = parseLoopbackUrl(value);
    if (!parsed.ok) continue;
    const targetKeys = portToKeys.get(parsed.url.port) ?? [];
    if (targetKeys.length === 0) continue;
    if (targetKeys.length > 1) {
      warnings.push(`${description}: source "${key}" matched multiple target keys [${targetKeys.join(" ")}]`);
      continue;
    }
    candidates.push({
      sourceKey: key,
      targetRepo: dirname(targetPath),
      targetPortKey: targetKeys[0],
      sameBranch: true,
      description,
    });
  }

  if (candidates.length === 0) {
    warnings.push(`${description}: no matching localhost URL keys found`);
  }
  return { candidates, warnings };
}

/**
 * Merges explicit directives, config links and smart directives, in that
 * priority. The first candidate for a (case-insensitive) source key wins.
 */
export async function buildCandidates(
  ctx: LinkContext,
  inputs: LinkInputs,
  snapshot: SourceSnapshot,
): Promise<{ candidates: LinkCandidate[]; warnings: string[] }> {
  const all: LinkCandidate[] = [];
  const warnings: string[] = [];

  for (const directive of inputs.directives) {
    if (directive.mode !== "explicit") continue;
    all.push({
      sourceKey: directive.sourceKey,
      targetRepo: dirname(resolve(ctx.cwd, directive.envPath)),
      targetPortKey: directive.targetPortKey,
      sameBranch: true,
      description: `target-env explicit (${directive.raw})`,
    });
  }

  inputs.links.forEach((link, i) => {
    all.push({
      sourceKey: link.sourceKey,
      targetRepo: link.targetRepo,
      targetPortKey: link.targetPortKey,
      targetNamespace: link.targetNamespace,
      sameBranch: link.sameBranch ?? true,
      description: `config link[${i}]`,
    });
  });

  for (const directive of inputs.directives) {
    if (directive.mode !== "smart") continue;
    const inferred = await inferSmartCandidates(ctx, directive, snapshot);
    warnings.push(...inferred.warnings);
    all.push(...inferred.candidates);
  }

  const seen = new Set<string>();
  const candidates = all.filter((candidate) => {
    const norm = normalizeEnvKey(candidate.sourceKey);
    if (seen.has(norm)) return false;
    seen.add(norm);
    return true;
  });

  return { candidates, warnings };
}

export function chooseTargetKey<T>(
  items: T[],
  keyOf: (item: T) => string,
  requested?: string,
): { item: T; index: number } | undefined {
  const wanted = requested ? [requested] : FALLBACK_TARGET_KEYS;
  for (const want of wanted) {
    const index = items.findIndex((item) => keyOf(item).toUpperCase() === want.toUpperCase());
    if (index >= 0) return { item: items[index], index };
  }
  return undefined;
}

function describeWanted(requested?: string): string {
  return requested ? `"${requested}"` : "APP_PORT/PORT";
}

function fromLockfile(
  targetRepo: string,
  requested: string | undefined,
): { hit?: TargetPort; range?: PortRange; warnings: string[] } {
  const path = lockfilePath(targetRepo);
  let assignments: LockAssignment[];
  let range: PortRange | undefined;
  try {
    const lock = readLockfile(path);
    assignments = lock.assignments;
    try {
      range = parseRange(lock.range);
    } catch {
      range = undefined;
    }
  } catch (err) {
    if (isMissingLockfile(err)) return { warnings: [] };
    return {
      warnings: [`target lockfile read failed for "${path}": ${errorMessage(err)}; falling back to deterministic lookup`],
    };
  }

  const chosen = chooseTargetKey(assignments, (a) => a.key, requested);
  if (!chosen) {
    return {
      range,
      warnings: [`target lockfile "${path}" missing key ${describeWanted(requested)}; falling back to deterministic lookup`],
    };
  }
  if (!/^\d+$/.test(chosen.item.value)) {
    return {
      range,
      warnings: [`target lockfile "${path}" contains non-numeric value for "${chosen.item.key}"`],
    };
  }
  return {
    hit: { kind: "lockfile", port: parseInt(chosen.item.value, 10), key: chosen.item.key },
    range,
    warnings: [],
  };
}

export function computeRepoSeed(
  repoDir: string,
  namespace: string,
  seedBranch: boolean,
  branches: BranchCache,
): { seed: number; warnings: string[] } {
  if (!seedBranch) {
    return { seed: seedFor(repoDir, namespace), warnings: [] };
  }
  const lookup = branches(repoDir);
  if (!lookup.ok) {
    return {
      seed: seedFor(repoDir, namespace),
      warnings: [
        `seed-branch enabled but branch resolution failed for ${repoDir}: ${lookup.error}; falling back to non-branch seed`,
      ],
    };
  }
  return { seed: seedFor(repoDir, withBranch(namespace, lookup.branch)), warnings: [] };
}

/**
 * Lockfile first, then the target's own deterministic formula, without
 * probing.
 */
export async function resolveTargetPort(
  ctx: LinkContext,
  candidate: LinkCandidate,
  targetRepo: string,
): Promise<{ result: TargetPort; warnings: string[] }> {
  const lock = fromLockfile(targetRepo, candidate.targetPortKey);
  const warnings = [...lock.warnings];
  if (lock.hit) {
    return { result: lock.hit, warnings };
  }

  const { discoveries } = await scanPortKeys({
    cwd: targetRepo,
    environ: {},
    ignoreDirs: ctx.ignoreDirs,
    maxDepth: ctx.maxDepth,
    signal: ctx.signal,
  });
  const chosen = chooseTargetKey(discoveries, (d) => d.key, candidate.targetPortKey);
  if (!chosen) {
    const reason = candidate.targetPortKey
      ? `target key "${candidate.targetPortKey}" was not discovered in "${targetRepo}"`
      : `neither APP_PORT nor PORT was discovered in "${targetRepo}"`;
    return { result: { kind: "unresolved", reason }, warnings };
  }

  const { seed, warnings: seedWarnings } = computeRepoSeed(
    targetRepo,
    candidate.targetNamespace ?? "",
    ctx.seedBranch === true,
    ctx.branches,
  );
  warnings.push(...seedWarnings);

  const port = preferredPort(seed, chosen.index, lock.range ?? ctx.range);
  return { result: { kind: "deterministic", port, key: chosen.item.key }, warnings };
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

type Step<T> = { ok: true; value: T } | { ok: false; warning: string };

function checkBranches(ctx: LinkContext, candidate: LinkCandidate, targetRepo: string, sourceKey: string): Step<void> {
  const explicit = ctx.branch?.trim();
  let sourceBranch: string;
  if (explicit) {
    sourceBranch = explicit;
  } else {
    const source = ctx.branches(ctx.cwd);
    if (!source.ok) {
      return { ok: false, warning: `${candidate.description}: source branch resolution failed: ${source.error}` };
    }
    sourceBranch = source.branch;
  }

  const target = ctx.branches(targetRepo);
  if (!target.ok) {
    return {
      ok: false,
      warning: `${candidate.description}: target branch resolution failed for "${targetRepo}": ${target.error}`,
    };
  }
  if (target.branch !== sourceBranch) {
    return {
      ok: false,
      warning: `${candidate.description}: branch mismatch source="${sourceBranch}" target="${target.branch}"; skipping ${sourceKey}`,
    };
  }
  return { ok: true, value: undefined };
}

async function resolveCandidate(
  ctx: LinkContext,
  candidate: LinkCandidate,
  snapshot: SourceSnapshot,
  warnings: string[],
): Promise<LinkRewrite | undefined> {
  const skip = (message: string): undefined => {
    warnings.push(`${candidate.description}: ${message}`);
    return undefined;
  };

  const source = snapshot.lookup(candidate.sourceKey);
  if (!source) {
    return skip(`source key "${candidate.sourceKey}" not found`);
  }
  const parsed = parseLoopbackUrl(source.value);
  if (!parsed.ok) {
    return skip(`source key "${source.key}" is not a localhost URL (${parsed.reason})`);
  }

  const targetRepo = resolve(ctx.cwd, candidate.targetRepo);
  if (!isDirectory(targetRepo)) {
    return skip(`target repo "${targetRepo}" is unavailable`);
  }

  if (candidate.sameBranch) {
    const branchCheck = checkBranches(ctx, candidate, targetRepo, source.key);
    if (!branchCheck.ok) {
      warnings.push(branchCheck.warning);
      return undefined;
    }
  }

  let target: TargetPort;
  try {
    const resolved = await resolveTargetPort(ctx, candidate, targetRepo);
    warnings.push(...resolved.warnings);
    target = resolved.result;
  } catch (err) {
    if (isCancellation(err)) throw err;
    return skip(`resolve target port for "${source.key}" failed: ${errorMessage(err)}`);
  }
  if (target.kind === "unresolved") {
    return skip(`resolve target port for "${source.key}" failed: ${target.reason}`);
  }

  return {
    sourceKey: source.key,
    oldValue: source.value,
    newValue: replaceLoopbackPort(source.value, target.port),
    targetRepo,
    targetKey: target.key,
    portSource: target.kind,
  };
}

/**
 * Rewrites loopback URLs of the current project so they point at the ports
 * other repositories resolve to. A failing candidate only produces a
 * warning; cancellation still propagates.
 */
export async function resolveLinks(ctx: LinkContext, inputs: LinkInputs): Promise<LinkResult> {
  if (inputs.directives.length === 0 && inputs.links.length === 0) {
    return { rewrites: [], overrides: {}, warnings: [] };
  }

  const { snapshot, warnings } = await collectSourceValues(ctx);
  const built = await buildCandidates(ctx, inputs, snapshot);
  warnings.push(...built.warnings);

  const rewrites: LinkRewrite[] = [];
  const overrides: Record<string, string> = {};
  for (const candidate of built.candidates) {
    const rewrite = await resolveCandidate(ctx, candidate, snapshot, warnings);
    if (!rewrite) continue;
    overrides[rewrite.sourceKey] = rewrite.newValue;
    rewrites.push(rewrite);
  }

  return { rewrites, overrides, warnings };
}
