import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { emptyConfig, resolveOptions } from "../config/loader.js";
import type { PortseedConfig, ResolvedOptions, SelectionInputs } from "../config/types.js";
import { fingerprint, lockfilePath, readLockfile } from "../lockfile/store.js";
import { scanPortKeys } from "../scan/scanner.js";
import { isPortFree, parseRange, rangeSize, type IsFree, type PortRange } from "../utils/port.js";
import { errorMessage, isCancellation } from "./errors.js";

const SMALL_RANGE = 10;

export type CheckStatus = "ok" | "warn" | "fatal";

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  /** 0 when healthy, 1 with warnings, 2 with fatal findings. */
  exitCode: 0 | 1 | 2;
}

export interface DoctorOptions extends SelectionInputs {
  cwd: string;
  config?: PortseedConfig;
  environ?: Record<string, string | undefined>;
  isFree?: IsFree;
  signal?: AbortSignal;
  /** Errors raised while loading config, reported instead of thrown. */
  configError?: string;
}

function configCheck(config: PortseedConfig, configError?: string): DoctorCheck {
  if (configError) {
    return { name: "config", status: "fatal", message: configError };
  }
  if (config.warnings.length > 0) {
    return { name: "config", status: "warn", message: config.warnings.join("; ") };
  }
  return { name: "config", status: "ok", message: "configuration parsed successfully" };
}

function rangeCheck(range: PortRange): DoctorCheck {
  const size = rangeSize(range);
  const message = `range ${range.start}-${range.end} (size=${size})`;
  if (size < SMALL_RANGE) {
    return { name: "range", status: "warn", message: `${message}; very small range may cause collisions` };
  }
  return { name: "range", status: "ok", message };
}

async function availabilityCheck(range: PortRange, isFree: IsFree): Promise<DoctorCheck> {
  const sample = [range.start, Math.floor((range.start + range.end) / 2), range.end];
  let free = 0;
  for (const port of sample) {
    if (await isFree(port)) free++;
  }
  if (free === 0) {
    return { name: "port_availability", status: "fatal", message: "no sampled ports are available" };
  }
  if (free < sample.length) {
    return { name: "port_availability", status: "warn", message: `${free}/${sample.length} sampled ports are available` };
  }
  return { name: "port_availability", status: "ok", message: "sampled ports are available" };
}

function lockfileCheck(cwd: string): DoctorCheck {
  const path = lockfilePath(cwd);
  if (!existsSync(path)) {
    return { name: "lockfile", status: "ok", message: "no lockfile present" };
  }
  try {
    const lock = readLockfile(path);
    if (lock.cwd_fingerprint !== fingerprint(cwd)) {
      return { name: "lockfile", status: "warn", message: "lockfile cwd fingerprint mismatch" };
    }
    return {
      name: "lockfile",
      status: "ok",
      message: `lockfile version=${lock.version} assignments=${lock.assignments.length}`,
    };
  } catch (err) {
    return { name: "lockfile", status: "warn", message: errorMessage(err) };
  }
}

export async function runDoctor(options: DoctorOptions): Promise<DoctorReport> {
  const cwd = resolve(options.cwd);
  const config = options.config ?? emptyConfig();
  const checks: DoctorCheck[] = [configCheck(config, options.configError)];

  let resolved: ResolvedOptions;
  try {
    resolved = resolveOptions(config, options);
  } catch (err) {
    checks.push({ name: "options", status: "fatal", message: errorMessage(err) });
    return { checks, exitCode: 2 };
  }

  let range: PortRange | undefined;
  try {
    range = parseRange(resolved.range);
    checks.push(rangeCheck(range));
  } catch (err) {
    checks.push({ name: "range", status: "fatal", message: errorMessage(err) });
  }

  const started = Date.now();
  try {
    const { discoveries, stats } = await scanPortKeys({
      cwd,
      environ: options.environ ?? {},
      ignores: resolved.ignores,
      includes: resolved.includes,
      ignoreDirs: resolved.ignoreDirs,
      maxDepth: resolved.maxDepth,
      signal: options.signal,
    });
    const elapsed = Date.now() - started;
    let message = `found ${discoveries.length} keys in ${elapsed}ms; files=${stats.filesVisited} env_files=${stats.envFilesParsed}`;
    if (stats.skippedMaxDepth > 0) {
      message += `; max_depth skipped ${stats.skippedMaxDepth} directories`;
      checks.push({ name: "scan", status: "warn", message });
    } else {
      checks.push({ name: "scan", status: "ok", message });
    }
  } catch (err) {
    if (isCancellation(err)) throw err;
    checks.push({ name: "scan", status: "fatal", message: errorMessage(err) });
  }

  if (range) {
    checks.push(await availabilityCheck(range, options.isFree ?? isPortFree));
  }
  checks.push(lockfileCheck(cwd));

  const exitCode = checks.some((c) => c.status === "fatal")
    ? 2
    : checks.some((c) => c.status === "warn")
      ? 1
      : 0;
  return { checks, exitCode };
}
