import { createServer } from "node:net";
import { resolve, sep } from "node:path";
import { NoFreePortError, ValidationError } from "../core/errors.js";

export const DEFAULT_RANGE = "10000-20000";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const MIN_PORT = 1;
const MAX_PORT = 65535;

export interface PortRange {
  start: number;
  end: number;
}

export type IsFree = (port: number) => boolean | Promise<boolean>;

export interface ProbeResult {
  preferred: number;
  assigned: number;
  probes: number;
}

// FNV-1a, 32-bit, over the UTF-8 bytes of the input
export function fnv1a32(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(text, "utf-8")) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function canonicalPath(path: string): string {
  return resolve(path).split(sep).join("/");
}

export function hashPath(path: string): number {
  return fnv1a32(canonicalPath(path));
}

export function seedFor(path: string, namespace = ""): number {
  if (!namespace) return hashPath(path);
  return fnv1a32(`${canonicalPath(path)}#${namespace}`);
}

export function withBranch(namespace: string, branch: string): string {
  return `${namespace}@${branch}`;
}

export function parseRange(spec: string): PortRange {
  const parts = spec.split("-");
  if (parts.length !== 2) {
    throw new ValidationError(`invalid range format "${spec}", expected start-end`);
  }
  const [rawStart, rawEnd] = parts.map((p) => p.trim());
  if (!/^\d+$/.test(rawStart)) {
    throw new ValidationError(`invalid start port "${rawStart}"`);
  }
  if (!/^\d+$/.test(rawEnd)) {
    throw new ValidationError(`invalid end port "${rawEnd}"`);
  }
  const start = parseInt(rawStart, 10);
  const end = parseInt(rawEnd, 10);
  if (start < MIN_PORT || start > MAX_PORT) {
    throw new ValidationError(`invalid start port "${rawStart}": must be between ${MIN_PORT} and ${MAX_PORT}`);
  }
  if (end < MIN_PORT || end > MAX_PORT) {
    throw new ValidationError(`invalid end port "${rawEnd}": must be between ${MIN_PORT} and ${MAX_PORT}`);
  }
  if (start > end) {
    throw new ValidationError(
      `start port ${start} must be less than or equal to end port ${end}`,
    );
  }
  return { start, end };
}

export function rangeSize(range: PortRange): number {
  return range.end - range.start + 1;
}

export function preferredPort(seed: number, index: number, range: PortRange): number {
  const size = rangeSize(range);
  if (size <= 0) {
    throw new ValidationError(`invalid range size: ${size}`);
  }
  return range.start + ((seed + index) % size);
}

/**
 * Walks the range circularly from the preferred slot and returns the first
 * port the predicate accepts. One attempt per port, one full pass at most.
 */
export async function findDeterministic(
  key: string,
  seed: number,
  index: number,
  range: PortRange,
  isFree: IsFree = isPortFree,
): Promise<ProbeResult> {
  const size = rangeSize(range);
  if (size <= 0) {
    throw new ValidationError(`invalid range size: ${size}`);
  }
  const preferred = preferredPort(seed, index, range);
  const base = seed + index;

  for (let i = 0; i < size; i++) {
    const port = range.start + ((base + i) % size);
    if (await isFree(port)) {
      return { preferred, assigned: port, probes: i };
    }
  }

  throw new NoFreePortError(key, range.start, range.end);
}

// Bind-and-release snapshot; nothing stays reserved once it resolves.
export function isPortFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.once("error", () => resolve(false));
    try {
      server.listen(port, () => {
        server.close(() => resolve(true));
      });
    } catch {
      // out-of-range ports throw synchronously
      resolve(false);
    }
  });
}
