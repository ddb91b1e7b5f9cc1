import { LockfileError } from "./errors.js";
import { sortKeys } from "../scan/scanner.js";
import { findDeterministic, isPortFree, type IsFree, type PortRange } from "../utils/port.js";

export interface Assignment {
  key: string;
  value: string;
  preferredPort: number;
  assignedPort: number;
  probeCount: number;
  fromLock: boolean;
}

export interface AssignOptions {
  seed: number;
  range: PortRange;
  isFree?: IsFree;
  /** Lockfile values that take the place of computed ports. */
  locked?: Map<string, string>;
  lockPath?: string;
}

/**
 * Assigns a port to every key. Indices follow the sorted key order, so the
 * same key set always maps to the same slots; adding or removing any key
 * shifts the keys sorted after it.
 */
export async function assignPorts(keys: string[], options: AssignOptions): Promise<Assignment[]> {
  const isFree = options.isFree ?? isPortFree;
  const assignments: Assignment[] = [];

  const sorted = sortKeys(new Set(keys));
  for (const [index, key] of sorted.entries()) {
    const lockedValue = options.locked?.get(key);
    if (lockedValue !== undefined) {
      if (!/^\d+$/.test(lockedValue)) {
        throw new LockfileError(`lockfile value for ${key} is not numeric`, options.lockPath ?? "");
      }
      const port = parseInt(lockedValue, 10);
      assignments.push({
        key,
        value: lockedValue,
        preferredPort: port,
        assignedPort: port,
        probeCount: 0,
        fromLock: true,
      });
      continue;
    }

    const probe = await findDeterministic(key, options.seed, index, options.range, isFree);
    assignments.push({
      key,
      value: String(probe.assigned),
      preferredPort: probe.preferred,
      assignedPort: probe.assigned,
      probeCount: probe.probes,
      fromLock: false,
    });
  }

  return assignments;
}

export function toOverrides(assignments: Assignment[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const a of assignments) {
    overrides[a.key] = a.value;
  }
  return overrides;
}
