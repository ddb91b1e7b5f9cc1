import type { BranchCache } from "../utils/branch.js";
import { seedFor, withBranch } from "../utils/port.js";

export interface SeedInputs {
  cwd: string;
  namespace?: string;
  /** Used verbatim when set; no hashing happens. */
  seed?: number;
  seedBranch?: boolean;
  branch?: string;
}

export interface DerivedSeed {
  seed: number;
  branch?: string;
  warnings: string[];
}

export function deriveSeed(inputs: SeedInputs, branches: BranchCache): DerivedSeed {
  if (inputs.seed !== undefined) {
    return { seed: inputs.seed >>> 0, warnings: [] };
  }

  const namespace = inputs.namespace ?? "";
  if (!inputs.seedBranch) {
    return { seed: seedFor(inputs.cwd, namespace), warnings: [] };
  }

  const explicit = inputs.branch?.trim();
  if (explicit) {
    return { seed: seedFor(inputs.cwd, withBranch(namespace, explicit)), branch: explicit, warnings: [] };
  }

  const lookup = branches(inputs.cwd);
  if (!lookup.ok) {
    return {
      seed: seedFor(inputs.cwd, namespace),
      warnings: [
        `seed-branch enabled but branch resolution failed for ${inputs.cwd}: ${lookup.error}; falling back to non-branch seed`,
      ],
    };
  }
  return {
    seed: seedFor(inputs.cwd, withBranch(namespace, lookup.branch)),
    branch: lookup.branch,
    warnings: [],
  };
}
