import { emptyConfig } from "../config/loader.js";
import { writeLockfile } from "../lockfile/store.js";
import { toOverrides } from "./allocate.js";
import { buildPlan, type Plan, type PlanOptions } from "./plan.js";

export interface LockResult {
  path: string;
  plan: Plan;
}

/**
 * Writes the project's lockfile from freshly computed assignments. Existing
 * lockfile values and link rewrites play no part in it.
 */
export async function lockProject(options: PlanOptions, now?: Date): Promise<LockResult> {
  const config = options.config ?? emptyConfig();
  const plan = await buildPlan({
    ...options,
    config: { ...config, links: [] },
    targetEnvs: [],
    useLock: false,
  });

  const path = writeLockfile(plan.cwd, plan.rangeSpec, toOverrides(plan.assignments), now);
  return { path, plan };
}
