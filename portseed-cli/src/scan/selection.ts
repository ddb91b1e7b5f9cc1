import { ValidationError } from "../core/errors.js";
import { isValidEnvKey } from "./dotenv.js";
import { compareKeys, sortKeys, type Discovery } from "./scanner.js";

export interface Decision extends Discovery {
  included: boolean;
  reason: string;
}

export interface SelectionRules {
  includes?: string[];
  excludes?: string[];
  manual?: string[];
}

export interface Selection {
  keys: string[];
  decisions: Decision[];
}

function decide(d: Discovery, includes: Set<string>, excludes: Set<string>): Decision {
  if (excludes.has(d.key)) {
    return { ...d, included: false, reason: "excluded by exact key" };
  }
  if (includes.size > 0) {
    if (!includes.has(d.key)) {
      return { ...d, included: false, reason: "not in include_keys" };
    }
    if (d.ignoredBy !== undefined) {
      return {
        ...d,
        included: true,
        reason: `included by include_keys (overrides ignore prefix ${d.ignoredBy})`,
      };
    }
    return { ...d, included: true, reason: "included by include_keys" };
  }
  return { ...d, included: true, reason: "discovered" };
}

/**
 * Applies exclude, include and manual rules to scanner output. Ignore
 * prefixes were already applied during the scan.
 */
export function selectKeys(discoveries: Discovery[], rules: SelectionRules = {}): Selection {
  const includes = new Set(rules.includes ?? []);
  const excludes = new Set(rules.excludes ?? []);

  const keySet = new Set<string>();
  const decisions: Decision[] = [];

  for (const d of discoveries) {
    const decision = decide(d, includes, excludes);
    decisions.push(decision);
    if (decision.included) keySet.add(d.key);
  }

  for (const key of rules.manual ?? []) {
    if (!isValidEnvKey(key)) {
      throw new ValidationError(`invalid env key "${key}"`);
    }
    keySet.add(key);
    decisions.push({ key, source: "manual", included: true, reason: "included manually" });
  }

  decisions.sort((a, b) => compareKeys(a.key, b.key) || compareKeys(a.source, b.source));
  return { keys: sortKeys(keySet), decisions };
}
