import { execFileSync } from "node:child_process";
import { canonicalPath } from "./port.js";
import { errorMessage } from "../core/errors.js";

/** Resolves the checked-out branch of a repository; throws when it cannot. */
export type BranchResolver = (repoDir: string) => string;

export type BranchLookup =
  | { ok: true; branch: string }
  | { ok: false; error: string };

function runGit(repoDir: string, args: string[]): string {
  const output = execFileSync("git", ["-C", repoDir, ...args], {
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "pipe"],
  }).trim();
  if (!output) {
    throw new Error("empty branch output");
  }
  return output;
}

export function resolveGitBranch(repoDir: string): string {
  let branch: string | undefined;
  try {
    branch = runGit(repoDir, ["rev-parse", "--abbrev-ref", "HEAD"]);
  } catch {
    branch = undefined;
  }
  // Detached HEAD reports the literal "HEAD"; symbolic-ref also covers unborn branches
  if (branch && branch !== "HEAD") return branch;

  try {
    return runGit(repoDir, ["symbolic-ref", "--short", "HEAD"]);
  } catch {
    throw new Error(`resolve git branch for ${repoDir}: unable to determine branch`);
  }
}

/**
 * Memoizes a resolver for the lifetime of one run. Failures are cached too.
 */
export function createBranchCache(resolver: BranchResolver | undefined) {
  const cache = new Map<string, BranchLookup>();

  return function lookup(repoDir: string): BranchLookup {
    const key = canonicalPath(repoDir);
    const cached = cache.get(key);
    if (cached) return cached;

    let result: BranchLookup;
    if (!resolver) {
      result = { ok: false, error: "branch resolver unavailable" };
    } else {
      try {
        const branch = resolver(key).trim();
        result = branch ? { ok: true, branch } : { ok: false, error: "empty branch name" };
      } catch (err) {
        result = { ok: false, error: errorMessage(err) };
      }
    }

    cache.set(key, result);
    return result;
  };
}

export type BranchCache = ReturnType<typeof createBranchCache>;
