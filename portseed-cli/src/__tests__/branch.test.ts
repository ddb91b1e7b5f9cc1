import { describe, it, expect, vi } from "vitest";
import { createBranchCache } from "../utils/branch.js";
import { deriveSeed } from "../core/seed.js";
import { seedFor, withBranch } from "../utils/port.js";

describe("createBranchCache", () => {
	it("resolves each repository once", () => {
		const resolver = vi.fn(() => "main");
		const lookup = createBranchCache(resolver);

		expect(lookup("/tmp/repo")).toEqual({ ok: true, branch: "main" });
		expect(lookup("/tmp/repo/")).toEqual({ ok: true, branch: "main" });
		expect(resolver).toHaveBeenCalledTimes(1);
		expect(resolver).toHaveBeenCalledWith("/tmp/repo");
	});

	it("caches failures too", () => {
		const resolver = vi.fn((): string => {
			throw new Error("not a git repository");
		});
		const lookup = createBranchCache(resolver);

		expect(lookup("/tmp/repo")).toEqual({ ok: false, error: "not a git repository" });
		expect(lookup("/tmp/repo")).toEqual({ ok: false, error: "not a git repository" });
		expect(resolver).toHaveBeenCalledTimes(1);
	});

	it("reports a missing resolver", () => {
		expect(createBranchCache(undefined)("/tmp/repo")).toEqual({
			ok: false,
			error: "branch resolver unavailable",
		});
	});
});

describe("deriveSeed", () => {
	const cwd = "/tmp/project";

	it("uses an explicit seed verbatim", () => {
		expect(deriveSeed({ cwd, seed: 42, seedBranch: true }, createBranchCache(undefined))).toEqual({
			seed: 42,
			warnings: [],
		});
	});

	it("hashes path and namespace by default", () => {
		expect(deriveSeed({ cwd, namespace: "web" }, createBranchCache(undefined)).seed).toBe(seedFor(cwd, "web"));
	});

	it("prefers an explicit branch over the resolver", () => {
		const resolver = vi.fn(() => "main");
		const derived = deriveSeed({ cwd, seedBranch: true, branch: "feat" }, createBranchCache(resolver));

		expect(derived.seed).toBe(seedFor(cwd, withBranch("", "feat")));
		expect(derived.branch).toBe("feat");
		expect(resolver).not.toHaveBeenCalled();
	});

	it("mixes in the resolved branch", () => {
		const derived = deriveSeed({ cwd, seedBranch: true }, createBranchCache(() => "main"));
		expect(derived.seed).toBe(seedFor(cwd, "@main"));
	});

	it("falls back to the plain seed with a warning when resolution fails", () => {
		const derived = deriveSeed({ cwd, seedBranch: true }, createBranchCache(undefined));

		expect(derived.seed).toBe(seedFor(cwd));
		expect(derived.warnings).toEqual([
			"seed-branch enabled but branch resolution failed for /tmp/project: branch resolver unavailable; falling back to non-branch seed",
		]);
	});
});
