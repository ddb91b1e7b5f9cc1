import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { LinkRule } from "../config/types.js";
import { parseTargetEnv } from "../link/directive.js";
import { resolveLinks, type LinkContext } from "../link/resolver.js";
import { writeLockfile } from "../lockfile/store.js";
import { createBranchCache, type BranchResolver } from "../utils/branch.js";
import { canonicalPath, seedFor } from "../utils/port.js";

let tempDir: string;
let sourceDir: string;
let targetDir: string;

function makeContext(resolver?: BranchResolver): LinkContext {
	return {
		cwd: sourceDir,
		range: { start: 12000, end: 12010 },
		environ: {},
		ignoreDirs: ["node_modules"],
		branches: createBranchCache(resolver),
	};
}

function link(overrides: Partial<LinkRule> = {}): LinkRule {
	return { sourceKey: "API_URL", targetRepo: targetDir, sameBranch: false, ...overrides };
}

beforeEach(() => {
	tempDir = mkdtempSync(join(tmpdir(), "portseed-test-"));
	sourceDir = join(tempDir, "web");
	targetDir = join(tempDir, "api");
	mkdirSync(sourceDir);
	mkdirSync(targetDir);
	writeFileSync(join(sourceDir, ".env"), "API_URL=http://localhost:3000/v1?x=1\n");
	writeFileSync(join(targetDir, ".env"), "APP_PORT=31413\n");
});

afterEach(() => {
	rmSync(tempDir, { recursive: true, force: true });
});

describe("resolveLinks", () => {
	it("does nothing without directives or links", async () => {
		const result = await resolveLinks(makeContext(), { directives: [], links: [] });
		expect(result).toEqual({ rewrites: [], overrides: {}, warnings: [] });
	});

	it("computes the target port deterministically when no lockfile exists", async () => {
		const result = await resolveLinks(makeContext(), { directives: [], links: [link()] });

		// target keys sort as [APP_PORT, PORT]; APP_PORT takes index 0
		const expected = 12000 + (seedFor(targetDir) % 11);
		expect(result.warnings).toEqual([]);
		expect(result.overrides).toEqual({ API_URL: `http://localhost:${expected}/v1?x=1` });
		expect(result.rewrites[0]).toMatchObject({
			sourceKey: "API_URL",
			oldValue: "http://localhost:3000/v1?x=1",
			targetKey: "APP_PORT",
			portSource: "deterministic",
		});
	});

	it("uses the target namespace when computing the seed", async () => {
		const result = await resolveLinks(makeContext(), {
			directives: [],
			links: [link({ targetNamespace: "api" })],
		});

		const expected = 12000 + (seedFor(targetDir, "api") % 11);
		expect(result.overrides.API_URL).toBe(`http://localhost:${expected}/v1?x=1`);
	});

	it("prefers the target lockfile", async () => {
		writeLockfile(targetDir, "10000-20000", { APP_PORT: "18080", PORT: "18081" });

		const result = await resolveLinks(makeContext(), { directives: [], links: [link()] });

		expect(result.overrides).toEqual({ API_URL: "http://localhost:18080/v1?x=1" });
		expect(result.rewrites[0].portSource).toBe("lockfile");
	});

	it("honors an explicit target port key", async () => {
		writeLockfile(targetDir, "10000-20000", { APP_PORT: "18080", PORT: "18081" });

		const result = await resolveLinks(makeContext(), {
			directives: [],
			links: [link({ targetPortKey: "PORT" })],
		});

		expect(result.overrides.API_URL).toBe("http://localhost:18081/v1?x=1");
	});

	it("lets an explicit directive win over a config link for the same key", async () => {
		const otherDir = join(tempDir, "other");
		mkdirSync(otherDir);
		writeLockfile(otherDir, "10000-20000", { PORT: "19000" });
		writeLockfile(targetDir, "10000-20000", { APP_PORT: "18080" });

		const result = await resolveLinks(makeContext(() => "main"), {
			directives: [parseTargetEnv(`api_url=${join(otherDir, ".env")}`)],
			links: [link()],
		});

		expect(result.rewrites).toHaveLength(1);
		expect(result.overrides).toEqual({ API_URL: "http://localhost:19000/v1?x=1" });
	});

	it("infers source keys from a smart directive", async () => {
		writeFileSync(join(targetDir, ".env"), "APP_PORT=3000\n");
		writeLockfile(targetDir, "10000-20000", { APP_PORT: "18080" });

		const result = await resolveLinks(makeContext(() => "main"), {
			directives: [parseTargetEnv(join(targetDir, ".env"))],
			links: [],
		});

		expect(result.warnings).toEqual([]);
		expect(result.overrides).toEqual({ API_URL: "http://localhost:18080/v1?x=1" });
	});

	it("skips ambiguous smart matches", async () => {
		writeFileSync(join(targetDir, ".env"), "WEB_PORT=3000\nAPI_PORT=3000\n");
		const raw = join(targetDir, ".env");

		const result = await resolveLinks(makeContext(() => "main"), {
			directives: [parseTargetEnv(raw)],
			links: [],
		});

		expect(result.rewrites).toEqual([]);
		expect(result.warnings).toEqual([
			`target-env smart (${raw}): source "API_URL" matched multiple target keys [WEB_PORT API_PORT]`,
			`target-env smart (${raw}): no matching localhost URL keys found`,
		]);
	});

	it("warns when the source key is missing or not a loopback URL", async () => {
		writeFileSync(join(sourceDir, ".env"), "API_URL=http://example.com:3000\n");

		const result = await resolveLinks(makeContext(), {
			directives: [],
			links: [link(), link({ sourceKey: "MISSING_URL" })],
		});

		expect(result.rewrites).toEqual([]);
		expect(result.warnings).toEqual([
			'config link[0]: source key "API_URL" is not a localhost URL (host "example.com" is not loopback)',
			'config link[1]: source key "MISSING_URL" not found',
		]);
	});

	it("warns when the target repository does not exist", async () => {
		const missing = join(tempDir, "missing");
		const result = await resolveLinks(makeContext(), {
			directives: [],
			links: [link({ targetRepo: missing })],
		});

		expect(result.warnings).toEqual([`config link[0]: target repo "${missing}" is unavailable`]);
	});

	it("skips links whose branches differ", async () => {
		const source = canonicalPath(sourceDir);
		const result = await resolveLinks(
			makeContext((dir) => (dir === source ? "main" : "feature")),
			{ directives: [], links: [link({ sameBranch: true })] },
		);

		expect(result.rewrites).toEqual([]);
		expect(result.warnings).toEqual([
			'config link[0]: branch mismatch source="main" target="feature"; skipping API_URL',
		]);
	});

	describe("lowercase target port key", () => {
		beforeEach(() => {
			writeFileSync(join(sourceDir, ".env"), "MONITORING_URL=http://localhost:31413/rpc\n");
			writeFileSync(join(targetDir, ".env"), "app_port=31413\n");
		});

		const monitoring = (): LinkRule =>
			link({ sourceKey: "MONITORING_URL", targetPortKey: "app_port", sameBranch: false });

		it("indexes the key after the synthesized PORT", async () => {
			const result = await resolveLinks(makeContext(), { directives: [], links: [monitoring()] });

			// target keys sort as [PORT, app_port]
			const expected = 12000 + ((seedFor(targetDir) + 1) % 11);
			expect(result.warnings).toEqual([]);
			expect(result.overrides).toEqual({ MONITORING_URL: `http://localhost:${expected}/rpc` });
			expect(result.rewrites[0]).toMatchObject({ targetKey: "app_port", portSource: "deterministic" });
		});

		it("takes the locked value of the named key", async () => {
			writeLockfile(targetDir, "12000-12010", { app_port: "18080" });

			const result = await resolveLinks(makeContext(), { directives: [], links: [monitoring()] });

			expect(result.overrides).toEqual({ MONITORING_URL: "http://localhost:18080/rpc" });
			expect(result.rewrites[0]).toMatchObject({ targetKey: "app_port", portSource: "lockfile" });
		});
	});

	describe("branch checks", () => {
		let otherDir: string;

		beforeEach(() => {
			otherDir = join(tempDir, "other");
			mkdirSync(otherDir);
			writeLockfile(otherDir, "10000-20000", { PORT: "19000" });
			writeFileSync(
				join(sourceDir, ".env"),
				"API_URL=http://localhost:3000/v1?x=1\nMONITORING_URL=http://localhost:31413/rpc\n",
			);
		});

		it("resolves each repository's branch once per run", async () => {
			const calls: string[] = [];
			const resolver = (dir: string): string => {
				calls.push(dir);
				return "main";
			};

			const result = await resolveLinks(makeContext(resolver), {
				directives: [],
				links: [link({ sameBranch: true }), link({ sourceKey: "MONITORING_URL", sameBranch: true })],
			});

			expect(result.rewrites).toHaveLength(2);
			expect(calls).toEqual([canonicalPath(sourceDir), canonicalPath(targetDir)]);
		});

		it("skips only the candidate whose target branch cannot be resolved", async () => {
			const broken = canonicalPath(targetDir);
			const resolver = (dir: string): string => {
				if (dir === broken) throw new Error("not a git repository");
				return "main";
			};

			const result = await resolveLinks(makeContext(resolver), {
				directives: [],
				links: [
					link({ sameBranch: true }),
					link({ sourceKey: "MONITORING_URL", targetRepo: otherDir, sameBranch: true }),
				],
			});

			expect(result.warnings).toEqual([
				`config link[0]: target branch resolution failed for "${targetDir}": not a git repository`,
			]);
			expect(result.overrides).toEqual({ MONITORING_URL: "http://localhost:19000/rpc" });
		});

		it("skips same-branch candidates when the source branch cannot be resolved", async () => {
			const source = canonicalPath(sourceDir);
			const resolver = (dir: string): string => {
				if (dir === source) throw new Error("not a git repository");
				return "main";
			};

			const result = await resolveLinks(makeContext(resolver), {
				directives: [],
				links: [
					link({ sameBranch: true }),
					link({ sourceKey: "MONITORING_URL", targetRepo: otherDir, sameBranch: false }),
				],
			});

			expect(result.warnings).toEqual(["config link[0]: source branch resolution failed: not a git repository"]);
			expect(result.overrides).toEqual({ MONITORING_URL: "http://localhost:19000/rpc" });
		});
	});

	it("gives the same answer on repeated runs", async () => {
		const inputs = { directives: [], links: [link()] };
		const first = await resolveLinks(makeContext(), inputs);
		const second = await resolveLinks(makeContext(), inputs);
		expect(second).toEqual(first);
	});
});
