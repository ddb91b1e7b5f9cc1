import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { emptyConfig } from "../config/loader.js";
import { runDoctor } from "../core/doctor.js";
import { lockfilePath, writeLockfile } from "../lockfile/store.js";

let tempDir: string;

beforeEach(() => {
	tempDir = mkdtempSync(join(tmpdir(), "portseed-test-"));
});

afterEach(() => {
	rmSync(tempDir, { recursive: true, force: true });
});

function statuses(checks: Array<{ name: string; status: string }>): Record<string, string> {
	return Object.fromEntries(checks.map((c) => [c.name, c.status]));
}

describe("runDoctor", () => {
	it("reports a healthy project", async () => {
		const report = await runDoctor({ cwd: tempDir, range: "10000-10100", isFree: () => true });

		expect(statuses(report.checks)).toEqual({
			config: "ok",
			range: "ok",
			scan: "ok",
			port_availability: "ok",
			lockfile: "ok",
		});
		expect(report.exitCode).toBe(0);
	});

	it("warns about very small ranges", async () => {
		const report = await runDoctor({ cwd: tempDir, range: "10000-10004", isFree: () => true });

		expect(report.checks[1]).toEqual({
			name: "range",
			status: "warn",
			message: "range 10000-10004 (size=5); very small range may cause collisions",
		});
		expect(report.exitCode).toBe(1);
	});

	it("samples the start, middle and end of the range", async () => {
		const sampled: number[] = [];
		const report = await runDoctor({
			cwd: tempDir,
			range: "10000-10100",
			isFree: (port) => {
				sampled.push(port);
				return port !== 10050;
			},
		});

		expect(sampled).toEqual([10000, 10050, 10100]);
		expect(report.checks.find((c) => c.name === "port_availability")?.message).toBe(
			"2/3 sampled ports are available",
		);
		expect(report.exitCode).toBe(1);
	});

	it("is fatal when no sampled port is free", async () => {
		const report = await runDoctor({ cwd: tempDir, range: "10000-10100", isFree: () => false });
		expect(report.exitCode).toBe(2);
	});

	it("is fatal for an invalid range or config", async () => {
		const badRange = await runDoctor({ cwd: tempDir, range: "nope", isFree: () => true });
		expect(badRange.checks.find((c) => c.name === "range")?.status).toBe("fatal");
		expect(badRange.checks.some((c) => c.name === "port_availability")).toBe(false);
		expect(badRange.exitCode).toBe(2);

		const badConfig = await runDoctor({ cwd: tempDir, configError: "parse x: boom", isFree: () => true });
		expect(badConfig.checks[0]).toEqual({ name: "config", status: "fatal", message: "parse x: boom" });
		expect(badConfig.exitCode).toBe(2);
	});

	it("warns when max depth hides directories", async () => {
		mkdirSync(join(tempDir, "a", "b", "c"), { recursive: true });
		const config = { ...emptyConfig(), scanner: { maxDepth: 1 } };

		const report = await runDoctor({ cwd: tempDir, config, range: "10000-10100", isFree: () => true });
		const scan = report.checks.find((c) => c.name === "scan");

		expect(scan?.status).toBe("warn");
		expect(scan?.message).toMatch(/; max_depth skipped 1 directories$/);
	});

	it("checks the lockfile", async () => {
		writeLockfile(tempDir, "10000-10100", { PORT: "10001" });
		const ok = await runDoctor({ cwd: tempDir, range: "10000-10100", isFree: () => true });
		expect(ok.checks.at(-1)).toEqual({ name: "lockfile", status: "ok", message: "lockfile version=1 assignments=1" });

		writeFileSync(lockfilePath(tempDir), "{");
		const broken = await runDoctor({ cwd: tempDir, range: "10000-10100", isFree: () => true });
		expect(broken.checks.at(-1)?.status).toBe("warn");
	});
});

describe("runDoctor with strict config", () => {
	it("reports an unknown preset as fatal", async () => {
		const dir = mkdtempSync(join(tmpdir(), "portseed-test-"));
		try {
			const report = await runDoctor({
				cwd: dir,
				config: { ...emptyConfig(), strict: true },
				presets: ["nope"],
				isFree: () => true,
			});

			expect(report.checks.at(-1)).toEqual({
				name: "options",
				status: "fatal",
				message: 'unknown preset "nope" (strict mode)',
			});
			expect(report.exitCode).toBe(2);
		} finally {
			rmSync(dir, { recursive: true, force: true });
		}
	});
});
