import { describe, it, expect } from "vitest";
import { ValidationError } from "../core/errors.js";
import type { Discovery } from "../scan/scanner.js";
import { selectKeys } from "../scan/selection.js";

const discoveries: Discovery[] = [
	{ key: "API_PORT", source: ".env" },
	{ key: "DB_PORT", source: ".env", ignoredBy: "DB" },
	{ key: "PORT", source: "default" },
	{ key: "WEB_PORT", source: "env" },
];

describe("selectKeys", () => {
	it("keeps every discovered key without rules", () => {
		const { keys, decisions } = selectKeys(discoveries.filter((d) => d.ignoredBy === undefined));
		expect(keys).toEqual(["API_PORT", "PORT", "WEB_PORT"]);
		expect(decisions.every((d) => d.reason === "discovered")).toBe(true);
	});

	it("treats includes as an allow-list that overrides ignore prefixes", () => {
		const { keys, decisions } = selectKeys(discoveries, { includes: ["DB_PORT", "WEB_PORT"] });

		expect(keys).toEqual(["DB_PORT", "WEB_PORT"]);
		expect(decisions.map((d) => [d.key, d.included, d.reason])).toEqual([
			["API_PORT", false, "not in include_keys"],
			["DB_PORT", true, "included by include_keys (overrides ignore prefix DB)"],
			["PORT", false, "not in include_keys"],
			["WEB_PORT", true, "included by include_keys"],
		]);
	});

	it("lets excludes win over includes", () => {
		const { keys, decisions } = selectKeys(discoveries, {
			includes: ["WEB_PORT"],
			excludes: ["WEB_PORT"],
		});
		expect(keys).toEqual([]);
		expect(decisions.find((d) => d.key === "WEB_PORT")?.reason).toBe("excluded by exact key");
	});

	it("adds manual keys regardless of other rules", () => {
		const { keys, decisions } = selectKeys(discoveries, {
			excludes: ["EXTRA_PORT"],
			manual: ["EXTRA_PORT"],
		});
		expect(keys).toContain("EXTRA_PORT");
		expect(decisions.find((d) => d.key === "EXTRA_PORT")).toEqual({
			key: "EXTRA_PORT",
			source: "manual",
			included: true,
			reason: "included manually",
		});
	});

	it("rejects invalid manual keys", () => {
		expect(() => selectKeys([], { manual: ["BAD-KEY"] })).toThrow(ValidationError);
		expect(() => selectKeys([], { manual: ["BAD-KEY"] })).toThrow('invalid env key "BAD-KEY"');
	});
});
