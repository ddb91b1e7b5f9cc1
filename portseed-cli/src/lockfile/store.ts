/**
 * Project lockfile: a durable key -> port snapshot written by `portseed lock`
 * and trusted by `--use-lock` consumers.
 *
 * Path: <project>/.portseed.lock.json
 * Content: { version, cwd_fingerprint, range, assignments, created_at }
 */

import { readFileSync, renameSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { LockfileError, errorMessage } from "../core/errors.js";
import { hashPath } from "../utils/port.js";
import { compareKeys } from "../scan/scanner.js";

export const LOCKFILE_NAME = ".portseed.lock.json";
export const LOCKFILE_VERSION = 1;
const FILE_MODE = 0o644;

const AssignmentSchema = z.object({
	key: z.string().min(1),
	value: z.string(),
});

export const LockFileSchema = z.object({
	version: z.number().int(),
	cwd_fingerprint: z.string(),
	range: z.string(),
	assignments: z.array(AssignmentSchema),
	created_at: z.string(),
});

const VersionSchema = z.object({ version: z.number() });

export type LockAssignment = z.infer<typeof AssignmentSchema>;
export type LockFile = z.infer<typeof LockFileSchema>;

export interface TrustedLock {
	lock: LockFile;
	locked: Map<string, string>;
	warnings: string[];
}

export function fingerprint(cwd: string): string {
	return hashPath(cwd).toString(16).padStart(8, "0");
}

export function lockfilePath(cwd: string): string {
	return join(cwd, LOCKFILE_NAME);
}

export function buildLockfile(
	cwd: string,
	rangeSpec: string,
	overrides: Record<string, string>,
	now: Date = new Date(),
): LockFile {
	const assignments = Object.keys(overrides)
		.sort(compareKeys)
		.map((key) => ({ key, value: overrides[key] }));

	return {
		version: LOCKFILE_VERSION,
		cwd_fingerprint: fingerprint(cwd),
		range: rangeSpec,
		assignments,
		// second precision, matching RFC 3339 without fractions
		created_at: now.toISOString().replace(/\.\d{3}Z$/, "Z"),
	};
}

export function writeLockfile(
	cwd: string,
	rangeSpec: string,
	overrides: Record<string, string>,
	now?: Date,
): string {
	const path = lockfilePath(cwd);
	const lock = buildLockfile(cwd, rangeSpec, overrides, now);
	const tmpPath = `${path}.tmp`;
	try {
		writeFileSync(tmpPath, JSON.stringify(lock, null, 2) + "\n", { mode: FILE_MODE });
		renameSync(tmpPath, path);
	} catch (err) {
		throw new LockfileError(`write lockfile: ${errorMessage(err)}`, path);
	}
	return path;
}

export function readLockfile(path: string): LockFile {
	let raw: string;
	try {
		raw = readFileSync(path, "utf-8");
	} catch (err: unknown) {
		const code = (err as NodeJS.ErrnoException).code;
		throw new LockfileError(`read lockfile: ${errorMessage(err)}`, path, code);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err) {
		throw new LockfileError(`parse lockfile: ${errorMessage(err)}`, path);
	}

	const versioned = VersionSchema.safeParse(parsed);
	if (versioned.success && versioned.data.version !== LOCKFILE_VERSION) {
		throw new LockfileError(`unsupported lockfile version ${versioned.data.version}`, path);
	}

	const result = LockFileSchema.safeParse(parsed);
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new LockfileError(
			`parse lockfile: ${issue.path.join(".") || "root"}: ${issue.message}`,
			path,
		);
	}
	return result.data;
}

export function isMissingLockfile(err: unknown): boolean {
	return err instanceof LockfileError && err.code === "ENOENT";
}

export function toMap(assignments: LockAssignment[]): Map<string, string> {
	const map = new Map<string, string>();
	for (const a of assignments) {
		map.set(a.key, a.value);
	}
	return map;
}

/**
 * Reads the project's lockfile for a `--use-lock` run. The fingerprint must
 * match the project; a differing requested range only warns.
 */
export function loadTrustedLockfile(cwd: string, requestedRange?: string): TrustedLock {
	const path = lockfilePath(cwd);
	const lock = readLockfile(path);

	if (lock.cwd_fingerprint !== fingerprint(cwd)) {
		throw new LockfileError("lockfile cwd fingerprint mismatch", path);
	}

	const warnings: string[] = [];
	if (requestedRange && lock.range !== requestedRange) {
		warnings.push(`lockfile range ${lock.range} differs from requested range ${requestedRange}`);
	}

	return { lock, locked: toMap(lock.assignments), warnings };
}
