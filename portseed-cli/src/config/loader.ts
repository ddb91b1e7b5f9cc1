import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ValidationError, errorMessage } from "../core/errors.js";
import { isValidEnvKey } from "../scan/dotenv.js";
import { DEFAULT_RANGE } from "../utils/port.js";
import { BUILTIN_PRESETS } from "./presets.js";
import type {
	ConfigFragment,
	LinkRule,
	PortseedConfig,
	Preset,
	ResolvedOptions,
	SelectionInputs,
} from "./types.js";

export const CONFIG_NAME = ".portseed.json";
export const DEFAULT_IGNORE_DIRS = ["node_modules"];

const PresetSchema = z.object({
	range: z.string().optional(),
	ignore_prefixes: z.array(z.string()).optional(),
	include_keys: z.array(z.string()).optional(),
	exclude_keys: z.array(z.string()).optional(),
	// legacy v1 spelling of ignore_prefixes
	ignore: z.array(z.string()).optional(),
});

const LinkRuleSchema = z.object({
	source_key: z.string().trim().min(1, "source_key is required"),
	target_repo: z.string().trim().min(1, "target_repo is required"),
	target_port_key: z
		.string()
		.optional()
		.refine((key) => !key || isValidEnvKey(key), { message: "target_port_key is invalid" }),
	target_namespace: z.string().optional(),
	same_branch: z.boolean().optional(),
});

const ConfigFileSchema = z.object({
	version: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
	strict: z.boolean().optional(),
	scanner: z
		.object({
			ignore_dirs: z.array(z.string()).optional(),
			max_depth: z.number().int().min(0).optional(),
		})
		.optional(),
	presets: z.record(PresetSchema).optional(),
	links: z.array(LinkRuleSchema).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

function toPreset(name: string, raw: z.infer<typeof PresetSchema>, warnings: string[]): Preset {
	const ignorePrefixes = [...(raw.ignore_prefixes ?? [])];
	if (raw.ignore && raw.ignore.length > 0) {
		ignorePrefixes.push(...raw.ignore);
		warnings.push(`preset "${name}" uses deprecated field ignore; use ignore_prefixes`);
	}
	return {
		range: raw.range || undefined,
		ignorePrefixes,
		includeKeys: [...(raw.include_keys ?? [])],
		excludeKeys: [...(raw.exclude_keys ?? [])],
	};
}

function toLinkRule(raw: z.infer<typeof LinkRuleSchema>): LinkRule {
	return {
		sourceKey: raw.source_key,
		targetRepo: raw.target_repo,
		targetPortKey: raw.target_port_key || undefined,
		targetNamespace: raw.target_namespace || undefined,
		sameBranch: raw.same_branch,
	};
}

export function parseConfigFragment(path: string, content: string): ConfigFragment {
	let json: unknown;
	try {
		json = JSON.parse(content);
	} catch (err) {
		throw new ValidationError(`parse ${path}: ${errorMessage(err)}`);
	}

	const result = ConfigFileSchema.safeParse(json);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
			.join("; ");
		throw new ValidationError(`Invalid portseed config in ${path}: ${details}`);
	}

	const file: ConfigFile = result.data;
	const warnings: string[] = [];
	const presets: Record<string, Preset> = {};
	for (const [name, preset] of Object.entries(file.presets ?? {})) {
		presets[name] = toPreset(name, preset, warnings);
	}

	return {
		path,
		version: file.version,
		strict: file.strict,
		scanner: file.scanner && {
			ignoreDirs: file.scanner.ignore_dirs,
			maxDepth: file.scanner.max_depth,
		},
		presets,
		links: file.links?.map(toLinkRule),
		warnings,
	};
}

export function emptyConfig(): PortseedConfig {
	return { strict: false, scanner: {}, presets: {}, links: [], warnings: [], sources: [] };
}

/**
 * Folds fragments left to right: later files override scalars and replace
 * lists they set, presets merge by name.
 */
export function foldConfig(fragments: ConfigFragment[]): PortseedConfig {
	return fragments.reduce<PortseedConfig>((acc, fragment) => {
		const scanner = { ...acc.scanner };
		if (fragment.scanner?.ignoreDirs && fragment.scanner.ignoreDirs.length > 0) {
			scanner.ignoreDirs = [...fragment.scanner.ignoreDirs];
		}
		if (fragment.scanner?.maxDepth) {
			scanner.maxDepth = fragment.scanner.maxDepth;
		}

		return {
			strict: acc.strict || fragment.strict === true,
			scanner,
			presets: { ...acc.presets, ...fragment.presets },
			links: fragment.links ? [...fragment.links] : acc.links,
			warnings: [...acc.warnings, ...fragment.warnings],
			sources: [...acc.sources, fragment.path],
		};
	}, emptyConfig());
}

export function loadConfig(paths: string[]): PortseedConfig {
	const fragments: ConfigFragment[] = [];
	for (const path of paths) {
		if (!existsSync(path)) continue;

		let content: string;
		try {
			content = readFileSync(path, "utf-8");
		} catch (err) {
			throw new ValidationError(`read ${path}: ${errorMessage(err)}`);
		}
		fragments.push(parseConfigFragment(path, content));
	}
	return foldConfig(fragments);
}

export function defaultConfigPaths(cwd: string = process.cwd()): string[] {
	return [join(homedir(), CONFIG_NAME), join(cwd, CONFIG_NAME)];
}

export function loadDefaultConfig(cwd: string = process.cwd()): PortseedConfig {
	return loadConfig(defaultConfigPaths(cwd));
}

export function lookupPreset(config: PortseedConfig, name: string): Preset | undefined {
	return BUILTIN_PRESETS[name] ?? config.presets[name];
}

function dedupeSorted(values: string[]): string[] {
	return [...new Set(values.filter(Boolean))].sort();
}

/**
 * Expands presets into ignore/include/exclude lists and the effective range.
 * An explicitly requested range always wins over preset ranges.
 */
export function resolveOptions(config: PortseedConfig, inputs: SelectionInputs): ResolvedOptions {
	const ignores = [...(inputs.ignores ?? [])];
	const includes = [...(inputs.includes ?? [])];
	const excludes = [...(inputs.excludes ?? [])];
	const warnings = [...config.warnings];
	let range = inputs.range || DEFAULT_RANGE;

	for (const name of inputs.presets ?? []) {
		const preset = lookupPreset(config, name);
		if (!preset) {
			if (config.strict) {
				throw new ValidationError(`unknown preset "${name}" (strict mode)`);
			}
			warnings.push(`preset not found: ${name}`);
			continue;
		}
		ignores.push(...preset.ignorePrefixes);
		includes.push(...preset.includeKeys);
		excludes.push(...preset.excludeKeys);
		if (preset.range && !inputs.range) {
			range = preset.range;
		}
	}

	const ignoreDirs = config.scanner.ignoreDirs && config.scanner.ignoreDirs.length > 0
		? [...config.scanner.ignoreDirs]
		: [...DEFAULT_IGNORE_DIRS];

	return {
		range,
		ignores: dedupeSorted(ignores),
		includes: dedupeSorted(includes),
		excludes: dedupeSorted(excludes),
		ignoreDirs,
		maxDepth: config.scanner.maxDepth ?? 0,
		strict: config.strict,
		warnings,
	};
}
