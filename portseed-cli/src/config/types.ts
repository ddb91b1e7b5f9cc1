export interface Preset {
	range?: string;
	ignorePrefixes: string[];
	includeKeys: string[];
	excludeKeys: string[];
}

export interface ScannerConfig {
	ignoreDirs?: string[];
	/** 0 or unset means unlimited */
	maxDepth?: number;
}

export interface LinkRule {
	sourceKey: string;
	targetRepo: string;
	targetPortKey?: string;
	targetNamespace?: string;
	/** Defaults to true when unset. */
	sameBranch?: boolean;
}

/** One parsed config file, before folding. */
export interface ConfigFragment {
	path: string;
	version?: number;
	strict?: boolean;
	scanner?: ScannerConfig;
	presets: Record<string, Preset>;
	links?: LinkRule[];
	warnings: string[];
}

export interface PortseedConfig {
	strict: boolean;
	scanner: ScannerConfig;
	presets: Record<string, Preset>;
	links: LinkRule[];
	warnings: string[];
	sources: string[];
}

export interface SelectionInputs {
	range?: string;
	presets?: string[];
	ignores?: string[];
	includes?: string[];
	excludes?: string[];
}

export interface ResolvedOptions {
	range: string;
	ignores: string[];
	includes: string[];
	excludes: string[];
	ignoreDirs: string[];
	maxDepth: number;
	strict: boolean;
	warnings: string[];
}
