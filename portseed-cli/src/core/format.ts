import { compareKeys } from "../scan/scanner.js";

export type OutputFormat = "shell" | "json" | "dotenv" | "yaml";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["shell", "json", "dotenv", "yaml"];

export interface OutputPayload {
  mode: string;
  cwd: string;
  range: string;
  command?: string[];
  overrides: Array<{ key: string; value: string }>;
  warnings?: string[];
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

function sortedEntries(overrides: Record<string, string>): Array<[string, string]> {
  return Object.entries(overrides).sort(([a], [b]) => compareKeys(a, b));
}

export function buildPayload(
  mode: string,
  cwd: string,
  range: string,
  overrides: Record<string, string>,
  warnings: string[],
  command?: string[],
): OutputPayload {
  const payload: OutputPayload = {
    mode,
    cwd,
    range,
    overrides: sortedEntries(overrides).map(([key, value]) => ({ key, value })),
  };
  if (command && command.length > 0) payload.command = [...command];
  if (warnings.length > 0) payload.warnings = [...warnings];
  return payload;
}

export function formatOverrides(format: Exclude<OutputFormat, "json">, overrides: Record<string, string>): string {
  const lines = sortedEntries(overrides).map(([key, value]) => {
    switch (format) {
      case "dotenv":
        return `${key}=${value}`;
      case "yaml":
        return `${key}: ${JSON.stringify(value)}`;
      case "shell":
        return `export ${key}=${value}`;
    }
  });
  return lines.join("\n");
}

export function formatSummary(command: string[], overrides: Record<string, string>): string {
  const entries = sortedEntries(overrides);
  const keyWidth = Math.max("ENV".length, ...entries.map(([k]) => k.length));
  const valueWidth = Math.max("PORT".length, ...entries.map(([, v]) => v.length));
  const border = `+-${"-".repeat(keyWidth)}-+-${"-".repeat(valueWidth)}-+`;
  const row = (k: string, v: string) => `| ${k.padEnd(keyWidth)} | ${v.padEnd(valueWidth)} |`;

  return [
    `portseed overrides (${entries.length}) -> ${command.join(" ")}`,
    border,
    row("ENV", "PORT"),
    border,
    ...entries.map(([k, v]) => row(k, v)),
    border,
  ].join("\n");
}

export interface ExplainView {
  cwd: string;
  seed: number;
  range: { start: number; end: number };
  presets: string[];
  resolved: { ignores: string[]; includes: string[]; excludes: string[] };
  decisions: Array<{ key: string; source: string; included: boolean; reason: string }>;
  assignments: Array<{ key: string; preferredPort: number; assignedPort: number; probeCount: number; fromLock: boolean }>;
  rewrites: Array<{ sourceKey: string; newValue: string; targetKey: string; portSource: string }>;
  stats: { filesVisited: number; envFilesParsed: number; skippedIgnore: number; skippedMaxDepth: number };
  warnings: string[];
}

export function formatExplain(view: ExplainView): string {
  const lines = [
    "portseed explain",
    `cwd: ${view.cwd}`,
    `seed: ${view.seed}`,
    `range: ${view.range.start}-${view.range.end}`,
    `presets: ${view.presets.join(",")}`,
    `ignores: ${view.resolved.ignores.join(",")}`,
    `includes: ${view.resolved.includes.join(",")}`,
    `excludes: ${view.resolved.excludes.join(",")}`,
    "",
    "keys:",
    ...view.decisions.map((d) => `  [${d.included ? "✓" : "x"}] ${d.key} (${d.source}) - ${d.reason}`),
    "",
    "assignments:",
    ...view.assignments.map(
      (a) =>
        `  ${a.key}: preferred=${a.preferredPort} assigned=${a.assignedPort} probes=${a.probeCount}${a.fromLock ? " (lock)" : ""}`,
    ),
  ];

  if (view.rewrites.length > 0) {
    lines.push("", "links:");
    for (const r of view.rewrites) {
      lines.push(`  ${r.sourceKey} -> ${r.newValue} (${r.targetKey} via ${r.portSource})`);
    }
  }

  const s = view.stats;
  lines.push(
    "",
    `scan stats: files=${s.filesVisited} env_files=${s.envFilesParsed} skipped_ignore_dirs=${s.skippedIgnore} skipped_max_depth=${s.skippedMaxDepth}`,
  );

  if (view.warnings.length > 0) {
    lines.push("", "warnings:", ...view.warnings.map((w) => `  - ${w}`));
  }
  return lines.join("\n");
}
