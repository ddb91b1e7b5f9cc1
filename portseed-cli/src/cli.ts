#!/usr/bin/env node

import { defineCommand, runMain, type ArgsDef } from "citty";
import { basename } from "node:path";
import { loadDefaultConfig, emptyConfig } from "./config/loader.js";
import type { PortseedConfig } from "./config/types.js";
import { buildPlan, type Plan, type PlanOptions } from "./core/plan.js";
import { runDoctor } from "./core/doctor.js";
import { lockProject } from "./core/lock.js";
import { errorMessage, ValidationError } from "./core/errors.js";
import {
  buildPayload,
  formatExplain,
  formatOverrides,
  formatSummary,
  isOutputFormat,
  type OutputFormat,
} from "./core/format.js";
import { runWithOverrides } from "./core/run.js";
import { resolveGitBranch } from "./utils/branch.js";
import { isPortFree } from "./utils/port.js";

const planArgs = {
  range: { type: "string", alias: "r", description: "Port range start-end (default 10000-20000)" },
  preset: { type: "string", alias: "p", description: "Comma-separated presets to apply" },
  ignore: { type: "string", alias: "i", description: "Comma-separated key prefixes to ignore" },
  include: { type: "string", description: "Comma-separated keys to allow (allow-list)" },
  exclude: { type: "string", description: "Comma-separated keys to exclude" },
  key: { type: "string", alias: "k", description: "Comma-separated keys to always assign" },
  namespace: { type: "string", description: "Namespace mixed into the seed" },
  seed: { type: "string", description: "Explicit seed (uint32), bypasses hashing" },
  "seed-branch": { type: "boolean", description: "Mix the git branch into the seed" },
  branch: { type: "string", description: "Branch name to use instead of asking git" },
  "target-env": {
    type: "string",
    alias: "e",
    description: "Comma-separated link directives: path/.env or KEY=path/.env[:TARGET_KEY]",
  },
  "use-lock": { type: "boolean", description: "Use assignments from .portseed.lock.json" },
  quiet: { type: "boolean", alias: "q", description: "Suppress summaries and warnings" },
} satisfies ArgsDef;

type PlanArgs = {
  range?: string;
  preset?: string;
  ignore?: string;
  include?: string;
  exclude?: string;
  key?: string;
  namespace?: string;
  seed?: string;
  "seed-branch"?: boolean;
  branch?: string;
  "target-env"?: string;
  "use-lock"?: boolean;
};

function splitList(value: unknown): string[] {
  const parts = Array.isArray(value) ? value : [value];
  return parts
    .filter((p): p is string => typeof p === "string")
    .flatMap((p) => p.split(","))
    .map((p) => p.trim())
    .filter(Boolean);
}

function parseSeed(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw) || Number(raw) > 0xffffffff) {
    throw new ValidationError(`invalid --seed "${raw}": expected an unsigned 32-bit integer`);
  }
  return Number(raw);
}

function parseFormat(raw: string | undefined, fallback: OutputFormat): OutputFormat {
  if (!raw) return fallback;
  if (!isOutputFormat(raw)) {
    throw new ValidationError(`unknown format "${raw}"`);
  }
  return raw;
}

function toPlanOptions(args: PlanArgs, config: PortseedConfig, cwd: string): PlanOptions {
  return {
    cwd,
    config,
    range: args.range || undefined,
    presets: splitList(args.preset),
    ignores: splitList(args.ignore),
    includes: splitList(args.include),
    excludes: splitList(args.exclude),
    manualKeys: splitList(args.key),
    namespace: args.namespace || undefined,
    seed: parseSeed(args.seed),
    seedBranch: args["seed-branch"] === true,
    branch: args.branch || undefined,
    targetEnvs: splitList(args["target-env"]),
    useLock: args["use-lock"] === true,
    environ: process.env,
    isFree: isPortFree,
    resolveBranch: resolveGitBranch,
  };
}

function optionsFromArgs(args: PlanArgs): PlanOptions {
  const cwd = process.cwd();
  return toPlanOptions(args, loadDefaultConfig(cwd), cwd);
}

async function planFromArgs(args: PlanArgs): Promise<Plan> {
  return buildPlan(optionsFromArgs(args));
}

function printWarnings(warnings: string[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    console.error(`⚠️  ${w}`);
  }
}

async function guard(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

const exportCmd = defineCommand({
  meta: { name: "export", description: "Print assigned ports (shell, json, dotenv or yaml)" },
  args: {
    ...planArgs,
    format: { type: "string", alias: "f", description: "shell | json | dotenv | yaml" },
  },
  run({ args }) {
    return guard(async () => {
      const format = parseFormat(args.format, "shell");
      const plan = await planFromArgs(args);

      if (format === "json") {
        console.log(JSON.stringify(buildPayload("export", plan.cwd, plan.rangeSpec, plan.overrides, plan.warnings)));
        return;
      }
      console.log(formatOverrides(format, plan.overrides));
      printWarnings(plan.warnings, args.quiet === true);
    });
  },
});

const explain = defineCommand({
  meta: { name: "explain", description: "Show how keys were discovered, selected and assigned" },
  args: {
    ...planArgs,
    format: { type: "string", alias: "f", description: "text | json" },
  },
  run({ args }) {
    return guard(async () => {
      const plan = await planFromArgs(args);
      const presets = splitList(args.preset);

      if (args.format === "json") {
        console.log(
          JSON.stringify({
            mode: "explain",
            cwd: plan.cwd,
            seed: plan.seed,
            range: plan.range,
            inputs: { presets, ...plan.resolved },
            keys: plan.decisions,
            assignments: plan.assignments,
            links: plan.rewrites,
            warnings: plan.warnings,
            stats: plan.stats,
          }),
        );
        return;
      }
      console.log(formatExplain({ ...plan, presets }));
    });
  },
});

const lock = defineCommand({
  meta: { name: "lock", description: "Write the current assignments to .portseed.lock.json" },
  args: planArgs,
  run({ args }) {
    return guard(async () => {
      const { path, plan } = await lockProject(optionsFromArgs(args));
      console.log(`✅ wrote ${basename(path)} with ${plan.assignments.length} assignments`);
      printWarnings(plan.warnings, args.quiet === true);
    });
  },
});

const doctor = defineCommand({
  meta: { name: "doctor", description: "Check config, range, scanning, ports and lockfile" },
  args: {
    range: planArgs.range,
    preset: planArgs.preset,
    ignore: planArgs.ignore,
    include: planArgs.include,
    exclude: planArgs.exclude,
    format: { type: "string", alias: "f", description: "text | json" },
  },
  run({ args }) {
    return guard(async () => {
      const cwd = process.cwd();
      let config: PortseedConfig = emptyConfig();
      let configError: string | undefined;
      try {
        config = loadDefaultConfig(cwd);
      } catch (err) {
        configError = errorMessage(err);
      }

      const report = await runDoctor({
        cwd,
        config,
        configError,
        range: args.range || undefined,
        presets: splitList(args.preset),
        ignores: splitList(args.ignore),
        includes: splitList(args.include),
        excludes: splitList(args.exclude),
        environ: process.env,
      });

      if (args.format === "json") {
        console.log(JSON.stringify({ mode: "doctor", checks: report.checks }));
      } else {
        console.log("portseed doctor");
        for (const c of report.checks) {
          console.log(`- [${c.status}] ${c.name}: ${c.message}`);
        }
      }
      process.exitCode = report.exitCode;
    });
  },
});

const run = defineCommand({
  meta: { name: "run", description: "Run a command with assigned ports in its environment" },
  args: {
    ...planArgs,
    "dry-run": { type: "boolean", alias: "n", description: "Print the overrides without running" },
    format: { type: "string", alias: "f", description: "text | json summary" },
  },
  run({ args }) {
    return guard(async () => {
      const command = args._;
      if (command.length === 0) {
        throw new ValidationError("No command specified");
      }

      const plan = await planFromArgs(args);
      const quiet = args.quiet === true;
      const log = quiet ? () => {} : console.error;

      if (args.format === "json") {
        const mode = args["dry-run"] ? "preview" : "execute";
        log(JSON.stringify(buildPayload(mode, plan.cwd, plan.rangeSpec, plan.overrides, plan.warnings, command)));
      } else {
        log(formatSummary(command, plan.overrides));
        printWarnings(plan.warnings, quiet);
      }
      if (args["dry-run"]) return;

      process.exitCode = await runWithOverrides(command, { cwd: plan.cwd, overrides: plan.overrides });
    });
  },
});

const main = defineCommand({
  meta: {
    name: "portseed",
    version: "0.1.0",
    description: "Deterministic, collision-free local dev ports per project",
  },
  subCommands: {
    export: exportCmd,
    explain,
    lock,
    doctor,
    run,
  },
});

runMain(main);
