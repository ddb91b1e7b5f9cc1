export type {
  PortseedConfig,
  ConfigFragment,
  Preset,
  ScannerConfig,
  LinkRule,
  SelectionInputs,
  ResolvedOptions,
} from "./config/types.js";

export {
  loadConfig,
  loadDefaultConfig,
  defaultConfigPaths,
  foldConfig,
  parseConfigFragment,
  resolveOptions,
  lookupPreset,
  CONFIG_NAME,
} from "./config/loader.js";
export { BUILTIN_PRESETS } from "./config/presets.js";

export { buildPlan, type Plan, type PlanOptions } from "./core/plan.js";
export { lockProject, type LockResult } from "./core/lock.js";
export { assignPorts, toOverrides, type Assignment, type AssignOptions } from "./core/allocate.js";
export { deriveSeed, type DerivedSeed, type SeedInputs } from "./core/seed.js";
export { runDoctor, type DoctorCheck, type DoctorReport, type DoctorOptions } from "./core/doctor.js";
export { runWithOverrides, buildExecEnv, type RunOptions } from "./core/run.js";
export {
  buildPayload,
  formatOverrides,
  formatSummary,
  formatExplain,
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
  type OutputPayload,
} from "./core/format.js";
export {
  ValidationError,
  LockfileError,
  NoFreePortError,
  ScanCancelledError,
  isCancellation,
  errorMessage,
} from "./core/errors.js";

export { scanPortKeys, type Discovery, type ScanOptions, type ScanResult } from "./scan/scanner.js";
export { selectKeys, type Decision, type SelectionRules } from "./scan/selection.js";
export { parseDotenv, isPortKey, isValidEnvKey } from "./scan/dotenv.js";

export {
  LOCKFILE_NAME,
  buildLockfile,
  writeLockfile,
  readLockfile,
  loadTrustedLockfile,
  type LockFile,
} from "./lockfile/store.js";

export { parseTargetEnv, parseTargetEnvs, type TargetEnvDirective } from "./link/directive.js";
export { resolveLinks, type LinkRewrite, type LinkResult } from "./link/resolver.js";
export { parseLoopbackUrl, replaceLoopbackPort } from "./link/url.js";

export {
  DEFAULT_RANGE,
  fnv1a32,
  seedFor,
  withBranch,
  parseRange,
  preferredPort,
  findDeterministic,
  isPortFree,
  type PortRange,
  type IsFree,
} from "./utils/port.js";
export { resolveGitBranch, createBranchCache, type BranchResolver } from "./utils/branch.js";
