import { ValidationError } from "../core/errors.js";
import { isValidEnvKey } from "../scan/dotenv.js";

export type TargetEnvDirective =
  | { mode: "smart"; raw: string; envPath: string }
  | {
      mode: "explicit";
      raw: string;
      sourceKey: string;
      envPath: string;
      targetPortKey?: string;
    };

/**
 * Parses one `--target-env` value.
 *
 *   path/to/.env                   smart: infer source keys by port value
 *   SOURCE_KEY=path/to/.env        explicit, target key defaults to APP_PORT/PORT
 *   SOURCE_KEY=path/to/.env:KEY    explicit with a target port key
 */
export function parseTargetEnv(value: string): TargetEnvDirective {
  const raw = value.trim();
  if (!raw) {
    throw new ValidationError("target env spec cannot be empty");
  }

  const eq = raw.indexOf("=");
  if (eq < 0) {
    return { mode: "smart", raw, envPath: raw };
  }

  const sourceKey = raw.slice(0, eq).trim();
  const right = raw.slice(eq + 1).trim();
  if (!sourceKey) {
    throw new ValidationError(`invalid target env spec "${raw}": missing source key`);
  }
  if (!isValidEnvKey(sourceKey)) {
    throw new ValidationError(`invalid target env spec "${raw}": invalid source key "${sourceKey}"`);
  }
  if (!right) {
    throw new ValidationError(`invalid target env spec "${raw}": missing env path`);
  }
  if (right.endsWith(":")) {
    throw new ValidationError(`invalid target env spec "${raw}": missing target port key after ':'`);
  }

  let envPath = right;
  let targetPortKey: string | undefined;
  const colon = right.lastIndexOf(":");
  if (colon > 0) {
    const candidate = right.slice(colon + 1).trim();
    if (isValidEnvKey(candidate)) {
      envPath = right.slice(0, colon).trim();
      targetPortKey = candidate;
    }
  }
  if (!envPath) {
    throw new ValidationError(`invalid target env spec "${raw}": missing env path`);
  }

  return { mode: "explicit", raw, sourceKey, envPath, targetPortKey };
}

export function parseTargetEnvs(values: string[]): TargetEnvDirective[] {
  return values.map(parseTargetEnv);
}
