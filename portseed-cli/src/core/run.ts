import { spawn } from "node:child_process";

export interface RunOptions {
  cwd: string;
  overrides: Record<string, string>;
  environ?: NodeJS.ProcessEnv;
}

export function buildExecEnv(
  environ: NodeJS.ProcessEnv,
  overrides: Record<string, string>,
): NodeJS.ProcessEnv {
  return { ...environ, ...overrides };
}

/**
 * Runs a command with the resolved overrides merged over the environment
 * and resolves with its exit code. Signals are forwarded to the child.
 */
export function runWithOverrides(command: string[], options: RunOptions): Promise<number> {
  const [cmd, ...args] = command;
  const child = spawn(cmd, args, {
    cwd: options.cwd,
    env: buildExecEnv(options.environ ?? process.env, options.overrides),
    stdio: "inherit",
  });

  const forward = (signal: NodeJS.Signals) => () => {
    child.kill(signal);
  };
  const onInt = forward("SIGINT");
  const onTerm = forward("SIGTERM");
  process.on("SIGINT", onInt);
  process.on("SIGTERM", onTerm);

  return new Promise((resolve) => {
    const cleanup = () => {
      process.off("SIGINT", onInt);
      process.off("SIGTERM", onTerm);
    };

    child.on("close", (code, signal) => {
      cleanup();
      if (signal === "SIGINT") resolve(130);
      else if (signal === "SIGTERM") resolve(143);
      else resolve(code ?? 0);
    });

    child.on("error", (err) => {
      cleanup();
      console.error(`Failed to run command: ${err.message}`);
      resolve(1);
    });
  });
}
