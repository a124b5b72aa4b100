import path from "node:path";

import { CommanderError } from "commander";

import { parseInvocationArgs, type InvocationArgs } from "./cli/args.js";
import { readConfigEnvironment } from "./core/config-env.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";
import { UserFacingError } from "./core/errors.js";
import { executeHost, type ExecuteHostOptions } from "./core/executor.js";
import { createHostLoggers, resolveLogLevel, type HostLoggers } from "./core/logger.js";
import { EXIT_CODES } from "./core/outcome.js";
import { loadRuntimeLibrary, type LoadRuntimeOptions, type RuntimeLibrary } from "./core/runtime-loader.js";
import { type FlushableStream, flushStreams } from "./core/teardown.js";

export { executeHost } from "./core/executor.js";
export type { HostRunResult, HostState } from "./core/executor.js";
export type { InvocationArgs } from "./cli/args.js";
export type { RunOutcome } from "./core/outcome.js";
export { EXIT_CODES } from "./core/outcome.js";

// =============================================================================
// TYPES
// =============================================================================

export type MainDeps = {
  env: NodeJS.ProcessEnv;
  cwd: () => string;
  stdout: FlushableStream;
  stderr: FlushableStream & { isTTY?: boolean };
  loggers: HostLoggers;
  loadRuntime: (opts: LoadRuntimeOptions) => Promise<RuntimeLibrary>;
  execute: (opts: ExecuteHostOptions) => ReturnType<typeof executeHost>;
};

export const RUNTIME_SPECIFIER_ENV_VAR = "STACK_HOST_RUNTIME";
export const LOG_LEVEL_ENV_VAR = "STACK_HOST_LOG_LEVEL";

// =============================================================================
// ENTRYPOINT
// =============================================================================

/** Runs the host once and resolves to the process exit code. */
export async function main(argv: readonly string[], overrides: Partial<MainDeps> = {}): Promise<number> {
  const env = overrides.env ?? process.env;
  const deps: MainDeps = {
    env,
    cwd: overrides.cwd ?? (() => process.cwd()),
    stdout: overrides.stdout ?? process.stdout,
    stderr: overrides.stderr ?? process.stderr,
    loggers: overrides.loggers ?? createHostLoggers(env),
    loadRuntime: overrides.loadRuntime ?? loadRuntimeLibrary,
    execute: overrides.execute ?? executeHost,
  };
  const streams = [deps.stdout, deps.stderr];

  let args: InvocationArgs;
  try {
    args = parseInvocationArgs(argv, {
      output: {
        writeOut: (text) => {
          deps.stdout.write(text);
        },
        writeErr: (text) => {
          deps.stderr.write(text);
        },
      },
    });
  } catch (err) {
    if (err instanceof CommanderError) {
      await flushStreams(streams);
      return err.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.failure;
    }
    throw err;
  }

  let runtime: RuntimeLibrary;
  let configEnvironment: ReturnType<typeof readConfigEnvironment>;
  try {
    configEnvironment = readConfigEnvironment(env);
    runtime = await deps.loadRuntime({
      specifier: env[RUNTIME_SPECIFIER_ENV_VAR],
      searchFrom: path.resolve(deps.cwd(), args.pwd ?? ".", args.program),
    });
  } catch (err) {
    if (err instanceof UserFacingError) {
      return reportFatal(err, deps);
    }
    throw err;
  }

  deps.loggers.host.debug(`Loaded runtime library for program ${args.program}.`);
  const result = await deps.execute({
    args,
    runtime,
    configEnvironment,
    loggers: deps.loggers,
    streams,
  });
  return result.exitCode;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Writes a fatal error to the diagnostic stream. The trace, code and cause are included only
 * at the debug log level. Also used by the entry shim for faults that escape `main`.
 */
export function writeFatalError(
  error: unknown,
  stderr: MainDeps["stderr"] = process.stderr,
  env: NodeJS.ProcessEnv = process.env,
): void {
  const mode = resolveLogLevel(env[LOG_LEVEL_ENV_VAR]) === "debug" ? "debug" : "short";
  const format = createAnsiFormatter(resolveColorEnabled(stderr, env));
  stderr.write(`${renderErrorLines(formatErrorLines(error, { mode }), format)}\n`);
}

async function reportFatal(error: UserFacingError, deps: MainDeps): Promise<number> {
  writeFatalError(error, deps.stderr, deps.env);
  await flushStreams([deps.stdout, deps.stderr]);
  return EXIT_CODES.failure;
}
