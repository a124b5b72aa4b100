import type { InvocationArgs } from "../cli/args.js";

import type { ConfigEnvironment } from "./config-env.js";
import { injectConfig } from "./config-injector.js";
import { type HostLoggers, suppressSchedulerDiagnostics } from "./logger.js";
import { classifyRun, exitCodeFor, type ExitCode, type RunOutcome } from "./outcome.js";
import { runProgram, type ProgramInvocation } from "./program-runner.js";
import type { RuntimeLibrary } from "./runtime-loader.js";
import { acquireScheduler, type SchedulerHost } from "./scheduler.js";
import { buildRuntimeSettings } from "./settings.js";
import { type FlushableStream, withTeardown } from "./teardown.js";

// =============================================================================
// TYPES
// =============================================================================

export type HostState =
  | "start"
  | "settings-built"
  | "config-injected"
  | "loop-acquired"
  | "running"
  | "succeeded"
  | "domain-failed"
  | "faulted"
  | "torn-down"
  | "exited";

export type ExecuteHostOptions = {
  args: InvocationArgs;
  runtime: RuntimeLibrary;
  configEnvironment: ConfigEnvironment;
  loggers: HostLoggers;
  streams?: readonly FlushableStream[];
  schedulerHost?: SchedulerHost;
  runProgram?: (invocation: ProgramInvocation) => Promise<void>;
  onTransition?: (state: HostState) => void;
};

export type HostRunResult = {
  outcome: RunOutcome;
  exitCode: ExitCode;
};

const OUTCOME_STATES: Record<RunOutcome["kind"], HostState> = {
  success: "succeeded",
  "domain-error": "domain-failed",
  "unhandled-fault": "faulted",
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Performs the one supervised run of the program: settings and configuration are installed
 * before any program code loads, the run is driven to completion on the scheduler, and the
 * scheduler is closed and output flushed before the exit code is decided.
 */
export async function executeHost(opts: ExecuteHostOptions): Promise<HostRunResult> {
  const { args, runtime, loggers } = opts;
  const startProgram = opts.runProgram ?? runProgram;
  const streams = opts.streams ?? [process.stdout, process.stderr];

  const transition = (state: HostState): void => {
    loggers.host.debug(`state: ${state}`);
    opts.onTransition?.(state);
  };

  transition("start");

  runtime.configure(buildRuntimeSettings(args));
  transition("settings-built");

  const injection = injectConfig(runtime, opts.configEnvironment);
  loggers.host.debug(
    `Installed ${Object.keys(opts.configEnvironment.values).length} config value(s) via ${injection} path.`,
  );
  transition("config-injected");

  const scheduler = acquireScheduler({ diagnostics: loggers.scheduler, host: opts.schedulerHost });
  transition("loop-acquired");

  if (args.tracing) {
    loggers.host.debug(`Tracing endpoint ${args.tracing} is not forwarded by this host.`);
  }

  suppressSchedulerDiagnostics(loggers);

  const outcome = await withTeardown(scheduler, streams, async () => {
    transition("running");
    const invocation: ProgramInvocation = {
      program: args.program,
      programArgs: args.programArgs,
      pwd: args.pwd,
    };

    const result = await classifyRun(
      () =>
        scheduler.runUntilComplete(
          scheduler.schedule(() => runtime.runInStack(() => startProgram(invocation))),
        ),
      runtime,
    );
    transition(OUTCOME_STATES[result.kind]);
    return result;
  });
  transition("torn-down");

  const exitCode = exitCodeFor(outcome);
  transition("exited");
  return { outcome, exitCode };
}
