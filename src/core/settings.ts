import type { InvocationArgs } from "../cli/args.js";
import type { RuntimeSettings } from "../runtime/settings.js";

export type { RuntimeSettings };

/** Derives the immutable process-wide settings record from the parsed invocation. */
export function buildRuntimeSettings(args: InvocationArgs): RuntimeSettings {
  return Object.freeze({
    monitorAddress: args.monitor,
    engineAddress: args.engine,
    project: args.project,
    stack: args.stack,
    organization: args.organization,
    parallelism: args.parallelism,
    dryRun: args.dryRun,
  });
}
