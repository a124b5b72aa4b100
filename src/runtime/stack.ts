import { log } from "./log.js";
import { drainOperations } from "./operations.js";
import { formatErrorMessage } from "../core/error-format.js";

/**
 * Runs a program's top-level work and completes only once every operation it started has
 * settled. An error thrown by the work itself takes precedence over operation failures; of
 * the operation failures, the first to settle is raised. Failures that are not raised are logged at debug.
 */
export async function runInStack(work: () => unknown): Promise<void> {
  let workFailure: { error: unknown } | undefined;
  try {
    await work();
  } catch (error) {
    workFailure = { error };
  }

  const failures = await drainOperations();
  const unreported = workFailure ? failures : failures.slice(1);
  for (const extra of unreported) {
    log.debug(`Additional operation failure: ${formatErrorMessage(extra)}`);
  }

  if (workFailure) {
    throw workFailure.error;
  }
  if (failures.length > 0) {
    throw failures[0];
  }
}
