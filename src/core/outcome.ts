import { formatErrorMessage, formatErrorTrace } from "./error-format.js";
import { UserFacingError } from "./errors.js";
import type { RuntimeLibrary } from "./runtime-loader.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOutcome =
  | { kind: "success" }
  | { kind: "domain-error"; message: string }
  | { kind: "unhandled-fault"; message: string; stackTrace: string };

export type OutcomeReporter = Pick<RuntimeLibrary, "isRunError" | "log">;

export const UNHANDLED_FAULT_PREFACE = "Program failed with an unhandled exception:";

export const EXIT_CODES = {
  success: 0,
  failure: 1,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// CLASSIFICATION
// =============================================================================

/** Drives the run and folds however it ends into a single reported outcome. */
export async function classifyRun(
  drive: () => Promise<unknown>,
  reporter: OutcomeReporter,
): Promise<RunOutcome> {
  try {
    await drive();
    return { kind: "success" };
  } catch (error) {
    const outcome = classifyError(error, reporter);
    reportOutcome(outcome, reporter);
    return outcome;
  }
}

export function classifyError(
  error: unknown,
  reporter: Pick<RuntimeLibrary, "isRunError">,
): Exclude<RunOutcome, { kind: "success" }> {
  if (reporter.isRunError(error) || error instanceof UserFacingError) {
    return { kind: "domain-error", message: formatErrorMessage(error) };
  }

  return {
    kind: "unhandled-fault",
    message: formatErrorMessage(error),
    stackTrace: formatErrorTrace(error),
  };
}

export function exitCodeFor(outcome: RunOutcome): ExitCode {
  return outcome.kind === "success" ? EXIT_CODES.success : EXIT_CODES.failure;
}

// =============================================================================
// REPORTING
// =============================================================================

function reportOutcome(outcome: RunOutcome, reporter: Pick<RuntimeLibrary, "log">): void {
  switch (outcome.kind) {
    case "success":
      return;
    case "domain-error":
      reporter.log.error(outcome.message);
      return;
    case "unhandled-fault":
      reporter.log.error(`${UNHANDLED_FAULT_PREFACE}\n${outcome.stackTrace}`);
      return;
  }
}
