const RUN_ERROR_BRAND: unique symbol = Symbol.for("stack-host.RunError");

/**
 * An expected, user-facing failure raised by resource or configuration logic. The host reports
 * only its message, never its stack.
 */
export class RunError extends Error {
  readonly [RUN_ERROR_BRAND] = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RunError";
  }
}

/** Recognizes run errors across duplicate copies of the runtime library. */
export function isRunError(error: unknown): error is RunError {
  if (error instanceof RunError) return true;
  return typeof error === "object" && error !== null && RUN_ERROR_BRAND in error;
}
