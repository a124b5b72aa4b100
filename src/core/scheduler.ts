/*
Purpose: the single cooperative scheduler that drives a supervised run on Node's event loop.
Assumptions: one run per process; the scheduler owns the process-level fault hooks while open.
Usage: const scheduler = acquireScheduler({ diagnostics }); await scheduler.runUntilComplete(scheduler.schedule(work)); scheduler.close();
*/

// =============================================================================
// TYPES
// =============================================================================

export type Scheduler = {
  readonly closed: boolean;
  /** Queues work to run on a later turn of the event loop. */
  schedule<T>(work: () => T | Promise<T>): Promise<T>;
  /** Settles with `task`, or rejects with the first uncaught exception raised meanwhile. */
  runUntilComplete<T>(task: Promise<T>): Promise<T>;
  pendingWork(): string[];
  close(): void;
};

export type SchedulerDiagnostics = {
  warning(message: string): unknown;
  debug(message: string): unknown;
};

export type SchedulerHost = Pick<NodeJS.EventEmitter, "on" | "off"> & {
  getActiveResourcesInfo?: () => string[];
};

export type AcquireSchedulerOptions = {
  diagnostics: SchedulerDiagnostics;
  host?: SchedulerHost;
};

// Handles the process always holds for its own stdio.
const IGNORED_RESOURCES = new Set(["TTYWrap", "PipeWrap"]);

// One scheduler per host for the host's lifetime; in production the host is the process.
const schedulers = new WeakMap<SchedulerHost, Scheduler>();
let active: Scheduler | undefined;

// =============================================================================
// ACQUISITION
// =============================================================================

/**
 * Returns the scheduler bound to the host, creating it on first use. A scheduler is never
 * recreated: once closed, later acquisitions get the closed instance, which refuses work.
 */
export function acquireScheduler(opts: AcquireSchedulerOptions): Scheduler {
  const host = opts.host ?? process;
  const existing = schedulers.get(host);
  if (existing) {
    return existing;
  }

  active = createScheduler(host, opts.diagnostics);
  schedulers.set(host, active);
  return active;
}

export function currentScheduler(): Scheduler | undefined {
  return active && !active.closed ? active : undefined;
}

// =============================================================================
// INTERNALS
// =============================================================================

function createScheduler(host: SchedulerHost, diagnostics: SchedulerDiagnostics): Scheduler {
  let closed = false;
  let scheduled = 0;
  const inspectResources = detectResourceInspector(host);

  const onUnhandledRejection = (reason: unknown): void => {
    diagnostics.warning(`Unobserved rejection: ${describeReason(reason)}`);
  };
  host.on("unhandledRejection", onUnhandledRejection);

  const pendingWork = (): string[] => {
    const pending = inspectResources().filter((name) => !IGNORED_RESOURCES.has(name));
    for (let i = 0; i < scheduled; i += 1) {
      pending.push("ScheduledWork");
    }
    return pending;
  };

  const assertOpen = (): void => {
    if (closed) {
      throw new Error("Scheduler is closed.");
    }
  };

  return {
    get closed() {
      return closed;
    },

    schedule<T>(work: () => T | Promise<T>): Promise<T> {
      assertOpen();
      scheduled += 1;
      return new Promise<T>((resolve, reject) => {
        setImmediate(() => {
          scheduled -= 1;
          try {
            resolve(work());
          } catch (error) {
            reject(error);
          }
        });
      });
    },

    async runUntilComplete<T>(task: Promise<T>): Promise<T> {
      assertOpen();
      let rejectWithFault: (error: unknown) => void = () => undefined;
      const fault = new Promise<never>((_resolve, reject) => {
        rejectWithFault = reject;
      });
      const onUncaughtException = (error: unknown): void => {
        rejectWithFault(error);
      };

      host.on("uncaughtException", onUncaughtException);
      try {
        return await Promise.race([task, fault]);
      } finally {
        host.off("uncaughtException", onUncaughtException);
      }
    },

    pendingWork,

    close(): void {
      if (closed) return;

      const pending = pendingWork();
      if (pending.length > 0) {
        diagnostics.warning(
          `Closing scheduler with ${pending.length} pending item(s): ${summarize(pending)}`,
        );
      }

      host.off("unhandledRejection", onUnhandledRejection);
      closed = true;
      diagnostics.debug("Scheduler closed.");
    },
  };
}

/** Node.js builds without `getActiveResourcesInfo` report no pending resources. */
function detectResourceInspector(host: SchedulerHost): () => string[] {
  if (typeof host.getActiveResourcesInfo !== "function") {
    return () => [];
  }
  return () => host.getActiveResourcesInfo?.() ?? [];
}

function summarize(items: string[]): string {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return [...counts.entries()].map(([name, count]) => `${name} x${count}`).join(", ");
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message || reason.name;
  }
  return String(reason);
}
