import type { Scheduler } from "./scheduler.js";

export type FlushableStream = {
  write(chunk: string, callback?: (error?: Error | null) => void): boolean;
};

/**
 * Runs `body`, then closes the scheduler and flushes every stream on the way out, whatever
 * `body` did. Faults raised while closing or flushing propagate.
 */
export async function withTeardown<T>(
  scheduler: Pick<Scheduler, "close">,
  streams: readonly FlushableStream[],
  body: () => Promise<T>,
): Promise<T> {
  try {
    return await body();
  } finally {
    scheduler.close();
    await flushStreams(streams);
  }
}

export async function flushStreams(streams: readonly FlushableStream[]): Promise<void> {
  for (const stream of streams) {
    await flushStream(stream);
  }
}

/** Resolves once everything written to `stream` so far has been handed to the OS. */
export function flushStream(stream: FlushableStream): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write("", (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
