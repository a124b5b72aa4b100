/*
Purpose: bookkeeping for asynchronous resource operations a program starts without awaiting.
Assumptions: every operation handed to trackOperation eventually settles.
*/

const pending = new Set<Promise<void>>();
const failures: unknown[] = [];

/**
 * Registers an in-flight operation. The returned promise is the operation itself; callers may
 * ignore it, and its rejection is still observed here.
 */
export function trackOperation<T>(operation: Promise<T>): Promise<T> {
  const entry: Promise<void> = operation.then(
    () => {
      pending.delete(entry);
    },
    (error: unknown) => {
      pending.delete(entry);
      failures.push(error);
    },
  );
  pending.add(entry);
  return operation;
}

export function pendingOperationCount(): number {
  return pending.size;
}

/**
 * Waits until no tracked operation is in flight, including operations registered while
 * waiting, and hands back the failures collected so far.
 */
export async function drainOperations(): Promise<unknown[]> {
  while (pending.size > 0) {
    await Promise.all([...pending]);
  }
  return failures.splice(0, failures.length);
}
