import { describe, expect, it } from "vitest";

import { createRecordingStream } from "./__tests__/fakes.js";
import { flushStream, withTeardown } from "./teardown.js";

function createRecordingScheduler(events: string[]) {
  return {
    closes: 0,
    close() {
      this.closes += 1;
      events.push("close");
    },
  };
}

describe("withTeardown", () => {
  it("closes the scheduler and flushes every stream after a normal return", async () => {
    const events: string[] = [];
    const scheduler = createRecordingScheduler(events);
    const stdout = createRecordingStream();
    const stderr = createRecordingStream();

    const result = await withTeardown(scheduler, [stdout, stderr], async () => {
      events.push("body");
      return "done";
    });

    expect(result).toBe("done");
    expect(events).toEqual(["body", "close"]);
    expect(scheduler.closes).toBe(1);
    expect(stdout.flushes).toBe(1);
    expect(stderr.flushes).toBe(1);
  });

  it("still tears down when the body throws", async () => {
    const scheduler = createRecordingScheduler([]);
    const stdout = createRecordingStream();
    const stderr = createRecordingStream();

    await expect(
      withTeardown(scheduler, [stdout, stderr], async () => {
        throw new Error("body failed");
      }),
    ).rejects.toThrow("body failed");

    expect(scheduler.closes).toBe(1);
    expect(stdout.flushes).toBe(1);
    expect(stderr.flushes).toBe(1);
  });

  it("lets a flush fault propagate", async () => {
    const scheduler = createRecordingScheduler([]);
    const broken = createRecordingStream({ failFlushWith: new Error("EPIPE") });

    await expect(withTeardown(scheduler, [broken], async () => "done")).rejects.toThrow("EPIPE");
    expect(scheduler.closes).toBe(1);
  });

  it("lets a close fault propagate without flushing", async () => {
    const stdout = createRecordingStream();
    const scheduler = {
      close() {
        throw new Error("close failed");
      },
    };

    await expect(withTeardown(scheduler, [stdout], async () => "done")).rejects.toThrow(
      "close failed",
    );
    expect(stdout.flushes).toBe(0);
  });
});

describe("flushStream", () => {
  it("writes an empty chunk and waits for its callback", async () => {
    const stream = createRecordingStream();
    stream.write("buffered output\n");

    await flushStream(stream);

    expect(stream.flushes).toBe(1);
    expect(stream.text()).toBe("buffered output\n");
  });
});
