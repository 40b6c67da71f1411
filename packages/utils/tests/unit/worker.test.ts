/**
 * Polling Worker Unit Tests
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { logger } from "../../src/logger";
import { createPollingWorker, STOP, type StopReason } from "../../src/worker";

describe("createPollingWorker", () => {
  beforeEach(() => {
    logger.setSink({ write: () => undefined });
  });

  afterEach(() => {
    logger.clearSink();
  });

  test("runs iterations until runOnce returns STOP", async () => {
    let count = 0;
    const cleanup = vi.fn();

    const worker = createPollingWorker({
      name: "test-worker",
      intervalMs: 1,
      runOnce: async () => {
        count += 1;
        return count === 3 ? STOP : undefined;
      },
      cleanup,
    });

    await expect(worker.done).resolves.toBe("iteration_requested");
    expect(count).toBe(3);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(cleanup).toHaveBeenCalledWith("iteration_requested");
    expect(worker.isRunning()).toBe(false);
  });

  test("stop() finishes the in-flight iteration and cuts the sleep short", async () => {
    let count = 0;

    const worker = createPollingWorker({
      name: "test-worker",
      intervalMs: 60_000,
      runOnce: async () => {
        count += 1;
      },
    });

    await expect(worker.stop()).resolves.toBe("requested");
    expect(count).toBe(1);
  });

  test("stops on a failed iteration by default", async () => {
    const reasons: StopReason[] = [];

    const worker = createPollingWorker({
      name: "test-worker",
      intervalMs: 1,
      runOnce: () => Promise.reject(new Error("boom")),
      cleanup: reason => {
        reasons.push(reason);
      },
    });

    await expect(worker.done).resolves.toBe("iteration_failed");
    expect(reasons).toEqual(["iteration_failed"]);
  });

  test("keeps going after a failed iteration when stopOnError is false", async () => {
    let count = 0;

    const worker = createPollingWorker({
      name: "test-worker",
      intervalMs: 1,
      stopOnError: false,
      runOnce: async () => {
        count += 1;
        if (count === 1) throw new Error("transient");
        return STOP;
      },
    });

    await expect(worker.done).resolves.toBe("iteration_requested");
    expect(count).toBe(2);
  });

  test("never overlaps iterations", async () => {
    let active = 0;
    let maxActive = 0;
    let count = 0;

    const worker = createPollingWorker({
      name: "test-worker",
      intervalMs: 0,
      runOnce: async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise(resolve => setTimeout(resolve, 5));
        active -= 1;
        count += 1;
        return count === 4 ? STOP : undefined;
      },
    });

    await worker.done;
    expect(maxActive).toBe(1);
    expect(count).toBe(4);
  });
});
