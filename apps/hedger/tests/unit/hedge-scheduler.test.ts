/**
 * HedgeScheduler Unit Tests
 *
 * The cycle and the inter-cycle wait are both controlled by the test.
 */

import { err, ok, type Result } from "neverthrow";
import { afterEach, describe, expect, it, vi } from "vitest";
import { logger, LogLevel } from "@delta-hedger/utils";

import { abortableSleep, HedgeScheduler, type SleepFn } from "../../src/services/hedge-scheduler";
import type { CycleSummary, HedgeCycleError, HedgeCycleOptions } from "../../src/usecases/hedge-cycle";

type CycleResult = Result<CycleSummary, HedgeCycleError>;

const summary = (options: HedgeCycleOptions): CycleSummary => ({
  cycleNo: options.cycleNo,
  mode: options.mode,
  startedAt: new Date("2025-01-15T00:00:00.000Z"),
  durationMs: 5,
  deltaRefresh: { updated: 0, failed: 0 },
  exposure: [],
  requirements: [],
  outcomes: [],
  skipped: { positions: [], underlyings: [] },
});

/**
 * Sleep that waits until the test releases it (or the scheduler aborts it)
 */
function controlledSleep() {
  const waits: { ms: number; release: () => void }[] = [];
  const sleep = vi.fn<SleepFn>(
    (ms, signal) =>
      new Promise<void>(resolve => {
        waits.push({ ms, release: resolve });
        signal.addEventListener("abort", () => resolve(), { once: true });
      }),
  );
  return { sleep, waits };
}

const okCycle = vi.fn(async (options: HedgeCycleOptions): Promise<CycleResult> => ok(summary(options)));

describe("HedgeScheduler", () => {
  it("loops cycle → wait → cycle until stopped", async () => {
    const { sleep, waits } = controlledSleep();
    const runCycle = vi.fn(async (options: HedgeCycleOptions): Promise<CycleResult> => ok(summary(options)));
    const onCycle = vi.fn();
    const scheduler = new HedgeScheduler({ runCycle, intervalSec: () => 10, errorBackoffSec: 30, sleep, onCycle });

    expect(scheduler.start().isOk()).toBe(true);
    expect(scheduler.getState()).toBe("RUNNING");

    await vi.waitFor(() => expect(waits).toHaveLength(1));
    waits[0]?.release();
    await vi.waitFor(() => expect(waits).toHaveLength(2));

    await scheduler.stop();

    expect(scheduler.getState()).toBe("IDLE");
    expect(runCycle).toHaveBeenCalledTimes(2);
    expect(runCycle.mock.calls.map(([o]) => o)).toEqual([
      { cycleNo: 1, mode: "execute" },
      { cycleNo: 2, mode: "execute" },
    ]);
    expect(waits.map(w => w.ms)).toEqual([10_000, 10_000]);
    expect(onCycle).toHaveBeenCalledTimes(2);
  });

  it("backs off after a crashed or aborted cycle and carries on", async () => {
    const { sleep, waits } = controlledSleep();
    const runCycle = vi
      .fn<(options: HedgeCycleOptions) => Promise<CycleResult>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce(
        err<CycleSummary, HedgeCycleError>({
          type: "CYCLE_ABORTED",
          message: "aggregate: down",
          cause: { type: "DB_ERROR", message: "down" },
        }),
      )
      .mockImplementation(async options => ok(summary(options)));
    const scheduler = new HedgeScheduler({ runCycle, intervalSec: () => 10, errorBackoffSec: 30, sleep });

    scheduler.start();
    await vi.waitFor(() => expect(waits).toHaveLength(1));
    waits[0]?.release();
    await vi.waitFor(() => expect(waits).toHaveLength(2));
    waits[1]?.release();
    await vi.waitFor(() => expect(waits).toHaveLength(3));
    await scheduler.stop();

    expect(waits.map(w => w.ms)).toEqual([30_000, 30_000, 10_000]);
    expect(runCycle).toHaveBeenCalledTimes(3);
  });

  describe("with a log sink that fails on errors", () => {
    afterEach(() => {
      logger.clearSink();
      vi.restoreAllMocks();
    });

    it("keeps looping after a crashed cycle", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      logger.setSink({
        write: record => {
          if (record.level === LogLevel.ERROR) throw new Error("ENOSPC: no space left on device");
        },
      });
      const { sleep, waits } = controlledSleep();
      const runCycle = vi
        .fn<(options: HedgeCycleOptions) => Promise<CycleResult>>()
        .mockRejectedValueOnce(new Error("boom"))
        .mockImplementation(async options => ok(summary(options)));
      const scheduler = new HedgeScheduler({ runCycle, intervalSec: () => 10, errorBackoffSec: 30, sleep });

      expect(scheduler.start().isOk()).toBe(true);
      await vi.waitFor(() => expect(waits).toHaveLength(1));
      waits[0]?.release();
      await vi.waitFor(() => expect(waits).toHaveLength(2));

      expect(scheduler.getState()).toBe("RUNNING");
      expect(scheduler.getCycleCount()).toBe(2);

      await scheduler.stop();

      expect(scheduler.getState()).toBe("IDLE");
      expect(waits.map(w => w.ms)).toEqual([30_000, 10_000]);
    });

    it("starts cleanly when the start log cannot be written", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      vi.spyOn(console, "info").mockImplementation(() => undefined);
      logger.setSink({
        write: () => {
          throw new Error("EACCES: permission denied");
        },
      });
      const { sleep, waits } = controlledSleep();
      const scheduler = new HedgeScheduler({ runCycle: okCycle, intervalSec: () => 10, errorBackoffSec: 30, sleep });

      expect(scheduler.start().isOk()).toBe(true);
      await vi.waitFor(() => expect(waits).toHaveLength(1));
      await scheduler.stop();

      expect(scheduler.getState()).toBe("IDLE");
      expect(scheduler.start().isOk()).toBe(true);
      await scheduler.stop();
    });
  });

  it("picks up a changed interval on the next wait", async () => {
    const { sleep, waits } = controlledSleep();
    let interval = 10;
    const scheduler = new HedgeScheduler({ runCycle: okCycle, intervalSec: () => interval, errorBackoffSec: 30, sleep });

    scheduler.start();
    await vi.waitFor(() => expect(waits).toHaveLength(1));
    interval = 3;
    waits[0]?.release();
    await vi.waitFor(() => expect(waits).toHaveLength(2));
    await scheduler.stop();

    expect(waits.map(w => w.ms)).toEqual([10_000, 3_000]);
  });

  it("lets an in-flight cycle finish before stopping", async () => {
    const { sleep } = controlledSleep();
    let finish: (value: CycleResult) => void = () => undefined;
    const runCycle = vi.fn(
      (_options: HedgeCycleOptions) =>
        new Promise<CycleResult>(resolve => {
          finish = resolve;
        }),
    );
    const scheduler = new HedgeScheduler({ runCycle, intervalSec: () => 10, errorBackoffSec: 30, sleep });

    scheduler.start();
    await vi.waitFor(() => expect(runCycle).toHaveBeenCalledTimes(1));

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    expect(scheduler.getState()).toBe("STOPPING");
    await Promise.resolve();
    expect(stopped).toBe(false);

    finish(ok(summary({ cycleNo: 1, mode: "execute" })));
    await stopping;

    expect(scheduler.getState()).toBe("IDLE");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("refuses a second start and a manual execute while running", async () => {
    const { sleep } = controlledSleep();
    const scheduler = new HedgeScheduler({ runCycle: okCycle, intervalSec: () => 10, errorBackoffSec: 30, sleep });

    scheduler.start();

    expect(scheduler.start()._unsafeUnwrapErr().type).toBe("AUTO_HEDGE_RUNNING");
    expect((await scheduler.runOnce({ execute: true }))._unsafeUnwrapErr().type).toBe("AUTO_HEDGE_RUNNING");
    expect((await scheduler.runOnce({ execute: false }))._unsafeUnwrap().mode).toBe("analyze");

    await scheduler.stop();
  });

  it("runs a one-shot cycle while idle", async () => {
    const runCycle = vi.fn(async (options: HedgeCycleOptions): Promise<CycleResult> => ok(summary(options)));
    const scheduler = new HedgeScheduler({ runCycle, intervalSec: () => 10, errorBackoffSec: 30 });

    const result = await scheduler.runOnce({ execute: true });

    expect(result._unsafeUnwrap()).toMatchObject({ cycleNo: 1, mode: "execute" });
    expect(scheduler.getState()).toBe("IDLE");
  });

  it("turns a crashed one-shot cycle into an error result", async () => {
    const runCycle = vi.fn(async (_options: HedgeCycleOptions): Promise<CycleResult> => {
      throw new Error("unexpected");
    });
    const scheduler = new HedgeScheduler({ runCycle, intervalSec: () => 10, errorBackoffSec: 30 });

    expect((await scheduler.runOnce({ execute: false }))._unsafeUnwrapErr()).toEqual({
      type: "CYCLE_FAILED",
      message: "unexpected",
    });
  });

  it("resolves stop() immediately when idle", async () => {
    const scheduler = new HedgeScheduler({ runCycle: okCycle, intervalSec: () => 10, errorBackoffSec: 30 });

    await scheduler.stop();

    expect(scheduler.getState()).toBe("IDLE");
  });
});

describe("abortableSleep", () => {
  it("resolves early when aborted", async () => {
    const controller = new AbortController();
    const started = Date.now();

    const sleeping = abortableSleep(60_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("resolves at once for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
