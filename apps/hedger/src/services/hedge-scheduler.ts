/**
 * Hedge Scheduler - One-shot and continuous hedge cycles
 *
 * States: IDLE → RUNNING → STOPPING → IDLE
 *
 * - runOnce(): a single cycle; execute runs are refused while the loop runs
 * - start(): loop cycle → wait intervalSec → cycle ...
 * - a failed or crashed cycle is logged and followed by the error backoff
 * - stop(): wakes the wait, lets an in-flight cycle finish, resolves once the loop exits
 *
 * Owns no trading logic.
 */

import { err, ok, type Result } from "neverthrow";
import { logger } from "@delta-hedger/utils";

import type { CycleMode, CycleSummary, HedgeCycleError, HedgeCycleOptions } from "../usecases/hedge-cycle";

export type SchedulerState = "IDLE" | "RUNNING" | "STOPPING";

export type SchedulerError =
  | HedgeCycleError
  | { type: "AUTO_HEDGE_RUNNING"; message: string }
  | { type: "EXECUTE_IN_PROGRESS"; message: string }
  | { type: "CYCLE_FAILED"; message: string };

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface HedgeSchedulerDeps {
  runCycle: (options: HedgeCycleOptions) => Promise<Result<CycleSummary, HedgeCycleError>>;
  intervalSec: () => number;
  errorBackoffSec: number;
  sleep?: SleepFn;
  /**
   * Called after every successful continuous cycle
   */
  onCycle?: (summary: CycleSummary) => void;
}

/**
 * Wait `ms`, resolving early when `signal` aborts.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HedgeScheduler {
  private readonly deps: HedgeSchedulerDeps;
  private readonly sleep: SleepFn;

  private state: SchedulerState = "IDLE";
  private cycleNo = 0;
  private loop: Promise<void> | null = null;
  private wake: AbortController | null = null;
  private oneShotExecuting = false;

  constructor(deps: HedgeSchedulerDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? abortableSleep;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getCycleCount(): number {
    return this.cycleNo;
  }

  /**
   * Run a single cycle now. Analyze runs are always allowed.
   */
  async runOnce(options: { execute: boolean }): Promise<Result<CycleSummary, SchedulerError>> {
    const mode: CycleMode = options.execute ? "execute" : "analyze";

    if (options.execute) {
      if (this.state !== "IDLE") {
        return err({ type: "AUTO_HEDGE_RUNNING", message: "stop auto-hedge before executing manually" });
      }
      if (this.oneShotExecuting) {
        return err({ type: "EXECUTE_IN_PROGRESS", message: "a manual hedge execution is already running" });
      }
      this.oneShotExecuting = true;
    }

    try {
      return await this.runGuarded(mode);
    } finally {
      if (options.execute) this.oneShotExecuting = false;
    }
  }

  /**
   * Enter continuous mode.
   */
  start(): Result<void, SchedulerError> {
    if (this.state !== "IDLE") {
      return err({ type: "AUTO_HEDGE_RUNNING", message: `scheduler is ${this.state}` });
    }
    if (this.oneShotExecuting) {
      return err({ type: "EXECUTE_IN_PROGRESS", message: "a manual hedge execution is running" });
    }

    this.state = "RUNNING";
    this.loop = this.runLoop();
    logger.info("Auto-hedge started", { intervalSec: this.deps.intervalSec() });
    return ok(undefined);
  }

  /**
   * Leave continuous mode. Resolves once the loop has exited.
   */
  stop(): Promise<void> {
    if (this.state === "IDLE" || this.loop === null) {
      return Promise.resolve();
    }
    if (this.state === "RUNNING") {
      this.state = "STOPPING";
      logger.info("Auto-hedge stopping");
      this.wake?.abort();
    }
    return this.loop;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private async runGuarded(mode: CycleMode): Promise<Result<CycleSummary, SchedulerError>> {
    this.cycleNo += 1;
    const cycleNo = this.cycleNo;
    try {
      const result = await this.deps.runCycle({ cycleNo, mode });
      if (result.isErr()) {
        logger.error("Hedge cycle aborted", { cycleNo, mode, error: result.error.message });
      }
      return result;
    } catch (error) {
      logger.error("Hedge cycle crashed", { cycleNo, mode, error: describeError(error) });
      return err({ type: "CYCLE_FAILED", message: describeError(error) });
    }
  }

  private async runLoop(): Promise<void> {
    try {
      while (this.state === "RUNNING") {
        const result = await this.runGuarded("execute");

        let waitMs: number;
        if (result.isOk()) {
          waitMs = this.deps.intervalSec() * 1000;
          this.notifyCycle(result.value);
        } else {
          waitMs = this.deps.errorBackoffSec * 1000;
          logger.warn("Backing off after failed cycle", { waitSec: this.deps.errorBackoffSec });
        }

        if (this.state !== "RUNNING") break;

        const wake = new AbortController();
        this.wake = wake;
        await this.sleep(waitMs, wake.signal);
        this.wake = null;
      }
    } catch (error) {
      // The loop itself failed (not a cycle); leave the scheduler restartable
      logger.error("Auto-hedge loop failed", { error: describeError(error) });
    } finally {
      this.state = "IDLE";
      this.loop = null;
      this.wake = null;
    }

    logger.info("Auto-hedge stopped", { cycles: this.cycleNo });
  }

  private notifyCycle(summary: CycleSummary): void {
    try {
      this.deps.onCycle?.(summary);
    } catch (error) {
      logger.warn("Cycle listener failed", { cycleNo: summary.cycleNo, error: describeError(error) });
    }
  }
}
