/**
 * Hedge Config Store - Process-wide hedge settings
 *
 * - Initialized from env defaults
 * - Mutated only through validated setters (operator console)
 * - Read by every cycle, so a change applies from the next cycle on
 */

import { err, ok, type Result } from "neverthrow";
import { isValidThresholdPct } from "@delta-hedger/core";

export interface HedgeConfig {
  thresholdPct: number;
  intervalSec: number;
  autoHedgeEnabled: boolean;
}

export type HedgeConfigError = { type: "INVALID_THRESHOLD" | "INVALID_INTERVAL"; message: string };

export class HedgeConfigStore {
  private config: HedgeConfig;

  constructor(initial: Omit<HedgeConfig, "autoHedgeEnabled">) {
    this.config = { ...initial, autoHedgeEnabled: false };
  }

  snapshot(): Readonly<HedgeConfig> {
    return { ...this.config };
  }

  get thresholdPct(): number {
    return this.config.thresholdPct;
  }

  get intervalSec(): number {
    return this.config.intervalSec;
  }

  get autoHedgeEnabled(): boolean {
    return this.config.autoHedgeEnabled;
  }

  /**
   * 0 < pct ≤ 100
   */
  setThresholdPct(pct: number): Result<number, HedgeConfigError> {
    if (!isValidThresholdPct(pct)) {
      return err({ type: "INVALID_THRESHOLD", message: `threshold must be in (0, 100], got ${String(pct)}` });
    }
    this.config = { ...this.config, thresholdPct: pct };
    return ok(pct);
  }

  /**
   * Whole seconds, at least 1
   */
  setIntervalSec(sec: number): Result<number, HedgeConfigError> {
    if (!Number.isInteger(sec) || sec < 1) {
      return err({ type: "INVALID_INTERVAL", message: `interval must be an integer >= 1, got ${String(sec)}` });
    }
    this.config = { ...this.config, intervalSec: sec };
    return ok(sec);
  }

  setAutoHedgeEnabled(enabled: boolean): void {
    this.config = { ...this.config, autoHedgeEnabled: enabled };
  }
}
