/**
 * Hedge Cycle - One pass of the hedger
 *
 * Refresh deltas → Aggregate → Evaluate → (optionally) Execute
 *
 * Data unavailability skips the affected item and the cycle continues;
 * a store failure while reading the book aborts the cycle.
 */

import { err, ok, type Result } from "neverthrow";
import type { HedgeRequirement, SkippedPosition, SkippedUnderlying, Underlying } from "@delta-hedger/core";
import type { RepositoryDbError } from "@delta-hedger/repositories";
import { logger } from "@delta-hedger/utils";

import type { HedgeEvaluator } from "../services/hedge-evaluator";
import type { ExecutionOutcome, HedgeOrderExecutor } from "../services/hedge-order-executor";
import type { DeltaRefreshSummary, PositionBook } from "../services/position-book";

export type CycleMode = "analyze" | "execute";

export type HedgeCyclePhase = "IDLE" | "REFRESH" | "AGGREGATE" | "EVALUATE" | "EXECUTE";

export interface CycleSummary {
  cycleNo: number;
  mode: CycleMode;
  startedAt: Date;
  durationMs: number;
  deltaRefresh: DeltaRefreshSummary;
  exposure: [Underlying, number][];
  requirements: HedgeRequirement[];
  outcomes: ExecutionOutcome[];
  skipped: {
    positions: SkippedPosition[];
    underlyings: SkippedUnderlying[];
  };
}

export type HedgeCycleError = { type: "CYCLE_ABORTED"; message: string; cause: RepositoryDbError };

export interface HedgeCycleDeps {
  book: PositionBook;
  evaluator: HedgeEvaluator;
  executor: HedgeOrderExecutor;
  /** Delay between successive submissions in one cycle */
  orderPacingMs: number;
  sleep: (ms: number) => Promise<void>;
  now?: () => Date;
  /**
   * Optional phase hook for observability
   */
  onPhase?: (phase: HedgeCyclePhase) => void;
}

export interface HedgeCycleOptions {
  cycleNo: number;
  mode: CycleMode;
}

export async function runHedgeCycle(
  deps: HedgeCycleDeps,
  options: HedgeCycleOptions,
): Promise<Result<CycleSummary, HedgeCycleError>> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const abort = (stage: string, cause: RepositoryDbError): Result<CycleSummary, HedgeCycleError> => {
    deps.onPhase?.("IDLE");
    return err({ type: "CYCLE_ABORTED", message: `${stage}: ${cause.message}`, cause });
  };

  // Step 1: Refresh deltas
  deps.onPhase?.("REFRESH");
  const refreshed = await deps.book.refreshAllDeltas();
  if (refreshed.isErr()) return abort("delta refresh", refreshed.error);

  // Step 2: Aggregate
  deps.onPhase?.("AGGREGATE");
  const aggregated = await deps.book.aggregate();
  if (aggregated.isErr()) return abort("aggregate", aggregated.error);
  const { exposure, skipped: skippedPositions } = aggregated.value;

  // Step 3: Evaluate
  deps.onPhase?.("EVALUATE");
  const evaluation = await deps.evaluator.evaluate(exposure);

  // Step 4: Execute, in exposure order
  const outcomes: ExecutionOutcome[] = [];
  if (options.mode === "execute") {
    deps.onPhase?.("EXECUTE");
    let sentAny = false;
    for (const requirement of evaluation.requirements) {
      if (requirement.action.type === "NONE") continue;
      if (sentAny && deps.orderPacingMs > 0) {
        await deps.sleep(deps.orderPacingMs);
      }
      const outcome = await deps.executor.execute(requirement);
      if (outcome.type !== "skipped") sentAny = true;
      outcomes.push(outcome);
    }
  }

  deps.onPhase?.("IDLE");

  const summary: CycleSummary = {
    cycleNo: options.cycleNo,
    mode: options.mode,
    startedAt,
    durationMs: now().getTime() - startedAt.getTime(),
    deltaRefresh: refreshed.value,
    exposure: [...exposure.entries()],
    requirements: evaluation.requirements,
    outcomes,
    skipped: { positions: skippedPositions, underlyings: evaluation.skipped },
  };

  logger.info("Hedge cycle complete", {
    cycleNo: summary.cycleNo,
    mode: summary.mode,
    durationMs: summary.durationMs,
    underlyings: summary.exposure.length,
    actionable: summary.requirements.filter(r => r.action.type !== "NONE").length,
    submitted: outcomes.filter(o => o.type === "submitted").length,
    failed: outcomes.filter(o => o.type === "failed").length,
    skipped: skippedPositions.length + evaluation.skipped.length,
  });

  return ok(summary);
}
