/**
 * Console Report - Plain text views for the operator console
 *
 * Every renderer returns lines; the caller decides where they go.
 */

import type { HedgeOrderRecord, HedgeRequirement, OptionPosition, Underlying } from "@delta-hedger/core";
import { renderTable, type Style } from "@delta-hedger/utils";

import type { CycleSummary } from "../usecases/hedge-cycle";
import type { ExecutionOutcome } from "./hedge-order-executor";
import type { DeltaRefreshSummary } from "./position-book";

export function formatQty(value: number, decimals = 4): string {
  const fixed = value.toFixed(decimals);
  // Avoid "-0.0000"
  return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
}

function formatTime(date: Date | null): string {
  return date === null ? "-" : date.toISOString().replace("T", " ").slice(0, 19);
}

function formatAction(style: Style, req: HedgeRequirement): string {
  switch (req.action.type) {
    case "NONE":
      return style.wrap("HOLD", "dim");
    case "BUY":
      return style.wrap(`BUY ${formatQty(req.action.amount)}`, "green");
    case "SELL":
      return style.wrap(`SELL ${formatQty(req.action.amount)}`, "red");
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Positions / exposure
// ─────────────────────────────────────────────────────────────────────────────

export function renderPositions(style: Style, positions: readonly OptionPosition[]): string[] {
  if (positions.length === 0) return ["No positions."];

  return renderTable(
    [
      { header: "Symbol" },
      { header: "Qty", align: "right" },
      { header: "Delta", align: "right" },
      { header: "Position Δ", align: "right" },
      { header: "Delta updated (UTC)" },
    ],
    positions.map(p => {
      const positionDelta = p.delta === null ? null : p.quantity * p.delta;
      return [
        p.symbol,
        style.signed(p.quantity),
        p.delta === null ? style.wrap("n/a", "yellow") : formatQty(p.delta),
        positionDelta === null ? "-" : style.signed(positionDelta, formatQty(positionDelta)),
        formatTime(p.deltaUpdatedAt),
      ];
    }),
  );
}

export function renderExposure(
  style: Style,
  exposure: readonly (readonly [Underlying, number])[],
  contributions: ReadonlyMap<Underlying, number>,
): string[] {
  if (exposure.length === 0) return ["No delta exposure."];

  return renderTable(
    [
      { header: "Underlying" },
      { header: "Net delta", align: "right" },
      { header: "Hedge target", align: "right" },
      { header: "Positions", align: "right" },
    ],
    exposure.map(([underlying, netDelta]) => {
      const target = netDelta === 0 ? 0 : -netDelta;
      return [
        underlying,
        style.signed(netDelta, formatQty(netDelta)),
        formatQty(target),
        String(contributions.get(underlying) ?? 0),
      ];
    }),
  );
}

export function renderDeltaRefresh(summary: DeltaRefreshSummary): string {
  return `Deltas refreshed: ${String(summary.updated)} updated, ${String(summary.failed)} failed`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Hedge cycle
// ─────────────────────────────────────────────────────────────────────────────

export function renderRequirements(style: Style, requirements: readonly HedgeRequirement[]): string[] {
  if (requirements.length === 0) return ["No hedge requirements."];

  return renderTable(
    [
      { header: "Underlying" },
      { header: "Net delta", align: "right" },
      { header: "Spot", align: "right" },
      { header: "Target", align: "right" },
      { header: "Current", align: "right" },
      { header: "Diff", align: "right" },
      { header: "Threshold", align: "right" },
      { header: "Action" },
    ],
    requirements.map(r => [
      r.underlying,
      formatQty(r.netDelta),
      r.spotPrice.toFixed(2),
      formatQty(r.targetInventory),
      formatQty(r.currentInventory),
      style.signed(r.positionDiff, formatQty(r.positionDiff)),
      `${formatQty(r.thresholdAmount)} (${String(r.thresholdPct)}%)`,
      formatAction(style, r),
    ]),
  );
}

export function renderOutcome(style: Style, outcome: ExecutionOutcome): string {
  switch (outcome.type) {
    case "skipped":
      return `${outcome.underlying}: ${style.wrap("skipped", "yellow")} (${outcome.reason})`;
    case "submitted": {
      const r = outcome.record;
      return `${outcome.underlying}: ${style.wrap("submitted", "green")} ${r.side} ${r.quantity} worst ${r.worstPrice} tx ${r.txId ?? "-"}`;
    }
    case "failed": {
      const r = outcome.record;
      return `${outcome.underlying}: ${style.wrap("FAILED", "bold", "red")} ${r.side} ${r.quantity} (${r.error ?? outcome.error.message})`;
    }
  }
}

export function renderCycleSummary(style: Style, summary: CycleSummary): string[] {
  const lines: string[] = [
    style.wrap(
      `Hedge cycle #${String(summary.cycleNo)} (${summary.mode}) at ${formatTime(summary.startedAt)} in ${String(summary.durationMs)}ms`,
      "bold",
    ),
    renderDeltaRefresh(summary.deltaRefresh),
    ...renderRequirements(style, summary.requirements),
  ];

  for (const outcome of summary.outcomes) {
    lines.push(renderOutcome(style, outcome));
  }
  if (summary.mode === "analyze" && summary.requirements.some(r => r.action.type !== "NONE")) {
    lines.push(style.wrap('Analyze only: run "hedge execute" to trade.', "dim"));
  }

  for (const skip of summary.skipped.positions) {
    lines.push(style.wrap(`skipped position ${skip.symbol}: ${skip.reason}`, "yellow"));
  }
  for (const skip of summary.skipped.underlyings) {
    const detail = skip.message === undefined ? "" : ` (${skip.message})`;
    lines.push(style.wrap(`skipped ${skip.underlying}: ${skip.reason}${detail}`, "yellow"));
  }

  return lines;
}

// ─────────────────────────────────────────────────────────────────────────────
// Orders
// ─────────────────────────────────────────────────────────────────────────────

export function renderOrders(style: Style, records: readonly HedgeOrderRecord[]): string[] {
  if (records.length === 0) return ["No hedge orders recorded."];

  return renderTable(
    [
      { header: "Time (UTC)" },
      { header: "Venue" },
      { header: "Symbol" },
      { header: "Side" },
      { header: "Qty", align: "right" },
      { header: "Ref px", align: "right" },
      { header: "Worst px", align: "right" },
      { header: "Status" },
      { header: "Tx / error" },
    ],
    records.map(r => [
      formatTime(r.ts),
      r.venue,
      r.symbol,
      r.side,
      r.quantity,
      r.referencePrice,
      r.worstPrice,
      r.status === "submitted" ? style.wrap(r.status, "green") : style.wrap(r.status, "red"),
      r.txId ?? r.error ?? "-",
    ]),
  );
}
