/**
 * hedge_order - Hedge order journal (append-only)
 *
 * - one row per submission attempt, written right after the venue responds
 * - decision_id is unique so re-appending a pending record is a no-op
 */

import { index, numeric, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

export const hedgeOrder = pgTable(
  "hedge_order",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    decisionId: uuid("decision_id").notNull(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    venue: text("venue").notNull(),
    symbol: text("symbol").notNull(),
    side: text("side").notNull(), // buy/sell
    quantity: numeric("quantity").notNull(),
    referencePx: numeric("reference_px").notNull(),
    worstPx: numeric("worst_px").notNull(),
    status: text("status").notNull(), // submitted/failed
    txId: text("tx_id"),
    error: text("error"),
  },
  table => [
    uniqueIndex("hedge_order_decision_id_uq").on(table.decisionId),
    index("hedge_order_ts_idx").on(table.ts.desc()),
  ],
);

export type HedgeOrderRow = typeof hedgeOrder.$inferSelect;
export type NewHedgeOrderRow = typeof hedgeOrder.$inferInsert;
