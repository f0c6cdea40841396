/**
 * option_position - Option book (1行/シンボル)
 *
 * - quantity is signed: long > 0, short < 0
 * - a lot netted to zero is deleted, never stored as 0
 * - delta is the cached per-contract delta (null until first fetch)
 */

import { sql } from "drizzle-orm";
import { check, index, integer, numeric, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const optionPosition = pgTable(
  "option_position",
  {
    symbol: text("symbol").primaryKey(),
    quantity: integer("quantity").notNull(),
    delta: numeric("delta"),
    deltaUpdatedAt: timestamp("delta_updated_at", { withTimezone: true, mode: "date" }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [
    check("option_position_quantity_nonzero", sql`${table.quantity} <> 0`),
    index("option_position_updated_at_idx").on(table.updatedAt.desc()),
  ],
);

export type OptionPositionRow = typeof optionPosition.$inferSelect;
export type NewOptionPositionRow = typeof optionPosition.$inferInsert;
