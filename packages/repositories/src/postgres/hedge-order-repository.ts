/**
 * Postgres Hedge Order Repository
 *
 * - Append-only journal, idempotent by decision_id (ON CONFLICT DO NOTHING)
 */

import { desc } from "drizzle-orm";
import { Result, ResultAsync, err, ok } from "neverthrow";
import { hedgeOrder, type Db, type HedgeOrderRow } from "@delta-hedger/db";
import type { HedgeOrderRecord } from "@delta-hedger/core";

import type { HedgeOrderRepository } from "../interfaces/hedge-order-repository";
import type { RepositoryDbError } from "../interfaces/option-position-repository";

const toDbError = (e: unknown): RepositoryDbError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

/**
 * Narrow a stored row back to a record; text columns are re-validated.
 */
export function toHedgeOrderRecord(row: HedgeOrderRow): Result<HedgeOrderRecord, RepositoryDbError> {
  const side = row.side === "buy" || row.side === "sell" ? row.side : null;
  const status = row.status === "submitted" || row.status === "failed" ? row.status : null;
  if (side === null || status === null) {
    return err({ type: "DB_ERROR", message: `corrupt hedge_order row ${row.id}: side=${row.side} status=${row.status}` });
  }

  return ok({
    id: row.id,
    decisionId: row.decisionId,
    ts: row.ts,
    venue: row.venue,
    symbol: row.symbol,
    side,
    quantity: row.quantity,
    referencePrice: row.referencePx,
    worstPrice: row.worstPx,
    status,
    txId: row.txId,
    error: row.error,
  });
}

/**
 * Create a Postgres hedge order repository
 */
export function createPostgresHedgeOrderRepository(db: Db): HedgeOrderRepository {
  return {
    append(record) {
      return ResultAsync.fromPromise(
        db
          .insert(hedgeOrder)
          .values({
            id: record.id,
            decisionId: record.decisionId,
            ts: record.ts,
            venue: record.venue,
            symbol: record.symbol,
            side: record.side,
            quantity: record.quantity,
            referencePx: record.referencePrice,
            worstPx: record.worstPrice,
            status: record.status,
            txId: record.txId,
            error: record.error,
          })
          .onConflictDoNothing({ target: hedgeOrder.decisionId }),
        toDbError,
      ).map(() => undefined);
    },

    listRecent(limit) {
      return ResultAsync.fromPromise(
        db.select().from(hedgeOrder).orderBy(desc(hedgeOrder.ts)).limit(limit),
        toDbError,
      ).andThen(rows => Result.combine(rows.map(toHedgeOrderRecord)));
    },
  };
}
