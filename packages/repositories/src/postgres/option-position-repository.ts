/**
 * Postgres Option Position Repository
 *
 * - Lot changes run in a transaction holding a per-symbol advisory lock,
 *   so concurrent add/remove on one symbol serialize
 * - Netting rules come from @delta-hedger/core (netAddLot / netRemoveLot)
 */

import { asc, eq, sql } from "drizzle-orm";
import { ResultAsync, type Result } from "neverthrow";
import { optionPosition, type Db, type OptionPositionRow } from "@delta-hedger/db";
import {
  netAddLot,
  netRemoveLot,
  type LotChange,
  type LotError,
  type OptionPosition,
  type OptionSymbol,
} from "@delta-hedger/core";

import type {
  DeltaObservation,
  OptionPositionRepository,
  OptionPositionRepositoryError,
  RepositoryDbError,
} from "../interfaces/option-position-repository";

type Tx = Parameters<Parameters<Db["transaction"]>[0]>[0];

const toDbError = (e: unknown): RepositoryDbError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

export function toOptionPosition(row: OptionPositionRow): OptionPosition {
  const delta = row.delta === null ? null : Number(row.delta);
  return {
    symbol: row.symbol,
    quantity: row.quantity,
    delta: delta !== null && Number.isFinite(delta) ? delta : null,
    deltaUpdatedAt: row.deltaUpdatedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

type DeltaColumns = Partial<Pick<OptionPositionRow, "delta" | "deltaUpdatedAt">>;

function deltaColumns(observation: DeltaObservation | undefined): DeltaColumns {
  if (!observation) return {};
  return {
    delta: observation.delta === null ? null : String(observation.delta),
    deltaUpdatedAt: observation.at,
  };
}

async function persistChange(
  tx: Tx,
  symbol: OptionSymbol,
  change: LotChange,
  observation: DeltaObservation | undefined,
): Promise<void> {
  const now = new Date();
  switch (change.type) {
    case "CREATED":
      await tx.insert(optionPosition).values({
        symbol,
        quantity: change.quantity,
        ...deltaColumns(observation),
        createdAt: now,
        updatedAt: now,
      });
      return;
    case "UPDATED":
      await tx
        .update(optionPosition)
        .set({ quantity: change.quantity, ...deltaColumns(observation), updatedAt: now })
        .where(eq(optionPosition.symbol, symbol));
      return;
    case "CLOSED":
      await tx.delete(optionPosition).where(eq(optionPosition.symbol, symbol));
      return;
  }
}

/**
 * Create a Postgres option position repository
 */
export function createPostgresOptionPositionRepository(db: Db): OptionPositionRepository {
  const withLockedLot = (
    symbol: OptionSymbol,
    net: (current: number | null) => Result<LotChange, LotError>,
    observation?: DeltaObservation,
  ): ResultAsync<LotChange, OptionPositionRepositoryError> =>
    ResultAsync.fromPromise(
      db.transaction(async tx => {
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${symbol}))`);

        const rows = await tx
          .select({ quantity: optionPosition.quantity })
          .from(optionPosition)
          .where(eq(optionPosition.symbol, symbol));

        const change = net(rows[0]?.quantity ?? null);
        if (change.isOk()) {
          await persistChange(tx, symbol, change.value, observation);
        }
        return change;
      }),
      toDbError,
    ).andThen(change => change);

  return {
    applyLot(symbol, signedQty, observation) {
      return withLockedLot(symbol, current => netAddLot(current, signedQty), observation);
    },

    reduceLot(symbol, qty) {
      return withLockedLot(symbol, current => netRemoveLot(current, qty));
    },

    get(symbol) {
      return ResultAsync.fromPromise(
        db.select().from(optionPosition).where(eq(optionPosition.symbol, symbol)).limit(1),
        toDbError,
      ).map(rows => {
        const row = rows[0];
        return row ? toOptionPosition(row) : null;
      });
    },

    listActive() {
      return ResultAsync.fromPromise(
        db.select().from(optionPosition).orderBy(asc(optionPosition.symbol)),
        toDbError,
      ).map(rows => rows.map(toOptionPosition));
    },

    updateDelta(symbol, observation) {
      return ResultAsync.fromPromise(
        db
          .update(optionPosition)
          .set({
            delta: observation.delta === null ? null : String(observation.delta),
            deltaUpdatedAt: observation.at,
          })
          .where(eq(optionPosition.symbol, symbol))
          .returning({ symbol: optionPosition.symbol }),
        toDbError,
      ).map(rows => rows.length > 0);
    },

    clear() {
      return ResultAsync.fromPromise(
        db.delete(optionPosition).returning({ symbol: optionPosition.symbol }),
        toDbError,
      ).map(rows => rows.length);
    },
  };
}
