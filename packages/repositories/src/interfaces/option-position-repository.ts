/**
 * Option Position Repository Interface
 *
 * - option_position holds 1 row per option symbol
 * - lot changes are netted against the stored quantity atomically per symbol
 * - a lot netted to zero is deleted
 */

import type { ResultAsync } from "neverthrow";
import type { LotChange, LotError, OptionPosition, OptionSymbol } from "@delta-hedger/core";

export type RepositoryDbError = {
  type: "DB_ERROR";
  message: string;
};

export type OptionPositionRepositoryError = RepositoryDbError | LotError;

/**
 * Delta observed for a symbol at a point in time
 */
export interface DeltaObservation {
  delta: number | null;
  at: Date;
}

export interface OptionPositionRepository {
  /**
   * Net a signed quantity into the lot for `symbol`.
   * When `observation` is given, the cached delta is replaced in the same write.
   */
  applyLot(
    symbol: OptionSymbol,
    signedQty: number,
    observation?: DeltaObservation,
  ): ResultAsync<LotChange, OptionPositionRepositoryError>;

  /**
   * Close `qty` contracts of the lot, moving it toward zero.
   */
  reduceLot(symbol: OptionSymbol, qty: number): ResultAsync<LotChange, OptionPositionRepositoryError>;

  get(symbol: OptionSymbol): ResultAsync<OptionPosition | null, RepositoryDbError>;

  /**
   * All stored positions, ordered by symbol
   */
  listActive(): ResultAsync<OptionPosition[], RepositoryDbError>;

  /**
   * Replace the cached delta. Resolves false when there is no lot for the symbol.
   */
  updateDelta(symbol: OptionSymbol, observation: DeltaObservation): ResultAsync<boolean, RepositoryDbError>;

  /**
   * Delete every position. Resolves the number of deleted rows.
   */
  clear(): ResultAsync<number, RepositoryDbError>;
}
