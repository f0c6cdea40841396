/**
 * Hedge Order Repository Interface
 *
 * - hedge_order is append-only
 * - append is idempotent by decisionId (a repeated append is a no-op)
 */

import type { ResultAsync } from "neverthrow";
import type { HedgeOrderRecord } from "@delta-hedger/core";

import type { RepositoryDbError } from "./option-position-repository";

export interface HedgeOrderRepository {
  append(record: HedgeOrderRecord): ResultAsync<void, RepositoryDbError>;

  /**
   * Most recent records first
   */
  listRecent(limit: number): ResultAsync<HedgeOrderRecord[], RepositoryDbError>;
}
