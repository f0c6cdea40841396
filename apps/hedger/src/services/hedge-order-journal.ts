/**
 * Hedge Order Journal
 *
 * Appends one record per submission attempt. A record whose append fails is
 * held in memory and re-appended by flush() before the next submission;
 * append is idempotent by decisionId, so a retried record is never duplicated.
 */

import type { HedgeOrderRecord } from "@delta-hedger/core";
import type { HedgeOrderRepository, RepositoryDbError } from "@delta-hedger/repositories";
import { logger } from "@delta-hedger/utils";
import type { ResultAsync } from "neverthrow";

export class HedgeOrderJournal {
  private readonly repo: HedgeOrderRepository;
  private pending: HedgeOrderRecord[] = [];

  constructor(repo: HedgeOrderRepository) {
    this.repo = repo;
  }

  /**
   * Record an outcome. Resolves false when the record was queued for retry.
   */
  async record(entry: HedgeOrderRecord): Promise<boolean> {
    const result = await this.repo.append(entry);
    if (result.isErr()) {
      this.pending.push(entry);
      logger.error("Hedge order append failed, queued for retry", {
        decisionId: entry.decisionId,
        symbol: entry.symbol,
        status: entry.status,
        txId: entry.txId,
        error: result.error.message,
      });
      return false;
    }
    return true;
  }

  /**
   * Re-append queued records in order. Records that fail again stay queued.
   * Resolves the number still pending.
   */
  async flush(): Promise<number> {
    if (this.pending.length === 0) return 0;

    const queued = this.pending;
    this.pending = [];
    for (const entry of queued) {
      const result = await this.repo.append(entry);
      if (result.isErr()) {
        this.pending.push(entry);
      } else {
        logger.info("Queued hedge order record persisted", { decisionId: entry.decisionId });
      }
    }
    return this.pending.length;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  listRecent(limit: number): ResultAsync<HedgeOrderRecord[], RepositoryDbError> {
    return this.repo.listRecent(limit);
  }
}
