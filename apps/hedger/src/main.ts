/**
 * Hedger Main Entry Point
 *
 * - Composition root for the hedger
 * - Operator console (line based) alongside the auto-hedge loop
 * - Paper or live execution, Postgres or in-memory stores
 */

import { setTimeout as delay } from "node:timers/promises";
import { createInterface, type Interface } from "node:readline/promises";

import { parseUnderlyingList } from "@delta-hedger/core";
import {
  DEFAULT_LIGHTER_MARKET_IDS,
  HttpTxSigner,
  LighterAccountAdapter,
  LighterExecutionAdapter,
  LighterMarketAdapter,
  PaperVenue,
  ParadexGreeksAdapter,
  type ExecutionPort,
  type InventoryPort,
  type LighterConfig,
} from "@delta-hedger/adapters";
import { closeDb, getDb, type Db } from "@delta-hedger/db";
import {
  createInMemoryHedgeOrderRepository,
  createInMemoryOptionPositionRepository,
  createPostgresHedgeOrderRepository,
  createPostgresOptionPositionRepository,
} from "@delta-hedger/repositories";
import { FileLogSink, Style, logger } from "@delta-hedger/utils";

import { env } from "./env";
import { CommandHandler } from "./services/command-handler";
import { HedgeConfigStore } from "./services/hedge-config";
import { HedgeEvaluator } from "./services/hedge-evaluator";
import { HedgeOrderExecutor } from "./services/hedge-order-executor";
import { HedgeOrderJournal } from "./services/hedge-order-journal";
import { HedgeScheduler } from "./services/hedge-scheduler";
import { OperatorConsole } from "./services/operator-console";
import { PositionBook } from "./services/position-book";
import { renderOutcome } from "./services/report";
import { runHedgeCycle } from "./usecases/hedge-cycle";

interface Venue {
  execution: ExecutionPort;
  inventory: InventoryPort;
}

/**
 * Paper: one in-process venue for both ports.
 * Live: Lighter account + Lighter sendTx through the external signer.
 */
function createVenue(lighter: LighterConfig): Venue {
  if (env.EXECUTION_MODE === "paper") {
    const paper = new PaperVenue();
    return { execution: paper, inventory: paper };
  }

  if (env.LIGHTER_ACCOUNT_INDEX === undefined || env.LIGHTER_SIGNER_URL === undefined) {
    throw new Error("EXECUTION_MODE=live requires LIGHTER_ACCOUNT_INDEX and LIGHTER_SIGNER_URL");
  }

  const signer = new HttpTxSigner({ signerUrl: env.LIGHTER_SIGNER_URL, timeoutMs: env.VENUE_REQUEST_TIMEOUT_MS });
  return {
    execution: new LighterExecutionAdapter(lighter, signer),
    inventory: new LighterAccountAdapter({ ...lighter, accountIndex: env.LIGHTER_ACCOUNT_INDEX }),
  };
}

function print(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Main hedger function
 */
async function main(): Promise<void> {
  const style = new Style({ noColor: env.NO_COLOR !== undefined });

  // Logs go to a file so the console prompt stays readable
  const logSink = env.LOG_TO_FILE ? new FileLogSink({ dir: env.LOG_DIR, prefix: "hedger" }) : null;
  if (logSink) logger.setSink(logSink);

  logger.info("Starting hedger", {
    appEnv: env.APP_ENV,
    mode: env.EXECUTION_MODE,
    store: env.DATABASE_URL ? "postgres" : "memory",
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Stores
  // ─────────────────────────────────────────────────────────────────────────
  const db: Db | null = env.DATABASE_URL ? getDb(env.DATABASE_URL) : null;
  const positionRepo = db ? createPostgresOptionPositionRepository(db) : createInMemoryOptionPositionRepository();
  const orderRepo = db ? createPostgresHedgeOrderRepository(db) : createInMemoryHedgeOrderRepository();

  // ─────────────────────────────────────────────────────────────────────────
  // Adapters
  // ─────────────────────────────────────────────────────────────────────────
  const lighter: LighterConfig = {
    baseUrl: env.LIGHTER_BASE_URL,
    timeoutMs: env.VENUE_REQUEST_TIMEOUT_MS,
    marketIds: env.LIGHTER_MARKET_IDS ?? DEFAULT_LIGHTER_MARKET_IDS,
  };
  const market = new LighterMarketAdapter(lighter);
  const greeks = new ParadexGreeksAdapter({ baseUrl: env.PARADEX_BASE_URL, timeoutMs: env.VENUE_REQUEST_TIMEOUT_MS });
  const venue = createVenue(lighter);

  // ─────────────────────────────────────────────────────────────────────────
  // Services
  // ─────────────────────────────────────────────────────────────────────────
  const config = new HedgeConfigStore({
    thresholdPct: env.HEDGE_THRESHOLD_PCT,
    intervalSec: env.HEDGE_INTERVAL_SEC,
  });
  const book = new PositionBook(positionRepo, greeks, {
    supportedUnderlyings: parseUnderlyingList(env.SUPPORTED_UNDERLYINGS),
    deltaMaxAgeMs: env.DELTA_MAX_AGE_MS,
  });
  const evaluator = new HedgeEvaluator(market, venue.inventory, () => config.thresholdPct);
  const journal = new HedgeOrderJournal(orderRepo);
  const executor = new HedgeOrderExecutor(market, venue.execution, journal, {
    priceTolerancePct: env.HEDGE_PRICE_TOLERANCE_PCT,
    timeoutMs: env.VENUE_REQUEST_TIMEOUT_MS,
  });

  const scheduler = new HedgeScheduler({
    runCycle: options =>
      runHedgeCycle(
        {
          book,
          evaluator,
          executor,
          orderPacingMs: env.ORDER_PACING_MS,
          sleep: ms => delay(ms),
        },
        options,
      ),
    intervalSec: () => config.intervalSec,
    errorBackoffSec: env.HEDGE_ERROR_BACKOFF_SEC,
    onCycle: summary => {
      // Auto cycles only surface on the console when they traded
      if (summary.outcomes.some(o => o.type !== "skipped")) {
        print(summary.outcomes.map(o => `[auto #${String(summary.cycleNo)}] ${renderOutcome(style, o)}`));
      }
    },
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Operator console
  // ─────────────────────────────────────────────────────────────────────────
  const rl: Interface = createInterface({ input: process.stdin, output: process.stdout });
  rl.on("SIGINT", () => {
    rl.close();
  });
  const operatorConsole = new OperatorConsole(rl, style, print);

  const handler = new CommandHandler({
    book,
    scheduler,
    config,
    journal,
    style,
    venue: venue.execution.venue,
    confirm: question => operatorConsole.confirm(question),
    logFilePath: () => (logSink ? logSink.pathFor() : null),
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");

    await scheduler.stop();
    const pending = await journal.flush();
    if (pending > 0) {
      logger.error("Hedge order records could not be persisted", { count: pending });
    }
    if (db) await closeDb(db);

    logger.info("Shutdown complete");
    logger.clearSink();
    process.exitCode = 0;
  };

  process.on("SIGTERM", () => {
    rl.close();
  });

  print([
    style.wrap("Delta hedger", "bold"),
    `mode ${env.EXECUTION_MODE} | venue ${venue.execution.venue} | store ${db ? "postgres" : "memory"} | threshold ${String(config.thresholdPct)}% | interval ${String(config.intervalSec)}s`,
    'Type "help" for commands.',
  ]);

  if (env.HEDGE_AUTOSTART) {
    print((await handler.handle({ type: "autohedge", action: "on" })).lines);
  }

  await operatorConsole.run(handler);

  rl.close();
  await shutdown();
}

// Run
main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exitCode = 1;
});
