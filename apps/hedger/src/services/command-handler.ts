/**
 * Command Handler - Runs parsed console commands against the hedger
 *
 * Returns the lines to print; never writes to the terminal itself.
 * Destructive commands (clear, hedge execute) ask for confirmation first.
 */

import type { LotChange } from "@delta-hedger/core";
import type { Style } from "@delta-hedger/utils";

import type { Command } from "./command-parser";
import { USAGE } from "./command-parser";
import type { HedgeConfigStore } from "./hedge-config";
import type { HedgeOrderJournal } from "./hedge-order-journal";
import type { HedgeScheduler } from "./hedge-scheduler";
import type { PositionBook } from "./position-book";
import {
  renderCycleSummary,
  renderDeltaRefresh,
  renderExposure,
  renderOrders,
  renderPositions,
} from "./report";

export interface CommandHandlerDeps {
  book: PositionBook;
  scheduler: HedgeScheduler;
  config: HedgeConfigStore;
  journal: HedgeOrderJournal;
  style: Style;
  venue: string;
  confirm: (question: string) => Promise<boolean>;
  logFilePath: () => string | null;
}

export interface CommandResult {
  lines: string[];
  quit: boolean;
}

const done = (...lines: string[]): CommandResult => ({ lines, quit: false });

function describeLotChange(symbol: string, change: LotChange): string {
  switch (change.type) {
    case "CREATED":
      return `${symbol}: opened ${String(change.quantity)}`;
    case "UPDATED":
      return `${symbol}: ${String(change.previousQuantity)} -> ${String(change.quantity)}`;
    case "CLOSED":
      return `${symbol}: closed (was ${String(change.previousQuantity)})`;
  }
}

export class CommandHandler {
  private readonly deps: CommandHandlerDeps;

  constructor(deps: CommandHandlerDeps) {
    this.deps = deps;
  }

  async handle(command: Command): Promise<CommandResult> {
    const { book, scheduler, config, journal, style } = this.deps;
    const fail = (message: string): CommandResult => done(style.wrap(`Error: ${message}`, "red"));

    switch (command.type) {
      case "add": {
        const result = await book.addLot(command.symbol, command.quantity);
        return result.isOk() ? done(describeLotChange(command.symbol, result.value)) : fail(result.error.message);
      }

      case "remove": {
        const result = await book.removeLot(command.symbol, command.quantity);
        return result.isOk() ? done(describeLotChange(command.symbol, result.value)) : fail(result.error.message);
      }

      case "show": {
        if (command.symbol !== undefined) {
          const result = await book.get(command.symbol);
          if (result.isErr()) return fail(result.error.message);
          if (result.value === null) return done(`No position for ${command.symbol}.`);
          return done(...renderPositions(style, [result.value]));
        }
        const result = await book.listActive();
        return result.isOk() ? done(...renderPositions(style, result.value)) : fail(result.error.message);
      }

      case "exposure": {
        const result = await book.aggregate();
        if (result.isErr()) return fail(result.error.message);
        const { exposure, contributions, skipped } = result.value;
        return done(
          ...renderExposure(style, [...exposure.entries()], contributions),
          ...skipped.map(s => style.wrap(`excluded ${s.symbol}: ${s.reason}`, "yellow")),
        );
      }

      case "update": {
        const result = await book.refreshAllDeltas();
        return result.isOk() ? done(renderDeltaRefresh(result.value)) : fail(result.error.message);
      }

      case "clear": {
        if (!(await this.deps.confirm("Delete ALL positions? [y/N] "))) return done("Cancelled.");
        const result = await book.clear();
        return result.isOk() ? done(`Deleted ${String(result.value)} position(s).`) : fail(result.error.message);
      }

      case "hedge": {
        if (command.execute) {
          const question = `Submit hedge orders on ${this.deps.venue}? [y/N] `;
          if (!(await this.deps.confirm(question))) return done("Cancelled.");
        }
        const result = await scheduler.runOnce({ execute: command.execute });
        return result.isOk() ? done(...renderCycleSummary(style, result.value)) : fail(result.error.message);
      }

      case "autohedge":
        return this.autoHedge(command.action);

      case "threshold": {
        const result = config.setThresholdPct(command.pct);
        return result.isOk() ? done(`Hedge threshold set to ${String(result.value)}%.`) : fail(result.error.message);
      }

      case "interval": {
        const result = config.setIntervalSec(command.sec);
        if (result.isErr()) return fail(result.error.message);
        const note = scheduler.getState() === "RUNNING" ? " Applies after the current wait." : "";
        return done(`Auto-hedge interval set to ${String(result.value)}s.${note}`);
      }

      case "orders": {
        const result = await journal.listRecent(command.limit);
        if (result.isErr()) return fail(result.error.message);
        const pending = journal.pendingCount();
        const lines = renderOrders(style, result.value);
        if (pending > 0) lines.push(style.wrap(`${String(pending)} record(s) waiting to be persisted.`, "yellow"));
        return done(...lines);
      }

      case "log": {
        const path = this.deps.logFilePath();
        return done(path === null ? "Logging to the console." : `Log file: ${path}`);
      }

      case "help":
        return done("Commands:", ...Object.values(USAGE).map(line => `  ${line}`));

      case "quit":
        return { lines: [], quit: true };
    }
  }

  private async autoHedge(action: "on" | "off" | "status"): Promise<CommandResult> {
    const { scheduler, config, style } = this.deps;

    switch (action) {
      case "on": {
        const result = scheduler.start();
        if (result.isErr()) return done(style.wrap(`Error: ${result.error.message}`, "red"));
        config.setAutoHedgeEnabled(true);
        return done(`Auto-hedge on (every ${String(config.intervalSec)}s, threshold ${String(config.thresholdPct)}%).`);
      }
      case "off": {
        if (scheduler.getState() === "IDLE") return done("Auto-hedge is not running.");
        await scheduler.stop();
        config.setAutoHedgeEnabled(false);
        return done("Auto-hedge off.");
      }
      case "status": {
        const enabled = config.autoHedgeEnabled ? style.wrap("on", "green") : "off";
        return done(
          `Auto-hedge: ${enabled} (${scheduler.getState()})`,
          `Interval: ${String(config.intervalSec)}s`,
          `Threshold: ${String(config.thresholdPct)}%`,
          `Cycles run: ${String(scheduler.getCycleCount())}`,
        );
      }
    }
  }
}
