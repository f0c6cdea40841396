/**
 * Command Parser - Operator console input → typed command
 *
 * Command names are case-insensitive; option symbols are upper-cased before
 * validation. Invalid input is rejected here and never reaches the hedger.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { isValidOptionSymbol } from "@delta-hedger/core";

export type Command =
  | { type: "add"; symbol: string; quantity: number }
  | { type: "remove"; symbol: string; quantity: number }
  | { type: "show"; symbol?: string }
  | { type: "exposure" }
  | { type: "update" }
  | { type: "clear" }
  | { type: "hedge"; execute: boolean }
  | { type: "autohedge"; action: "on" | "off" | "status" }
  | { type: "threshold"; pct: number }
  | { type: "interval"; sec: number }
  | { type: "orders"; limit: number }
  | { type: "log" }
  | { type: "help" }
  | { type: "quit" };

export type CommandParseError =
  | { type: "UNKNOWN_COMMAND"; message: string }
  | { type: "INVALID_ARGUMENTS"; message: string };

export const DEFAULT_ORDERS_LIMIT = 10;

// ─────────────────────────────────────────────────────────────────────────────
// Argument schemas
// ─────────────────────────────────────────────────────────────────────────────

const OptionSymbolSchema = z
  .string()
  .transform(s => s.toUpperCase())
  .refine(isValidOptionSymbol, { message: "symbol must look like SOL-USD-215-C" });

const SignedQuantitySchema = z
  .string()
  .regex(/^[+-]?\d+$/, { message: "quantity must be an integer" })
  .transform(Number)
  .refine(n => Number.isSafeInteger(n) && n !== 0, { message: "quantity must be a non-zero integer" });

const PositiveQuantitySchema = z
  .string()
  .regex(/^\+?\d+$/, { message: "quantity must be a positive integer" })
  .transform(Number)
  .refine(n => Number.isSafeInteger(n) && n > 0, { message: "quantity must be a positive integer" });

const ThresholdSchema = z.coerce
  .number({ message: "threshold must be a number" })
  .gt(0, { message: "threshold must be greater than 0" })
  .max(100, { message: "threshold must be at most 100" });

const IntervalSchema = z.coerce
  .number({ message: "interval must be a number" })
  .int({ message: "interval must be a whole number of seconds" })
  .min(1, { message: "interval must be at least 1 second" });

const LimitSchema = z.coerce
  .number({ message: "limit must be a number" })
  .int({ message: "limit must be an integer" })
  .min(1, { message: "limit must be at least 1" })
  .max(1000, { message: "limit must be at most 1000" });

const commandSchemas = {
  add: z
    .tuple([OptionSymbolSchema, SignedQuantitySchema])
    .transform(([symbol, quantity]): Command => ({ type: "add", symbol, quantity })),
  remove: z
    .tuple([OptionSymbolSchema, PositiveQuantitySchema])
    .transform(([symbol, quantity]): Command => ({ type: "remove", symbol, quantity })),
  show: z
    .array(OptionSymbolSchema)
    .max(1, { message: "show takes at most one symbol" })
    .transform(([symbol]): Command => (symbol === undefined ? { type: "show" } : { type: "show", symbol })),
  exposure: z.tuple([]).transform((): Command => ({ type: "exposure" })),
  update: z.tuple([]).transform((): Command => ({ type: "update" })),
  clear: z.tuple([]).transform((): Command => ({ type: "clear" })),
  hedge: z
    .tuple([z.string().transform(s => s.toLowerCase()).pipe(z.enum(["analyze", "execute"]))])
    .transform(([mode]): Command => ({ type: "hedge", execute: mode === "execute" })),
  autohedge: z
    .tuple([z.string().transform(s => s.toLowerCase()).pipe(z.enum(["on", "off", "status"]))])
    .transform(([action]): Command => ({ type: "autohedge", action })),
  threshold: z.tuple([ThresholdSchema]).transform(([pct]): Command => ({ type: "threshold", pct })),
  interval: z.tuple([IntervalSchema]).transform(([sec]): Command => ({ type: "interval", sec })),
  orders: z
    .array(LimitSchema)
    .max(1, { message: "orders takes at most one limit" })
    .transform(([limit]): Command => ({ type: "orders", limit: limit ?? DEFAULT_ORDERS_LIMIT })),
  log: z.tuple([]).transform((): Command => ({ type: "log" })),
  help: z.tuple([]).transform((): Command => ({ type: "help" })),
  quit: z.tuple([]).transform((): Command => ({ type: "quit" })),
  exit: z.tuple([]).transform((): Command => ({ type: "quit" })),
};

type CommandName = keyof typeof commandSchemas;

export const USAGE: Record<Exclude<CommandName, "exit">, string> = {
  add: "add <symbol> <qty>          add a lot (qty > 0 long, < 0 short)",
  remove: "remove <symbol> <qty>       close qty contracts of a lot",
  show: "show [symbol]               list positions",
  exposure: "exposure                    net delta per underlying",
  update: "update                      refresh all deltas",
  clear: "clear                       delete all positions",
  hedge: "hedge analyze|execute       run one hedge cycle",
  autohedge: "autohedge on|off|status     continuous hedging",
  threshold: "threshold <pct>             set hedge threshold (0 < pct <= 100)",
  interval: "interval <sec>              set auto-hedge interval (>= 1)",
  orders: "orders [limit]              recent hedge orders",
  log: "log                         current log file",
  help: "help                        this help",
  quit: "quit | exit                 leave",
};

function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(commandSchemas, name);
}

/**
 * Parse one console line. Resolves null for a blank line.
 */
export function parseCommand(line: string): Result<Command | null, CommandParseError> {
  const [rawName, ...args] = line.trim().split(/\s+/).filter(s => s.length > 0);
  if (rawName === undefined) return ok(null);

  const name = rawName.toLowerCase();
  if (!isCommandName(name)) {
    return err({ type: "UNKNOWN_COMMAND", message: `unknown command: ${rawName} (type "help")` });
  }

  const parsed = commandSchemas[name].safeParse(args);
  if (!parsed.success) {
    const detail = parsed.error.issues[0]?.message ?? "invalid arguments";
    const usage = name === "exit" ? USAGE.quit : USAGE[name];
    return err({ type: "INVALID_ARGUMENTS", message: `${detail}. usage: ${usage.split(/\s{2,}/)[0] ?? name}` });
  }
  return ok(parsed.data);
}
