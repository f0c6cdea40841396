/**
 * Underlying resolution for option symbols
 *
 * Option symbols follow UNDERLYING-QUOTE-STRIKE-TYPE, e.g. "BTC-USD-100000-P".
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { OptionSymbol, Underlying } from "./types";

export const DEFAULT_SUPPORTED_UNDERLYINGS: readonly Underlying[] = ["BTC", "ETH", "SOL", "HYPE"];

const OPTION_SYMBOL_PATTERN = /^[A-Z]+-USD-\d+-[CP]$/;

export type UnderlyingError = { type: "UNKNOWN_UNDERLYING"; symbol: OptionSymbol; prefix: string };

/**
 * Check the option symbol format accepted at the command boundary.
 */
export function isValidOptionSymbol(symbol: string): boolean {
  return OPTION_SYMBOL_PATTERN.test(symbol);
}

/**
 * Resolve the spot underlying of an option symbol.
 *
 * The prefix before the first "-" is matched case-insensitively against the supported set.
 */
export function resolveUnderlying(
  symbol: OptionSymbol,
  supported: ReadonlySet<Underlying>,
): Result<Underlying, UnderlyingError> {
  const prefix = (symbol.split("-")[0] ?? "").trim().toUpperCase();
  if (prefix.length > 0 && supported.has(prefix)) {
    return ok(prefix);
  }
  return err({ type: "UNKNOWN_UNDERLYING", symbol, prefix });
}

/**
 * Parse a comma separated underlying list ("btc, eth,SOL") into a normalized set.
 */
export function parseUnderlyingList(raw: string): Set<Underlying> {
  return new Set(
    raw
      .split(",")
      .map(s => s.trim().toUpperCase())
      .filter(s => s.length > 0),
  );
}
