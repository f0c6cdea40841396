import { describe, expect, test } from "vitest";

import { isValidOptionSymbol, parseUnderlyingList, resolveUnderlying } from "../src/underlying";

const supported = new Set(["BTC", "ETH", "SOL", "HYPE"]);

describe("resolveUnderlying", () => {
  test("maps the symbol prefix to the underlying", () => {
    expect(resolveUnderlying("BTC-USD-100000-P", supported)._unsafeUnwrap()).toBe("BTC");
    expect(resolveUnderlying("sol-usd-215-c", supported)._unsafeUnwrap()).toBe("SOL");
  });

  test("rejects prefixes outside the supported set", () => {
    const result = resolveUnderlying("DOGE-USD-1-C", supported);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "UNKNOWN_UNDERLYING",
      symbol: "DOGE-USD-1-C",
      prefix: "DOGE",
    });
  });

  test("rejects an empty prefix", () => {
    expect(resolveUnderlying("-USD-1-C", supported).isErr()).toBe(true);
  });
});

describe("isValidOptionSymbol", () => {
  test.each([
    ["BTC-USD-100000-C", true],
    ["ETH-USD-4000-P", true],
    ["HYPE-USD-40-C", true],
    ["btc-usd-100000-c", false],
    ["BTC-USD-100000", false],
    ["BTC-USD-100000-X", false],
    ["BTC-USDC-100000-C", false],
  ])("%s → %s", (symbol, expected) => {
    expect(isValidOptionSymbol(symbol)).toBe(expected);
  });
});

describe("parseUnderlyingList", () => {
  test("normalizes case and whitespace", () => {
    expect([...parseUnderlyingList(" btc, eth ,,SOL")]).toEqual(["BTC", "ETH", "SOL"]);
  });
});
