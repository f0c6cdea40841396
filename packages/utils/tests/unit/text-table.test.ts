import { describe, expect, test } from "vitest";

import { renderTable } from "../../src/text-table";

describe("renderTable", () => {
  test("sizes columns to the widest cell and right-aligns numbers", () => {
    const lines = renderTable(
      [{ header: "Symbol" }, { header: "Qty", align: "right" }],
      [
        ["SOL-USD-215-C", "-2"],
        ["BTC-USD-100000-P", "10"],
      ],
    );

    expect(lines).toEqual([
      "Symbol            Qty",
      "----------------  ---",
      "SOL-USD-215-C      -2",
      "BTC-USD-100000-P   10",
    ]);
  });

  test("renders the header alone for an empty table", () => {
    expect(renderTable([{ header: "A" }, { header: "B" }], [])).toEqual(["A  B", "-  -"]);
  });
});
