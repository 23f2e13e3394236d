/**
 * Tests for financial year partitioning.
 */
import { describe, it, expect } from "vitest";
import { extractYear, findYearColumn, partitionByFinancialYear } from "../fiscal-year";

describe("extractYear", () => {
  it("takes the first 4-digit run", () => {
    expect(extractYear("2023-24", "2020")).toBe("2023");
    expect(extractYear("FY 2022-2023", "2020")).toBe("2022");
    expect(extractYear(2021, "2020")).toBe("2021");
  });

  it("falls back when there is no year", () => {
    expect(extractYear("current", "2020")).toBe("2020");
    expect(extractYear(null, "2020")).toBe("2020");
  });
});

describe("findYearColumn", () => {
  it("recognises the known label columns", () => {
    expect(findYearColumn([{ FY: "2023-24" }])).toBe("FY");
    expect(findYearColumn([{ Quantity: 1 }, { Financial_Year: "2022-23" }])).toBe("Financial_Year");
    expect(findYearColumn([{ Quantity: 1 }])).toBeNull();
  });
});

describe("partitionByFinancialYear", () => {
  it("keeps unlabelled tables under the default year", () => {
    const rows = [{ Quantity: 1 }, { Quantity: 2 }];
    const partitions = partitionByFinancialYear(rows, "2024", "2025");
    expect([...partitions.keys()]).toEqual(["2024"]);
    expect(partitions.get("2024")).toEqual(rows);
  });

  it("groups labelled rows by the year their label starts with", () => {
    const rows = [
      { "Financial Year": "2022-23", Quantity: 1 },
      { "Financial Year": "2023-24", Quantity: 2 },
      { "Financial Year": "2022-2023", Quantity: 3 },
      { "Financial Year": "", Quantity: 4 },
    ];
    const partitions = partitionByFinancialYear(rows, "2024", "2025");

    expect(partitions.get("2022")?.map((row) => row.Quantity)).toEqual([1, 3]);
    expect(partitions.get("2023")?.map((row) => row.Quantity)).toEqual([2]);
    expect(partitions.get("2025")?.map((row) => row.Quantity)).toEqual([4]);
  });

  it("returns nothing for an empty table", () => {
    expect(partitionByFinancialYear([], "2024").size).toBe(0);
  });
});
