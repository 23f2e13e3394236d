/**
 * Tests for turning portal table grids into records.
 */
import { describe, it, expect } from "vitest";
import { enrichRows, rowsToRecords } from "../extractors/table.extractor";

describe("rowsToRecords", () => {
  it("uses the first row as the header", () => {
    expect(
      rowsToRecords([
        ["Material", "Quantity (MT)"],
        ["PET", "12.5"],
        ["HDPE", "3"],
      ])
    ).toEqual([
      { Material: "PET", "Quantity (MT)": "12.5" },
      { Material: "HDPE", "Quantity (MT)": "3" },
    ]);
  });

  it("names blank headers by position and pads short rows with null", () => {
    expect(rowsToRecords([["", "Amount"], ["x"]])).toEqual([{ column_0: "x", Amount: null }]);
  });

  it("returns no records for a header-only or empty grid", () => {
    expect(rowsToRecords([["Material"]])).toEqual([]);
    expect(rowsToRecords([])).toEqual([]);
  });
});

describe("enrichRows", () => {
  it("tags every row with the account identity", () => {
    expect(
      enrichRows([{ Material: "PET" }], {
        entityType: "Brand Owner",
        entityName: "Acme Plastics",
        email: "ops@example.com",
      })
    ).toEqual([
      {
        Material: "PET",
        Type_of_entity: "Brand Owner",
        Entity_Name: "Acme Plastics",
        Email: "ops@example.com",
      },
    ]);
  });
});
