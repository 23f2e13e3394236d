/**
 * Tests for row normalization, sizing and chunk planning.
 */
import { describe, it, expect } from "vitest";
import {
  estimateSize,
  fitsInline,
  normalizeCell,
  normalizeMetadata,
  normalizeRecords,
  planChunks,
  sanitizeFieldName,
} from "../data-normalizer";
import type { SectionRecord } from "../../shared/types/section.types";

describe("normalizeCell", () => {
  it("replaces missing and non-finite values with empty strings", () => {
    expect(normalizeCell(null)).toBe("");
    expect(normalizeCell(undefined)).toBe("");
    expect(normalizeCell(Number.NaN)).toBe("");
    expect(normalizeCell(Number.POSITIVE_INFINITY)).toBe("");
    expect(normalizeCell(new Date("not a date"))).toBe("");
  });

  it("keeps valid scalars and dates", () => {
    const date = new Date("2024-04-01T00:00:00.000Z");
    expect(normalizeCell(12.5)).toBe(12.5);
    expect(normalizeCell("Category I")).toBe("Category I");
    expect(normalizeCell(false)).toBe(false);
    expect(normalizeCell(date)).toBe(date);
  });

  it("rebuilds nested structures cell by cell", () => {
    expect(normalizeCell([1, Number.NaN, { a: null, b: "x" }])).toEqual([1, "", { a: "", b: "x" }]);
  });

  it("stringifies self-referencing objects", () => {
    const cyclic: SectionRecord = { name: "loop" };
    cyclic.self = cyclic;
    expect(normalizeCell(cyclic)).toEqual({ name: "loop", self: "[object Object]" });
  });
});

describe("normalizeRecords", () => {
  it("drops identity columns", () => {
    const rows: SectionRecord[] = [
      { Type_of_entity: "Producer", Entity_Name: "Acme", Email: "a@example.com", Quantity: 10 },
    ];
    expect(normalizeRecords(rows)).toEqual([{ Quantity: 10 }]);
  });
});

describe("normalizeMetadata", () => {
  it("takes the first non-empty scalar of a column", () => {
    expect(normalizeMetadata(["", null, "  Acme Plastics ", "Other"])).toBe("Acme Plastics");
  });

  it("falls back to Unknown", () => {
    expect(normalizeMetadata(null)).toBe("Unknown");
    expect(normalizeMetadata([Number.NaN, ""])).toBe("Unknown");
  });

  it("accepts a plain scalar", () => {
    expect(normalizeMetadata("Brand Owner")).toBe("Brand Owner");
    expect(normalizeMetadata(42)).toBe("42");
  });
});

describe("estimateSize", () => {
  it("is the JSON byte length times 1.2", () => {
    // [{"a":"é"}] is 12 bytes in UTF-8
    expect(estimateSize([{ a: "é" }])).toBeCloseTo(14.4);
  });

  it("decides inline storage against the limit minus the margin", () => {
    expect(fitsInline([{ a: "x" }], 100, 10)).toBe(true);
    expect(fitsInline([{ a: "x".repeat(100) }], 100, 10)).toBe(false);
  });
});

describe("planChunks", () => {
  it("splits by the default chunk size", () => {
    const rows = Array.from({ length: 1500 }, (_, i) => i);
    const chunks = planChunks(rows);
    expect(chunks.map((chunk) => chunk.length)).toEqual([1000, 500]);
  });

  it("grows the chunk size to respect the chunk limit", () => {
    const rows = Array.from({ length: 120 }, (_, i) => i);
    const chunks = planChunks(rows, 10, 4);
    expect(chunks.map((chunk) => chunk.length)).toEqual([30, 30, 30, 30]);
  });

  it("returns no chunks for no rows", () => {
    expect(planChunks([])).toEqual([]);
  });
});

describe("sanitizeFieldName", () => {
  it("replaces dots and a leading dollar sign", () => {
    expect(sanitizeFieldName("sales.2024")).toBe("sales_2024");
    expect(sanitizeFieldName("$where")).toBe("_where");
    expect(sanitizeFieldName("a$b")).toBe("a$b");
  });
});
