/**
 * Tests for the per-account document store with overflow chunking.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { DocumentPersistenceEngine, isDocumentTooLargeError } from "../document.engine";
import { InMemoryEntityStore } from "../../../__tests__/fakes/in-memory-entity-store";
import type { SectionRecord } from "../../../shared/types/section.types";

const EMAIL = "ops@example.com";
const NOW = new Date("2024-06-01T00:00:00.000Z");

function salesRows(count: number): SectionRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    Type_of_entity: "Producer",
    Entity_Name: "Acme Plastics",
    Email: EMAIL,
    Invoice: `INV-${i}`,
    Quantity: i,
  }));
}

describe("DocumentPersistenceEngine", () => {
  let store: InMemoryEntityStore;
  let engine: DocumentPersistenceEngine;

  beforeEach(() => {
    store = new InMemoryEntityStore();
    engine = new DocumentPersistenceEngine(store, { now: () => NOW });
  });

  describe("save", () => {
    it("stores small sections inline and strips identity columns", async () => {
      const report = await engine.save(
        { procurement: [{ Type_of_entity: "Producer", Entity_Name: "Acme", Email: EMAIL, Material: "PET", Quantity: 10 }] },
        EMAIL,
        "Acme Plastics",
        "Producer",
        2024
      );

      expect(report).toEqual({
        success: true,
        identity: EMAIL,
        years: ["2024"],
        sectionsSaved: 1,
        rowsSaved: 1,
        overflowSections: 0,
        errors: 0,
        message: `Saved 1 section(s), 1 row(s) for ${EMAIL}`,
      });

      const view = await engine.get(EMAIL, 2024);
      expect(view).toEqual({
        _id: EMAIL,
        company_name: "Acme Plastics",
        entity_type: "Producer",
        last_updated: NOW,
        year: "2024",
        data: { procurement: [{ Material: "PET", Quantity: 10 }] },
      });
    });

    it("replaces missing and non-finite cells with empty strings", async () => {
      await engine.save({ wallet: [{ Credit: Number.NaN, Debit: null, Balance: 5 }] }, EMAIL, "Acme", "Producer", 2024);

      const view = await engine.get(EMAIL, 2024);
      expect(view?.data.wallet).toEqual([{ Credit: "", Debit: "", Balance: 5 }]);
    });

    it("spills oversized sections into chunks of 1000 records", async () => {
      const small = new DocumentPersistenceEngine(store, {
        maxDocumentBytes: 1000,
        safetyMarginBytes: 100,
        now: () => NOW,
      });

      const report = await small.save({ sales: salesRows(1500) }, EMAIL, "Acme", "Producer", 2024);

      expect(report.overflowSections).toBe(1);
      expect(report.rowsSaved).toBe(1500);

      const baseId = `${EMAIL}_2024_sales_${NOW.getTime()}`;
      const yearData = store.entities.get(EMAIL)?.scrap_data["2024"];
      expect(yearData?.sales_ref).toEqual({ base_id: baseId, chunks: 2, records: 1500 });
      expect(yearData?.sales).toBeUndefined();
      expect([...store.chunks.keys()]).toEqual([`${baseId}_chunk_0`, `${baseId}_chunk_1`]);
      expect(store.chunks.get(`${baseId}_chunk_1`)?.data).toHaveLength(500);

      const view = await small.get(EMAIL, 2024);
      expect(view?.data.sales).toHaveLength(1500);
      expect(view?.data.sales[0]).toEqual({ Invoice: "INV-0", Quantity: 0 });
      expect(view?.data.sales[1499]).toEqual({ Invoice: "INV-1499", Quantity: 1499 });
    });

    it("removes chunks already written when the chunk insert fails partway", async () => {
      const small = new DocumentPersistenceEngine(store, {
        maxDocumentBytes: 1000,
        safetyMarginBytes: 100,
        now: () => NOW,
      });
      store.failChunkInsertAfter = 1;

      const report = await small.save({ sales: salesRows(1500) }, EMAIL, "Acme", "Producer", 2024);

      expect(report.errors).toBe(1);
      expect(report.sectionsSaved).toBe(0);
      expect(store.chunks.size).toBe(0);
      expect(store.entities.get(EMAIL)?.scrap_data["2024"]?.sales_ref).toBeUndefined();
    });

    it("switches back to inline storage and deletes the old chunks", async () => {
      const small = new DocumentPersistenceEngine(store, {
        maxDocumentBytes: 1000,
        safetyMarginBytes: 100,
        now: () => NOW,
      });
      await small.save({ sales: salesRows(50) }, EMAIL, "Acme", "Producer", 2024);
      expect(store.chunks.size).toBe(1);

      await engine.save({ sales: salesRows(3) }, EMAIL, "Acme", "Producer", 2024);

      const yearData = store.entities.get(EMAIL)?.scrap_data["2024"];
      expect(yearData?.sales_ref).toBeUndefined();
      expect(yearData?.sales).toHaveLength(3);
      expect(store.chunks.size).toBe(0);
    });

    it("falls back to overflow when the store rejects an inline write as too large", async () => {
      store.maxInlineRecords = 2;

      const report = await engine.save({ sales: salesRows(3) }, EMAIL, "Acme", "Producer", 2024);

      expect(report.errors).toBe(0);
      expect(report.overflowSections).toBe(1);
      expect((await engine.get(EMAIL, 2024))?.data.sales).toHaveLength(3);
    });

    it("saves metadata even when there are no rows", async () => {
      const report = await engine.save({ sales: [] }, EMAIL, ["", "Acme Plastics"], null, 2024);

      expect(report.success).toBe(true);
      expect(report.sectionsSaved).toBe(0);
      expect(report.years).toEqual([]);
      expect(store.entities.get(EMAIL)?.company_name).toBe("Acme Plastics");
      expect(store.entities.get(EMAIL)?.entity_type).toBe("Unknown");
    });

    it("files labelled rows under their financial year", async () => {
      const rows: SectionRecord[] = [
        { "Financial Year": "2022-23", Target: 10 },
        { "Financial Year": "2023-24", Target: 20 },
      ];

      const report = await engine.save({ target: rows }, EMAIL, "Acme", "Producer", 2024);

      expect(report.years).toEqual(["2022", "2023"]);
      expect(report.sectionsSaved).toBe(2);
      expect((await engine.get(EMAIL, "2023"))?.data.target).toEqual([{ "Financial Year": "2023-24", Target: 20 }]);
    });

    it("sanitizes section names used as field paths", async () => {
      await engine.save({ "sales.v2": salesRows(1) }, EMAIL, "Acme", "Producer", 2024);
      expect(Object.keys((await engine.get(EMAIL, 2024))?.data ?? {})).toEqual(["sales_v2"]);
    });

    it("counts a failing section and keeps saving the rest", async () => {
      store.failingSections.add("wallet");

      const report = await engine.save(
        { wallet: [{ Balance: 1 }], annual: [{ Filed: "yes" }] },
        EMAIL,
        "Acme",
        "Producer",
        2024
      );

      expect(report.success).toBe(true);
      expect(report.errors).toBe(1);
      expect(report.sectionsSaved).toBe(1);
      expect(report.message).toBe(`Saved 1 section(s), 1 row(s) for ${EMAIL}, 1 failed`);
    });

    it("reports failure when the store is unreachable", async () => {
      store.down = true;

      const report = await engine.save({ sales: salesRows(1) }, EMAIL, "Acme", "Producer", 2024);

      expect(report.success).toBe(false);
      expect(report.message).toBe("Document store unavailable: connect ECONNREFUSED 127.0.0.1:27017");
    });
  });

  describe("get", () => {
    it("returns null for an unknown account", async () => {
      expect(await engine.get("nobody@example.com")).toBeNull();
    });

    it("resolves a legacy bare-id reference", async () => {
      store.entities.set(EMAIL, {
        _id: EMAIL,
        company_name: "Acme",
        entity_type: "Producer",
        last_updated: NOW,
        scrap_data: { "2023": { sales_ref: "legacy-sales", wallet: [{ Balance: 1 }] } },
      });
      store.chunks.set("legacy-sales", {
        _id: "legacy-sales",
        base_id: "legacy-sales",
        email: EMAIL,
        year: "2023",
        section: "sales",
        chunk_index: 0,
        total_chunks: 1,
        data: [{ Invoice: "INV-9" }],
        created_at: NOW,
      });

      const view = await engine.get(EMAIL);

      expect(view?.scrap_data).toEqual({
        "2023": { sales: [{ Invoice: "INV-9" }], wallet: [{ Balance: 1 }] },
      });
    });
  });
});

describe("isDocumentTooLargeError", () => {
  it("recognises size errors by code or message", () => {
    expect(isDocumentTooLargeError(Object.assign(new Error("x"), { code: 17419 }))).toBe(true);
    expect(isDocumentTooLargeError(new Error("Document too large"))).toBe(true);
    expect(isDocumentTooLargeError(new Error("duplicate key"))).toBe(false);
    expect(isDocumentTooLargeError("too large")).toBe(false);
  });
});
