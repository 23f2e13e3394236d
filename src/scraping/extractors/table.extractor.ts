/**
 * Table Extractor
 *
 * Portal tables are read as a grid of cell texts. The first row holds the
 * column names; every following row becomes a record. Each record is then
 * tagged with the account identity so rows stay attributable once merged.
 */
import type { Page } from "puppeteer-core";
import { PORTAL } from "../../config/constants";
import type { SectionRecord, SectionTable } from "../../shared/types/section.types";

export interface EntityIdentity {
  entityType: string;
  entityName: string;
  email: string;
}

/**
 * Turn a text grid into records, using the first row as the header.
 * Blank header cells are named by position; short rows leave missing cells
 * as null.
 */
export function rowsToRecords(rows: string[][]): SectionTable {
  if (rows.length < 2) return [];

  const header = rows[0].map((name, index) => (name.trim().length > 0 ? name.trim() : `column_${index}`));
  return rows.slice(1).map((cells) => {
    const record: SectionRecord = {};
    header.forEach((name, index) => {
      record[name] = index < cells.length ? cells[index] : null;
    });
    return record;
  });
}

export function enrichRows(rows: SectionTable, identity: EntityIdentity): SectionTable {
  return rows.map((row) => ({
    ...row,
    Type_of_entity: identity.entityType,
    Entity_Name: identity.entityName,
    Email: identity.email,
  }));
}

/** Cell texts of every data table on the page, in document order */
export async function extractTables(page: Page): Promise<string[][][]> {
  return page.$$eval(PORTAL.SELECTORS.TABLE_BODY, (bodies) =>
    bodies.map((body) =>
      Array.from(body.querySelectorAll("tr")).map((row) =>
        Array.from(row.querySelectorAll("th, td")).map((cell) => (cell.textContent ?? "").trim())
      )
    )
  );
}

/** Records of the n-th data table, enriched; empty when the table is absent */
export async function extractSection(
  page: Page,
  identity: EntityIdentity,
  tableIndex: number = 0
): Promise<SectionTable> {
  const tables = await extractTables(page);
  const grid = tables[tableIndex];
  if (!grid) return [];
  return enrichRows(rowsToRecords(grid), identity);
}
