/**
 * Financial year partitioning.
 *
 * Some portal tables span several financial years and label each row
 * ("2023-24", "FY 2022-2023", ...). Those rows are stored under the year
 * their label starts with instead of the year the job was run for.
 */
import { FINANCIAL_YEAR_COLUMNS } from "../config/constants";
import type { CellValue, SectionTable } from "../shared/types/section.types";
import { currentYear } from "../shared/utils/date";

/** First financial-year column present in any row, if any */
export function findYearColumn(rows: SectionTable): string | null {
  for (const column of FINANCIAL_YEAR_COLUMNS) {
    if (rows.some((row) => column in row)) return column;
  }
  return null;
}

/** First 4-digit run in a label, or the fallback when there is none */
export function extractYear(label: CellValue, fallback: string): string {
  if (typeof label !== "string" && typeof label !== "number") return fallback;
  const match = /\d{4}/.exec(String(label));
  return match ? match[0] : fallback;
}

/**
 * Group rows by the year of their financial-year label.
 * Tables without a label column stay whole under defaultYear. Labels with no
 * 4-digit year fall under the current calendar year.
 */
export function partitionByFinancialYear(
  rows: SectionTable,
  defaultYear: string,
  fallbackYear: string = String(currentYear())
): Map<string, SectionTable> {
  const partitions = new Map<string, SectionTable>();
  const column = findYearColumn(rows);

  if (!column) {
    if (rows.length > 0) partitions.set(defaultYear, rows);
    return partitions;
  }

  for (const row of rows) {
    const year = extractYear(row[column], fallbackYear);
    const bucket = partitions.get(year);
    if (bucket) {
      bucket.push(row);
    } else {
      partitions.set(year, [row]);
    }
  }
  return partitions;
}
