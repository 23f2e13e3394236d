/**
 * Next-target row coercion.
 *
 * The portal renders "Next Year" and "Projected Amount" as display text
 * ("2025-26", "1,234.500 MT"). Each is coerced on its own; a value that
 * cannot be read becomes 0 without affecting the other.
 */
import type { CellValue, SectionRecord } from "../shared/types/section.types";

export interface NextTargetValues {
  nextYear: number;
  projectedAmount: number;
  typeOfEntity: string;
  entityName: string;
  email: string;
}

/** First run of digits as an integer; 0 when there is none */
export function coerceNextYear(value: CellValue): number {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : 0;
  if (typeof value !== "string") return 0;
  const match = /\d+/.exec(value);
  return match ? parseInt(match[0], 10) : 0;
}

/** Decimal with separators, currency and units stripped; 0 when unreadable */
export function coerceProjectedAmount(value: CellValue): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value !== "string") return 0;
  const parsed = parseFloat(value.replace(/[^\d.-]/g, ""));
  return Number.isFinite(parsed) ? parsed : 0;
}

function text(value: CellValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

export function toNextTargetValues(row: SectionRecord): NextTargetValues {
  return {
    nextYear: coerceNextYear(row["Next Year"]),
    projectedAmount: coerceProjectedAmount(row["Projected Amount"]),
    typeOfEntity: text(row.Type_of_entity),
    entityName: text(row.Entity_Name),
    email: text(row.Email),
  };
}
