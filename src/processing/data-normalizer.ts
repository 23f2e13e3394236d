/**
 * Data Normalizer
 *
 * Turns loosely typed scraped rows into values the document store accepts:
 * - missing, NaN, ±Infinity and invalid dates become ""
 * - nested arrays and objects are rebuilt cell by cell
 * - identity columns (entity type, name, email) are dropped; the document
 *   carries them once at the top level
 *
 * Also sizes a section and splits oversized ones into overflow chunks.
 */
import { DOCUMENT_LIMITS, IDENTITY_COLUMNS, UNKNOWN_VALUE } from "../config/constants";
import type {
  CellValue,
  MetadataInput,
  SectionTable,
  StoredRecord,
  StoredValue,
} from "../shared/types/section.types";

const IDENTITY_SET: ReadonlySet<string> = new Set(IDENTITY_COLUMNS);

function normalizeValue(value: CellValue, seen: WeakSet<object>): StoredValue {
  if (value === null || value === undefined) return "";

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : "";
  }

  if (typeof value === "string" || typeof value === "boolean") return value;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value;
  }

  // Self-referencing structures cannot be stored; keep their string form
  if (seen.has(value)) return String(value);
  seen.add(value);

  let result: StoredValue;
  if (Array.isArray(value)) {
    result = value.map((item) => normalizeValue(item, seen));
  } else {
    const out: Record<string, StoredValue> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = normalizeValue(item, seen);
    }
    result = out;
  }

  seen.delete(value);
  return result;
}

/** Normalize one cell */
export function normalizeCell(value: CellValue): StoredValue {
  return normalizeValue(value, new WeakSet());
}

/** Normalize every row of a section and drop the identity columns */
export function normalizeRecords(rows: SectionTable): StoredRecord[] {
  return rows.map((row) => {
    const record: StoredRecord = {};
    for (const [column, value] of Object.entries(row)) {
      if (IDENTITY_SET.has(column)) continue;
      record[column] = normalizeCell(value);
    }
    return record;
  });
}

function scalarText(value: CellValue): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : null;
  if (typeof value === "boolean") return String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return null;
}

/**
 * Reduce an identity/name/type input to one string.
 * A column yields its first non-empty scalar; nothing usable gives "Unknown".
 */
export function normalizeMetadata(input: MetadataInput): string {
  const candidates = Array.isArray(input) ? input : [input];
  for (const candidate of candidates) {
    const text = scalarText(candidate);
    if (text !== null) return text;
  }
  return UNKNOWN_VALUE;
}

/**
 * Estimated stored size in bytes: UTF-8 JSON length times the overhead factor
 * (BSON carries type tags and array indices that JSON does not).
 */
export function estimateSize(records: StoredRecord[]): number {
  return Buffer.byteLength(JSON.stringify(records), "utf8") * DOCUMENT_LIMITS.SIZE_OVERHEAD_FACTOR;
}

/** True when a section fits directly inside the entity document */
export function fitsInline(
  records: StoredRecord[],
  maxDocumentBytes: number = DOCUMENT_LIMITS.MAX_DOCUMENT_BYTES,
  safetyMarginBytes: number = DOCUMENT_LIMITS.SAFETY_MARGIN_BYTES
): boolean {
  return estimateSize(records) < maxDocumentBytes - safetyMarginBytes;
}

/**
 * Split records into chunks of chunkSize, growing the chunk size when
 * needed so that no more than maxChunks chunks are produced.
 */
export function planChunks<T>(
  records: T[],
  chunkSize: number = DOCUMENT_LIMITS.DEFAULT_CHUNK_SIZE,
  maxChunks: number = DOCUMENT_LIMITS.MAX_CHUNKS
): T[][] {
  if (records.length === 0) return [];

  const size = Math.max(chunkSize, Math.ceil(records.length / maxChunks));
  const chunks: T[][] = [];
  for (let i = 0; i < records.length; i += size) {
    chunks.push(records.slice(i, i + size));
  }
  return chunks;
}

/** Make a section or year name safe as a MongoDB path segment */
export function sanitizeFieldName(name: string): string {
  return name.replace(/\./g, "_").replace(/^\$/, "_");
}
