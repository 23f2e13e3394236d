/**
 * Document Persistence Engine
 *
 * Stores a scrape result as one document per account:
 *
 *   scrap_data.{year}.{section}       records stored inline
 *   scrap_data.{year}.{section}_ref   { base_id, chunks, records } pointing at
 *                                     overflow chunks in a second collection
 *
 * For any (account, year, section) exactly one of the two forms exists; every
 * write sets one and unsets the other. Sections too large for the 16 MiB
 * document limit are split into chunks of 1000 records (more per chunk when
 * that would exceed 50 chunks). Chunks of a replaced reference are deleted
 * once the new write has landed.
 *
 * A failing section is logged and counted; the remaining sections are still
 * written. Only an unreachable store fails the whole save.
 */
import { DOCUMENT_LIMITS, REF_SUFFIX } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import { metrics } from "../../monitoring/metrics.collector";
import {
  fitsInline,
  normalizeMetadata,
  normalizeRecords,
  planChunks,
  sanitizeFieldName,
} from "../../processing/data-normalizer";
import { partitionByFinancialYear } from "../../processing/fiscal-year";
import { PersistenceFailureError } from "../../shared/errors/persistence.errors";
import { errorMessage } from "../../shared/errors/service.error";
import type {
  EntityDocument,
  EntityDocumentView,
  EntityYearView,
  OverflowChunk,
  OverflowReference,
  SaveReport,
  SectionEntry,
  YearData,
} from "../../shared/types/document.types";
import type { MetadataInput, ScrapedSections, StoredRecord } from "../../shared/types/section.types";
import { currentYear } from "../../shared/utils/date";
import { isPlainObject } from "../../shared/utils/guards";
import type { EntityStore } from "../mongo/entity.store";

/** MongoDB error codes for documents over the BSON size limit */
const DOCUMENT_TOO_LARGE_CODES: ReadonlySet<number> = new Set([10334, 17419, 17420]);

export type StorageMode = "inline" | "overflow";

export interface DocumentEngineOptions {
  maxDocumentBytes?: number;
  safetyMarginBytes?: number;
  chunkSize?: number;
  maxChunks?: number;
  now?: () => Date;
}

export function isDocumentTooLargeError(error: unknown): boolean {
  if (!isPlainObject(error)) return false;
  if (typeof error.code === "number" && DOCUMENT_TOO_LARGE_CODES.has(error.code)) return true;
  return typeof error.message === "string" && error.message.toLowerCase().includes("too large");
}

export function chunkIds(reference: OverflowReference): string[] {
  return Array.from({ length: reference.chunks }, (_, i) => `${reference.base_id}_chunk_${i}`);
}

export class DocumentPersistenceEngine {
  private readonly store: EntityStore;
  private readonly maxDocumentBytes: number;
  private readonly safetyMarginBytes: number;
  private readonly chunkSize: number;
  private readonly maxChunks: number;
  private readonly now: () => Date;

  constructor(store: EntityStore, options: DocumentEngineOptions = {}) {
    this.store = store;
    this.maxDocumentBytes = options.maxDocumentBytes ?? DOCUMENT_LIMITS.MAX_DOCUMENT_BYTES;
    this.safetyMarginBytes = options.safetyMarginBytes ?? DOCUMENT_LIMITS.SAFETY_MARGIN_BYTES;
    this.chunkSize = options.chunkSize ?? DOCUMENT_LIMITS.DEFAULT_CHUNK_SIZE;
    this.maxChunks = options.maxChunks ?? DOCUMENT_LIMITS.MAX_CHUNKS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Persist every non-empty section for one account.
   *
   * @param identity - account email, as a scalar or a whole column
   * @param year - year for rows without a financial-year label (default: current year)
   */
  async save(
    sections: ScrapedSections,
    identity: MetadataInput,
    displayName: MetadataInput,
    entityType: MetadataInput,
    year?: number | string
  ): Promise<SaveReport> {
    const id = normalizeMetadata(identity);
    const companyName = normalizeMetadata(displayName);
    const type = normalizeMetadata(entityType);
    const defaultYear = String(year ?? currentYear());

    const report: SaveReport = {
      success: false,
      identity: id,
      years: [],
      sectionsSaved: 0,
      rowsSaved: 0,
      overflowSections: 0,
      errors: 0,
      message: "",
    };

    let existing: EntityDocument | null;
    try {
      await this.store.ping();
      await this.store.updateEntity(id, {
        set: { company_name: companyName, entity_type: type, last_updated: this.now() },
      });
      existing = await this.store.findEntity(id);
    } catch (error) {
      logger.error({ identity: id, error: errorMessage(error) }, "Document store unavailable");
      report.message = `Document store unavailable: ${errorMessage(error)}`;
      return report;
    }

    for (const [sectionName, rows] of Object.entries(sections)) {
      if (rows.length === 0) continue;
      const section = sanitizeFieldName(sectionName);

      for (const [label, partition] of partitionByFinancialYear(rows, defaultYear)) {
        const yearKey = sanitizeFieldName(label);
        const records = normalizeRecords(partition);

        try {
          const mode = await this.saveSection(id, yearKey, section, records, existing);
          report.sectionsSaved++;
          report.rowsSaved += records.length;
          if (mode === "overflow") report.overflowSections++;
          metrics.increment("document_sections_saved_total", { mode });
        } catch (error) {
          const failure = new PersistenceFailureError(`${yearKey}.${section}`, errorMessage(error));
          logger.error({ identity: id, year: yearKey, section, error: failure.message }, "Section not saved");
          report.errors++;
          metrics.increment("document_section_errors_total");
        }
      }
    }

    try {
      const saved = await this.store.findEntity(id);
      report.years = Object.keys(saved?.scrap_data ?? {}).sort();
    } catch (error) {
      logger.warn({ identity: id, error: errorMessage(error) }, "Could not re-read saved document");
    }

    report.success = true;
    report.message =
      `Saved ${report.sectionsSaved} section(s), ${report.rowsSaved} row(s) for ${id}` +
      (report.overflowSections > 0 ? `, ${report.overflowSections} in overflow` : "") +
      (report.errors > 0 ? `, ${report.errors} failed` : "");

    logger.info(
      {
        identity: id,
        sectionsSaved: report.sectionsSaved,
        rowsSaved: report.rowsSaved,
        overflowSections: report.overflowSections,
        errors: report.errors,
      },
      "Scrape data saved"
    );
    return report;
  }

  private async saveSection(
    id: string,
    year: string,
    section: string,
    records: StoredRecord[],
    existing: EntityDocument | null
  ): Promise<StorageMode> {
    const path = `scrap_data.${year}.${section}`;
    const refPath = `${path}${REF_SUFFIX}`;
    const previous: SectionEntry | undefined = existing?.scrap_data?.[year]?.[`${section}${REF_SUFFIX}`];

    let mode: StorageMode;
    let newBaseId: string | null = null;

    if (fitsInline(records, this.maxDocumentBytes, this.safetyMarginBytes)) {
      try {
        await this.store.updateEntity(id, { set: { [path]: records }, unset: [refPath] });
        mode = "inline";
      } catch (error) {
        if (!isDocumentTooLargeError(error)) throw error;
        logger.warn({ identity: id, year, section }, "Inline write rejected as too large, using overflow");
        newBaseId = await this.writeOverflow(id, year, section, records);
        mode = "overflow";
      }
    } else {
      newBaseId = await this.writeOverflow(id, year, section, records);
      mode = "overflow";
    }

    if (previous !== undefined) {
      await this.discardReference(previous, newBaseId);
    }
    return mode;
  }

  /** Insert chunks, then point the entity at them. Returns the chunk base id. */
  private async writeOverflow(
    id: string,
    year: string,
    section: string,
    records: StoredRecord[]
  ): Promise<string> {
    const createdAt = this.now();
    const baseId = `${id}_${year}_${section}_${createdAt.getTime()}`;
    const slices = planChunks(records, this.chunkSize, this.maxChunks);

    const chunks: OverflowChunk[] = slices.map((data, index) => ({
      _id: `${baseId}_chunk_${index}`,
      base_id: baseId,
      email: id,
      year,
      section,
      chunk_index: index,
      total_chunks: slices.length,
      data,
      created_at: createdAt,
    }));

    try {
      await this.store.insertChunks(chunks);
    } catch (error) {
      // an unordered bulk insert may have written some chunks
      await this.deleteChunksQuietly(chunks.map((chunk) => chunk._id));
      throw error;
    }

    const reference: OverflowReference = {
      base_id: baseId,
      chunks: chunks.length,
      records: records.length,
    };
    const path = `scrap_data.${year}.${section}`;

    try {
      await this.store.updateEntity(id, { set: { [`${path}${REF_SUFFIX}`]: reference }, unset: [path] });
    } catch (error) {
      await this.deleteChunksQuietly(chunks.map((chunk) => chunk._id));
      throw error;
    }

    logger.info({ identity: id, year, section, chunks: chunks.length, records: records.length }, "Section stored in overflow");
    return baseId;
  }

  private async discardReference(entry: SectionEntry, keepBaseId: string | null): Promise<void> {
    if (Array.isArray(entry)) return;
    if (typeof entry === "string") {
      await this.deleteChunksQuietly([entry]);
      return;
    }
    if (entry.base_id === keepBaseId) return;
    await this.deleteChunksQuietly(chunkIds(entry));
  }

  private async deleteChunksQuietly(ids: string[]): Promise<void> {
    try {
      await this.store.deleteChunks(ids);
    } catch (error) {
      logger.warn({ chunks: ids.length, error: errorMessage(error) }, "Could not delete overflow chunks");
    }
  }

  /**
   * Read an account's data with every overflow reference resolved.
   * With a year: just that year's sections. Missing account: null.
   */
  async get(identity: string): Promise<EntityDocumentView | null>;
  async get(identity: string, year: number | string): Promise<EntityYearView | null>;
  async get(
    identity: string,
    year?: number | string
  ): Promise<EntityDocumentView | EntityYearView | null> {
    const document = await this.store.findEntity(identity);
    if (!document) return null;

    const base = {
      _id: document._id,
      company_name: document.company_name,
      entity_type: document.entity_type,
      last_updated: document.last_updated,
    };
    const scrapData = document.scrap_data ?? {};

    if (year !== undefined) {
      const yearKey = sanitizeFieldName(String(year));
      return { ...base, year: yearKey, data: await this.resolveYear(scrapData[yearKey] ?? {}) };
    }

    const resolved: Record<string, Record<string, StoredRecord[]>> = {};
    for (const [yearKey, yearData] of Object.entries(scrapData)) {
      resolved[yearKey] = await this.resolveYear(yearData);
    }
    return { ...base, scrap_data: resolved };
  }

  private async resolveYear(yearData: YearData): Promise<Record<string, StoredRecord[]>> {
    const sections: Record<string, StoredRecord[]> = {};

    for (const [key, entry] of Object.entries(yearData)) {
      if (key.endsWith(REF_SUFFIX)) {
        sections[key.slice(0, -REF_SUFFIX.length)] = await this.resolveEntry(entry);
      } else if (Array.isArray(entry)) {
        sections[key] = entry;
      }
    }
    return sections;
  }

  private async resolveEntry(entry: SectionEntry): Promise<StoredRecord[]> {
    if (Array.isArray(entry)) return entry;

    // Older writers stored the _id of a single overflow document
    if (typeof entry === "string") {
      const [legacy] = await this.store.findChunks([entry]);
      return legacy ? legacy.data : [];
    }

    const chunks = await this.store.findChunks(chunkIds(entry));
    if (chunks.length !== entry.chunks) {
      logger.warn({ baseId: entry.base_id, expected: entry.chunks, found: chunks.length }, "Overflow chunks missing");
    }
    return chunks
      .sort((a, b) => a.chunk_index - b.chunk_index)
      .flatMap((chunk) => chunk.data);
  }
}
