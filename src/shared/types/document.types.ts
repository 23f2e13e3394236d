/**
 * Document Store Types
 *
 * Shape of the per-entity MongoDB document and its overflow chunks.
 *
 * {
 *   _id: "producer@example.com",
 *   company_name: "XYZ Pvt Ltd",
 *   entity_type: "Producer",
 *   last_updated: Date,
 *   scrap_data: {
 *     "2024": {
 *       procurement: [...],
 *       sales_ref: { base_id, chunks, records }
 *     }
 *   }
 * }
 */
import type { StoredRecord } from "./section.types";

export interface OverflowReference {
  base_id: string;
  chunks: number;
  records: number;
}

/**
 * A section slot inside one year: a plain record list, a structured
 * overflow reference, or (legacy) the bare _id of a single overflow document.
 */
export type SectionEntry = StoredRecord[] | OverflowReference | string;

export type YearData = Record<string, SectionEntry>;

export interface EntityDocument {
  _id: string;
  company_name: string;
  entity_type: string;
  last_updated: Date;
  scrap_data: Record<string, YearData>;
}

export interface OverflowChunk {
  _id: string;
  base_id: string;
  email: string;
  year: string;
  section: string;
  chunk_index: number;
  total_chunks: number;
  data: StoredRecord[];
  created_at: Date;
}

/** Values the engine writes at a dotted path of an entity document */
export type EntityFieldValue = string | Date | StoredRecord[] | OverflowReference;

export interface EntityUpdate {
  set: Record<string, EntityFieldValue>;
  unset?: string[];
}

export interface SaveReport {
  success: boolean;
  identity: string;
  years: string[];
  sectionsSaved: number;
  rowsSaved: number;
  overflowSections: number;
  errors: number;
  message: string;
}

interface EntityViewBase {
  _id: string;
  company_name: string;
  entity_type: string;
  last_updated: Date;
}

/** One year's sections with every overflow reference resolved */
export interface EntityYearView extends EntityViewBase {
  year: string;
  data: Record<string, StoredRecord[]>;
}

/** All years with every overflow reference resolved */
export interface EntityDocumentView extends EntityViewBase {
  scrap_data: Record<string, Record<string, StoredRecord[]>>;
}
