/**
 * Section Types
 *
 * A section is one named table scraped from the portal (procurement, sales, ...).
 * Rows arrive loosely typed from the browser and are normalized into
 * StoredRecord before they reach the document store.
 */

/** A raw cell as produced by a scraper or an import */
export type CellValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | Date
  | CellValue[]
  | { [key: string]: CellValue };

export type SectionRecord = Record<string, CellValue>;

export type SectionTable = SectionRecord[];

/** Section name → rows */
export type ScrapedSections = Record<string, SectionTable>;

/** A cell after normalization: no null, undefined, NaN or Infinity */
export type StoredValue =
  | string
  | number
  | boolean
  | Date
  | StoredValue[]
  | { [key: string]: StoredValue };

export type StoredRecord = Record<string, StoredValue>;

/** Entity metadata may arrive as a scalar or as a whole column */
export type MetadataInput = CellValue | CellValue[];
