/**
 * In-process EntityStore. Applies the dotted-path updates the engine
 * issues (top-level metadata and scrap_data.{year}.{key}).
 */
import type { EntityStore } from "../../persistence/mongo/entity.store";
import type {
  EntityDocument,
  EntityFieldValue,
  EntityUpdate,
  OverflowChunk,
} from "../../shared/types/document.types";

export class InMemoryEntityStore implements EntityStore {
  readonly entities = new Map<string, EntityDocument>();
  readonly chunks = new Map<string, OverflowChunk>();
  down = false;
  /** Inline writes of more records than this are rejected as too large */
  maxInlineRecords = Number.POSITIVE_INFINITY;
  /** Section names whose writes always fail */
  readonly failingSections = new Set<string>();
  /** Chunk inserts write this many chunks, then fail */
  failChunkInsertAfter: number | null = null;
  updates: EntityUpdate[] = [];

  private check(): void {
    if (this.down) throw new Error("connect ECONNREFUSED 127.0.0.1:27017");
  }

  async ping(): Promise<void> {
    this.check();
  }

  async findEntity(id: string): Promise<EntityDocument | null> {
    this.check();
    const entity = this.entities.get(id);
    return entity ? structuredClone(entity) : null;
  }

  async updateEntity(id: string, update: EntityUpdate): Promise<void> {
    this.check();
    for (const [path, value] of Object.entries(update.set)) {
      const section = path.split(".")[2];
      if (section && this.failingSections.has(section.replace(/_ref$/, ""))) {
        throw new Error(`write to ${path} failed`);
      }
      if (Array.isArray(value) && value.length > this.maxInlineRecords) {
        throw Object.assign(new Error("BSONObj size is invalid"), { code: 10334 });
      }
    }

    this.updates.push(structuredClone(update));
    const entity: EntityDocument = this.entities.get(id) ?? {
      _id: id,
      company_name: "",
      entity_type: "",
      last_updated: new Date(0),
      scrap_data: {},
    };

    for (const [path, value] of Object.entries(update.set)) {
      this.applySet(entity, path, value);
    }
    for (const path of update.unset ?? []) {
      const [root, year, key] = path.split(".");
      if (root === "scrap_data" && year && key) delete entity.scrap_data[year]?.[key];
    }
    this.entities.set(id, entity);
  }

  private applySet(entity: EntityDocument, path: string, value: EntityFieldValue): void {
    const [root, year, key] = path.split(".");
    if (root === "scrap_data" && year && key) {
      if (value instanceof Date) throw new Error(`unexpected date at ${path}`);
      const yearData = entity.scrap_data[year] ?? {};
      yearData[key] = value;
      entity.scrap_data[year] = yearData;
      return;
    }
    if (root === "company_name" && typeof value === "string") entity.company_name = value;
    else if (root === "entity_type" && typeof value === "string") entity.entity_type = value;
    else if (root === "last_updated" && value instanceof Date) entity.last_updated = value;
    else throw new Error(`unsupported update path ${path}`);
  }

  async insertChunks(chunks: OverflowChunk[]): Promise<void> {
    this.check();
    for (const [index, chunk] of chunks.entries()) {
      if (index === this.failChunkInsertAfter) throw new Error("bulk write interrupted");
      if (this.chunks.has(chunk._id)) throw new Error(`duplicate key ${chunk._id}`);
      this.chunks.set(chunk._id, structuredClone(chunk));
    }
  }

  async findChunks(ids: string[]): Promise<OverflowChunk[]> {
    this.check();
    const found: OverflowChunk[] = [];
    for (const id of ids) {
      const chunk = this.chunks.get(id);
      if (chunk) found.push(structuredClone(chunk));
    }
    return found;
  }

  async deleteChunks(ids: string[]): Promise<void> {
    this.check();
    for (const id of ids) this.chunks.delete(id);
  }
}
