/**
 * Entity Store
 *
 * The storage port used by the DocumentPersistenceEngine. MongoEntityStore
 * is the Mongoose implementation; tests use an in-memory one.
 *
 * Update paths are dotted (scrap_data.2024.sales) and already sanitized by
 * the engine.
 */
import mongoose, { reconnectMongo } from "./mongoose";
import { EntityModel, OverflowChunkModel } from "./models";
import { StorageUnavailableError } from "../../shared/errors/persistence.errors";
import { errorMessage } from "../../shared/errors/service.error";
import type { EntityDocument, EntityUpdate, OverflowChunk } from "../../shared/types/document.types";

export interface EntityStore {
  /** Rejects when the store is unreachable */
  ping(): Promise<void>;
  findEntity(id: string): Promise<EntityDocument | null>;
  /** Apply $set/$unset to one entity, creating it when missing */
  updateEntity(id: string, update: EntityUpdate): Promise<void>;
  insertChunks(chunks: OverflowChunk[]): Promise<void>;
  /** Chunks with the given ids; missing ids are skipped */
  findChunks(ids: string[]): Promise<OverflowChunk[]>;
  deleteChunks(ids: string[]): Promise<void>;
}

export class MongoEntityStore implements EntityStore {
  async ping(): Promise<void> {
    try {
      await reconnectMongo();
    } catch (error) {
      throw new StorageUnavailableError(`MongoDB unreachable: ${errorMessage(error)}`);
    }
    const db = mongoose.connection.db;
    if (mongoose.connection.readyState !== 1 || !db) {
      throw new StorageUnavailableError("MongoDB is not connected");
    }
    await db.admin().ping();
  }

  async findEntity(id: string): Promise<EntityDocument | null> {
    return EntityModel.findById(id).lean<EntityDocument>().exec();
  }

  async updateEntity(id: string, update: EntityUpdate): Promise<void> {
    const unset: Record<string, ""> = {};
    for (const path of update.unset ?? []) unset[path] = "";

    await EntityModel.updateOne(
      { _id: id },
      Object.keys(unset).length > 0 ? { $set: update.set, $unset: unset } : { $set: update.set },
      { upsert: true, strict: false }
    ).exec();
  }

  async insertChunks(chunks: OverflowChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    await OverflowChunkModel.insertMany(chunks, { ordered: true });
  }

  async findChunks(ids: string[]): Promise<OverflowChunk[]> {
    if (ids.length === 0) return [];
    return OverflowChunkModel.find({ _id: { $in: ids } }).lean<OverflowChunk[]>().exec();
  }

  async deleteChunks(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await OverflowChunkModel.deleteMany({ _id: { $in: ids } }).exec();
  }
}
