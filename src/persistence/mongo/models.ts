/**
 * Mongoose models for the document store.
 *
 * - EntityModel: one document per account (_id = email), sections grouped
 *   by year under scrap_data
 * - OverflowChunkModel: slices of sections too large for the entity document
 *
 * scrap_data is schemaless: section names and columns come from the portal.
 */
import { Schema } from "mongoose";
import config from "../../config";
import mongoose from "./mongoose";
import type { EntityDocument, OverflowChunk } from "../../shared/types/document.types";

const EntitySchema = new Schema<EntityDocument>(
  {
    _id: { type: String, required: true },
    company_name: { type: String, default: "" },
    entity_type: { type: String, default: "" },
    last_updated: { type: Date },
    scrap_data: { type: Schema.Types.Mixed, default: {} },
  },
  { collection: config.mongoCollection, versionKey: false, minimize: false }
);

const OverflowChunkSchema = new Schema<OverflowChunk>(
  {
    _id: { type: String, required: true },
    base_id: { type: String, required: true, index: true },
    email: { type: String, required: true, index: true },
    year: { type: String, required: true },
    section: { type: String, required: true },
    chunk_index: { type: Number, required: true },
    total_chunks: { type: Number, required: true },
    data: { type: Schema.Types.Mixed, default: [] },
    created_at: { type: Date, required: true },
  },
  { collection: config.mongoOverflowCollection, versionKey: false }
);

export const EntityModel = mongoose.model<EntityDocument>("Entity", EntitySchema);

export const OverflowChunkModel = mongoose.model<OverflowChunk>("OverflowChunk", OverflowChunkSchema);
