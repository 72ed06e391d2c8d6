import mongoose, { mongo, Schema } from 'mongoose';

import { MONGO_DATABASE, MONGO_LISTINGS_COLLECTION, MONGO_RUNS_COLLECTION } from '../constants.js';
import { CURRENCIES, LISTING_STATUSES, OPERATION_TYPES, PLATFORMS } from '../types.js';
import type { GeoPoint, IngestionRun, StoredListing } from '../types.js';
import type { BatchOutcome, SinkBackend } from './sink.js';

export interface ListingDocument
    extends Omit<StoredListing, 'images' | 'sourceCreatedAt' | 'sourceUpdatedAt' | 'ingestedAt' | 'geoLocation'> {
    images: string[];
    geoLocation?: GeoPoint;
    sourceCreatedAt: Date | null;
    sourceUpdatedAt: Date | null;
    ingestedAt: Date;
}

export interface IngestionRunDocument extends Omit<IngestionRun, 'timestamp' | 'finishedAt'> {
    timestamp: Date;
    finishedAt: Date | null;
}

const GeoPointSchema: Schema = new Schema(
    {
        type: { type: String, enum: ['Point'], required: true },
        coordinates: { type: [Number], required: true }, // [lng, lat]
    },
    { _id: false },
);

const ListingSchema: Schema = new Schema(
    {
        naturalKey: { type: String, required: true, unique: true },
        platform: { type: String, required: true, enum: [...PLATFORMS], index: true },
        platformListingId: { type: String, required: true, index: true },
        listingUrl: { type: String, default: null },
        operationType: { type: String, required: true, enum: [...OPERATION_TYPES], index: true },
        propertyType: { type: String, required: true },
        status: { type: String, required: true, enum: [...LISTING_STATUSES], default: 'active', index: true },
        price: { type: Number, min: 0, default: null },
        currency: { type: String, required: true, enum: [...CURRENCIES] },
        expenses: { type: Number, min: 0, default: null },
        expensesCurrency: { type: String, enum: [...CURRENCIES, null], default: null },
        addressText: { type: String, default: null },
        geoLat: { type: Number, min: -90, max: 90, default: null },
        geoLng: { type: Number, min: -180, max: 180, default: null },
        geoLocation: { type: GeoPointSchema, default: undefined },
        surfaceTotal: { type: Number, min: 0, default: null },
        surfaceCovered: { type: Number, min: 0, default: null },
        rooms: { type: Number, min: 0, default: null },
        bedrooms: { type: Number, min: 0, default: null },
        bathrooms: { type: Number, min: 0, default: null },
        title: { type: String, default: null },
        description: { type: String, default: null },
        images: { type: [String], default: [] },
        agentPublisher: { type: String, default: null },
        sourceCreatedAt: { type: Date, default: null, index: true },
        sourceUpdatedAt: { type: Date, default: null },
        ingestedAt: { type: Date, required: true },
    },
    { versionKey: false },
);

ListingSchema.index({ platform: 1, platformListingId: 1 }, { unique: true, name: 'unique_platform_listing' });
ListingSchema.index({ operationType: 1, propertyType: 1, price: 1 }, { name: 'search_operation_property_price' });
ListingSchema.index({ ingestedAt: -1 }, { name: 'ingested_at_desc' });
// 2dsphere indexes skip documents without the field, which is why geoLocation is unset rather than null
ListingSchema.index({ geoLocation: '2dsphere' }, { name: 'geo_location_2dsphere' });
ListingSchema.index(
    { title: 'text', description: 'text' },
    { name: 'text_search_title_description', default_language: 'spanish' },
);

export const IngestionRunSchema: Schema = new Schema(
    {
        runId: { type: String, required: true, unique: true },
        platform: { type: String, required: true, index: true },
        status: { type: String, required: true, enum: ['started', 'completed', 'failed'] },
        listingsProcessed: { type: Number, min: 0, default: 0 },
        listingsNew: { type: Number, min: 0, default: 0 },
        listingsUpdated: { type: Number, min: 0, default: 0 },
        errors: { type: Number, min: 0, default: 0 },
        timestamp: { type: Date, required: true, index: true },
        finishedAt: { type: Date, default: null },
    },
    // Keeps the `errors` counter under its own name although mongoose reserves it
    { versionKey: false, suppressReservedKeysWarning: true },
);

IngestionRunSchema.index({ platform: 1, timestamp: -1 }, { name: 'platform_timestamp_desc' });

const toDate = (value: string | null): Date | null => (value === null ? null : new Date(value));

export const toListingDocument = (record: StoredListing): ListingDocument => {
    const { geoLocation, ...fields } = record;
    return {
        ...fields,
        images: [...record.images],
        ...(geoLocation ? { geoLocation } : {}),
        sourceCreatedAt: toDate(record.sourceCreatedAt),
        sourceUpdatedAt: toDate(record.sourceUpdatedAt),
        ingestedAt: new Date(record.ingestedAt),
    };
};

/** Filter and update for a merge-by-natural-key upsert that overwrites every field. */
export const toListingUpdate = (
    record: StoredListing,
): { filter: { naturalKey: string }; update: { $set: ListingDocument; $unset?: { geoLocation: 1 } } } => {
    const document = toListingDocument(record);
    return {
        filter: { naturalKey: record.naturalKey },
        update: document.geoLocation ? { $set: document } : { $set: document, $unset: { geoLocation: 1 } },
    };
};

/**
 * bulkWrite reports the indexes of the operations that inserted and, when some failed,
 * the indexes of those; every other upsert matched.
 */
export const outcomesFromUpserts = (
    total: number,
    upsertedIds: Record<number, unknown>,
    failedIndexes: Iterable<number> = [],
): BatchOutcome[] => {
    const failed = new Set(failedIndexes);
    return Array.from({ length: total }, (_, index) => {
        if (failed.has(index)) return 'failed';
        return index in upsertedIds ? 'inserted' : 'updated';
    });
};

export const toRunDocument = (run: IngestionRun): IngestionRunDocument => ({
    ...run,
    timestamp: new Date(run.timestamp),
    finishedAt: toDate(run.finishedAt),
});

export interface MongoBackendOptions {
    uri: string;
    dbName?: string;
}

export const createMongoBackend = async ({
    uri,
    dbName = MONGO_DATABASE,
}: MongoBackendOptions): Promise<SinkBackend> => {
    const connection = await mongoose.createConnection(uri, { dbName, serverSelectionTimeoutMS: 5000 }).asPromise();
    const listings = connection.model<ListingDocument>('Listing', ListingSchema, MONGO_LISTINGS_COLLECTION);
    const runs = connection.model<IngestionRunDocument>('IngestionRun', IngestionRunSchema, MONGO_RUNS_COLLECTION);
    await Promise.all([listings.init(), runs.init()]);

    return {
        name: 'mongodb',

        async writeOne(record) {
            const { filter, update } = toListingUpdate(record);
            const result = await listings.updateOne(filter, update, { upsert: true });
            return result.upsertedCount > 0 ? 'inserted' : 'updated';
        },

        async writeBatch(records) {
            const operations = records.map((record) => {
                const { filter, update } = toListingUpdate(record);
                return { updateOne: { filter, update, upsert: true } };
            });
            try {
                const result = await listings.bulkWrite(operations, { ordered: false });
                return outcomesFromUpserts(records.length, result.upsertedIds);
            } catch (error) {
                // Unordered bulk writes apply every operation that did not fail
                if (!(error instanceof mongo.MongoBulkWriteError)) throw error;
                const failed = [error.writeErrors].flat().map((writeError) => writeError.index);
                return outcomesFromUpserts(records.length, error.result.upsertedIds, failed);
            }
        },

        async saveRun(run) {
            await runs.updateOne({ runId: run.runId }, { $set: toRunDocument(run) }, { upsert: true });
        },

        async close() {
            await connection.close();
        },
    };
};
