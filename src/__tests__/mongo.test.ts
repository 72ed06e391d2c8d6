import { describe, expect, it } from 'vitest';

import { normalizePosting } from '../connectors/zonaprop.js';
import { toStoredListing } from '../listing.js';
import {
    IngestionRunSchema,
    outcomesFromUpserts,
    toListingDocument,
    toListingUpdate,
    toRunDocument,
} from '../sinks/mongo.js';
import { rawPosting } from './helpers.js';

const NOW = new Date('2026-02-01T12:00:00.000Z');

const stored = (overrides: Record<string, unknown> = {}) =>
    toStoredListing(normalizePosting(rawPosting(42, overrides), NOW), NOW);

describe('toListingDocument', () => {
    it('should convert ISO strings to dates', () => {
        const document = toListingDocument(stored());

        expect(document.ingestedAt).toEqual(NOW);
        expect(document.sourceCreatedAt).toEqual(NOW);
        expect(document.sourceUpdatedAt).toEqual(new Date('2026-01-20T16:49:39.000Z'));
    });
});

describe('toListingUpdate', () => {
    it('should upsert by natural key and set the geo point when coordinates exist', () => {
        const geolocation = { latitude: -31.4, longitude: -64.18 };
        const { filter, update } = toListingUpdate(
            stored({ postingLocation: { postingGeolocation: { geolocation } } }),
        );

        expect(filter).toEqual({ naturalKey: 'zonaprop:42' });
        expect(update.$set.geoLocation).toEqual({ type: 'Point', coordinates: [-64.18, -31.4] });
        expect(update).not.toHaveProperty('$unset');
    });

    it('should unset the geo point when coordinates are missing', () => {
        const { update } = toListingUpdate(stored());

        expect(update.$set).not.toHaveProperty('geoLocation');
        expect(update).toHaveProperty('$unset', { geoLocation: 1 });
    });
});

describe('outcomesFromUpserts', () => {
    it('should mark upserted indexes as inserted and the rest as updated', () => {
        expect(outcomesFromUpserts(4, { 1: 'a', 3: 'b' })).toEqual(['updated', 'inserted', 'updated', 'inserted']);
    });

    it('should mark the indexes a partly failed bulk write reports as failed', () => {
        expect(outcomesFromUpserts(3, { 0: 'a' }, [1])).toEqual(['inserted', 'failed', 'updated']);
    });

    it('should report every operation as updated when nothing was upserted', () => {
        expect(outcomesFromUpserts(2, {})).toEqual(['updated', 'updated']);
    });
});

describe('toRunDocument', () => {
    it('should convert run timestamps to dates', () => {
        expect(
            toRunDocument({
                runId: 'run-1',
                platform: 'zonaprop',
                status: 'started',
                listingsProcessed: 0,
                listingsNew: 0,
                listingsUpdated: 0,
                errors: 0,
                timestamp: '2026-02-01T12:00:00.000Z',
                finishedAt: null,
            }),
        ).toMatchObject({ runId: 'run-1', timestamp: NOW, finishedAt: null });
    });
});

describe('IngestionRunSchema', () => {
    it('should keep the errors counter without the reserved pathname warning', () => {
        expect(IngestionRunSchema.path('errors')).toBeDefined();
        expect(IngestionRunSchema.get('suppressReservedKeysWarning')).toBe(true);
    });
});
