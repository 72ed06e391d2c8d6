import { z } from 'zod';

import { NATURAL_KEY_SEPARATOR } from './constants.js';
import { NormalizationError } from './errors.js';
import { CURRENCIES, LISTING_STATUSES, OPERATION_TYPES, PLATFORMS } from './types.js';
import type { GeoPoint, Platform, StoredListing, UnifiedListing } from './types.js';

const nonNegative = z.number().finite().nonnegative().nullable();
const count = z.number().int().nonnegative().nullable();
const optionalText = z.string().nullable();
const isoDate = z.string().datetime({ offset: true }).nullable();

export const UnifiedListingSchema = z
    .object({
        platform: z.enum(PLATFORMS),
        platformListingId: z.string().trim().min(1),
        listingUrl: z.string().url().nullable(),
        operationType: z.enum(OPERATION_TYPES),
        propertyType: z.string().min(1).transform((value) => value.toLowerCase()),
        status: z.enum(LISTING_STATUSES).default('active'),
        price: nonNegative,
        currency: z.enum(CURRENCIES),
        expenses: nonNegative,
        expensesCurrency: z.enum(CURRENCIES).nullable(),
        addressText: optionalText,
        geoLat: z.number().min(-90).max(90).nullable(),
        geoLng: z.number().min(-180).max(180).nullable(),
        surfaceTotal: nonNegative,
        surfaceCovered: nonNegative,
        rooms: count,
        bedrooms: count,
        bathrooms: count,
        title: optionalText,
        description: optionalText,
        images: z.array(z.string()),
        agentPublisher: optionalText,
        sourceCreatedAt: isoDate,
        sourceUpdatedAt: isoDate,
    })
    .refine((listing) => (listing.geoLat === null) === (listing.geoLng === null), {
        message: 'geoLat and geoLng must be both present or both absent',
        path: ['geoLat'],
    });

export type UnifiedListingFields = z.input<typeof UnifiedListingSchema>;

/**
 * Validates the fields and returns a frozen listing. Listings are produced once per
 * page item and never mutated; only the sink derives a stored copy from them.
 */
export const createListing = (fields: UnifiedListingFields): UnifiedListing => {
    const parsed = UnifiedListingSchema.safeParse(fields);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new NormalizationError(`Invalid listing: ${issues}`, fields.platformListingId || null);
    }

    return Object.freeze({ ...parsed.data, images: Object.freeze([...parsed.data.images]) });
};

export const naturalKey = (platform: Platform, platformListingId: string): string =>
    `${platform}${NATURAL_KEY_SEPARATOR}${platformListingId}`;

export const listingKey = (listing: Pick<UnifiedListing, 'platform' | 'platformListingId'>): string =>
    naturalKey(listing.platform, listing.platformListingId);

/** GeoJSON point for storage; never authoritative over geoLat/geoLng. */
export const toGeoPoint = (listing: Pick<UnifiedListing, 'geoLat' | 'geoLng'>): GeoPoint | null =>
    listing.geoLat !== null && listing.geoLng !== null
        ? { type: 'Point', coordinates: [listing.geoLng, listing.geoLat] }
        : null;

export const toStoredListing = (listing: UnifiedListing, ingestedAt: Date): StoredListing => ({
    ...listing,
    images: [...listing.images],
    naturalKey: listingKey(listing),
    geoLocation: toGeoPoint(listing),
    ingestedAt: ingestedAt.toISOString(),
});
