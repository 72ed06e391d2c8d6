export const PLATFORMS = ['zonaprop', 'mercadolibre', 'properati', 'argenprop'] as const;
export const OPERATION_TYPES = ['sale', 'rent'] as const;
export const LISTING_STATUSES = ['active', 'delisted', 'paused', 'sold', 'rented'] as const;
export const CURRENCIES = ['ARS', 'USD', 'EUR'] as const;

export type Platform = (typeof PLATFORMS)[number];
export type OperationType = (typeof OPERATION_TYPES)[number];
export type ListingStatus = (typeof LISTING_STATUSES)[number];
export type Currency = (typeof CURRENCIES)[number];
export const STORAGE_BACKENDS = ['key-value-store', 'mongodb'] as const;
export type StorageBackend = (typeof STORAGE_BACKENDS)[number];

export interface UnifiedListing {
    readonly platform: Platform;
    readonly platformListingId: string;
    readonly listingUrl: string | null;
    readonly operationType: OperationType;
    readonly propertyType: string;
    readonly status: ListingStatus;
    readonly price: number | null;
    readonly currency: Currency;
    readonly expenses: number | null;
    readonly expensesCurrency: Currency | null;
    readonly addressText: string | null;
    readonly geoLat: number | null; // null iff geoLng is null
    readonly geoLng: number | null;
    readonly surfaceTotal: number | null; // m²
    readonly surfaceCovered: number | null;
    readonly rooms: number | null;
    readonly bedrooms: number | null;
    readonly bathrooms: number | null;
    readonly title: string | null;
    readonly description: string | null;
    readonly images: readonly string[];
    readonly agentPublisher: string | null;
    readonly sourceCreatedAt: string | null; // ISO date, source clock
    readonly sourceUpdatedAt: string | null;
}

export interface GeoPoint {
    type: 'Point';
    coordinates: [lng: number, lat: number];
}

export interface StoredListing extends UnifiedListing {
    naturalKey: string; // `${platform}:${platformListingId}`
    geoLocation: GeoPoint | null;
    ingestedAt: string;
}

export type RunStatus = 'started' | 'completed' | 'failed';

export interface IngestionRun {
    runId: string;
    platform: Platform;
    status: RunStatus;
    listingsProcessed: number;
    listingsNew: number;
    listingsUpdated: number;
    errors: number;
    timestamp: string; // run start
    finishedAt: string | null;
}

export interface ZoneConfig {
    key: string;
    displayName: string;
    description: string;
    provinceCode: string;
    zoneCode: string | null; // null = whole province
}

export interface OperationConfig {
    key: OperationType;
    displayName: string;
    code: string;
}

export interface PropertyTypeConfig {
    key: string;
    code: string; // "" = any type
}

export interface RunStatistics {
    totalListings: number;
    combinationsAttempted: number;
    combinationsCompleted: number;
    errors: number;
    listingsNew: number;
    listingsUpdated: number;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    listingsPerMinute: number;
    interrupted: boolean;
}
