import { gotScraping, type ProxyConfiguration } from 'crawlee';
import { z } from 'zod';

import { FETCH_HEADERS, REQUEST_TIMEOUT_SECS } from '../constants.js';
import { errorMessage, NormalizationError, TransportError } from '../errors.js';
import { createListing } from '../listing.js';
import type { Currency, OperationType, UnifiedListing } from '../types.js';
import { emptyToNull, parseCount, parseNonNegativeNumber, resolveUrl } from '../utils.js';
import { createConnector, type Connector, type PageFetcher, type PageRequest, type PageResponse } from './connector.js';

// Zonaprop's listing pages load results from this JSON endpoint; it rejects limits above 30.
const BASE_URL = 'https://www.zonaprop.com.ar';
const SEARCH_API = `${BASE_URL}/rplis-api/postings?dynamicListingSearch=true`;
export const MAX_PAGE_SIZE = 30;
const SOURCE = 'zonaprop' as const;

const RENT_KEYWORD = 'alquiler';
const DEFAULT_CURRENCY: Currency = 'USD';

// Feature codes in `mainFeatures`
const FEATURE = {
    surfaceTotal: 'CFT100',
    surfaceCovered: 'CFT101',
    rooms: 'CFT1', // ambientes
    bedrooms: 'CFT2',
    bathrooms: 'CFT3',
} as const;

const CURRENCY_ALIASES: Record<string, Currency> = {
    $: 'ARS',
    ARS: 'ARS',
    AR$: 'ARS',
    USD: 'USD',
    U$S: 'USD',
    US$: 'USD',
    EUR: 'EUR',
    '€': 'EUR',
};

const numeric = z.union([z.number(), z.string()]).nullish();
const text = z.string().nullish();

const PriceSchema = z.object({ amount: numeric, currency: text });

const PostingSchema = z.object({
    postingId: numeric,
    id: numeric,
    url: text,
    title: text,
    description: text,
    descriptionNormalized: text,
    price: numeric,
    priceOperationTypes: z
        .array(
            z.object({
                operationType: z.object({ name: text }).nullish(),
                prices: z.array(PriceSchema).nullish(),
            }),
        )
        .nullish(),
    expenses: PriceSchema.nullish(),
    postingLocation: z
        .object({
            address: z.object({ name: text }).nullish(),
            postingGeolocation: z
                .object({ geolocation: z.object({ latitude: numeric, longitude: numeric }).nullish() })
                .nullish(),
        })
        .nullish(),
    mainFeatures: z.record(z.object({ value: z.unknown() })).nullish(),
    visiblePictures: z
        .object({ pictures: z.array(z.object({ url730x532: text, url360x266: text })).nullish() })
        .nullish(),
    publisher: z.object({ name: text }).nullish(),
    realEstateType: z.object({ name: text }).nullish(),
    modified_date: text,
});

export type ZonapropPosting = z.infer<typeof PostingSchema>;

const SearchResponseSchema = z.object({
    listPostings: z.array(z.unknown()),
    paging: z
        .object({
            currentPage: z.number().nullish(),
            totalPages: z.number().nullish(),
            total: z.number().nullish(),
            lastPage: z.boolean().nullish(),
            offset: z.number().nullish(),
            limit: z.number().nullish(),
        })
        .nullish(),
});

const toNumber = (value: string | number | null | undefined): number | null => {
    if (value == null || value === '') return null;
    const num = typeof value === 'number' ? value : Number(value);
    return Number.isFinite(num) ? num : null;
};

const firstNonEmptyId = (...candidates: (string | number | null | undefined)[]): string | null =>
    candidates.map((candidate) => (candidate == null ? '' : String(candidate).trim())).find(Boolean) ?? null;

export const parseCurrency = (value: string | null | undefined): Currency | null =>
    value ? (CURRENCY_ALIASES[value.trim().toUpperCase()] ?? null) : null;

export const inferOperationType = (name: string | null | undefined): OperationType =>
    name?.toLowerCase().includes(RENT_KEYWORD) ? 'rent' : 'sale';

/** Parses "2026-01-20T11:49:39-0500" (offset without colon) as well as plain ISO strings. */
export const parseSourceTimestamp = (value: string | null | undefined): string | null => {
    if (!value || !/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(value)) return null;
    const date = new Date(value.trim().replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
    return Number.isNaN(date.getTime()) ? null : date.toISOString();
};

const resolvePrice = (
    posting: ZonapropPosting,
    platformListingId: string,
): { price: number; currency: Currency } => {
    const listed = posting.priceOperationTypes?.[0]?.prices?.[0];
    const amount = toNumber(listed?.amount) ?? toNumber(posting.price);
    if (amount !== null && amount < 0) {
        throw new NormalizationError(`Negative price ${amount}`, platformListingId);
    }

    const rawCurrency = emptyToNull(listed?.currency);
    const currency = rawCurrency ? parseCurrency(rawCurrency) : DEFAULT_CURRENCY;
    if (!currency) {
        throw new NormalizationError(`Unsupported currency '${rawCurrency}'`, platformListingId);
    }

    return { price: amount ?? 0, currency };
};

const resolveCoordinates = (posting: ZonapropPosting): { geoLat: number | null; geoLng: number | null } => {
    const geolocation = posting.postingLocation?.postingGeolocation?.geolocation;
    const lat = toNumber(geolocation?.latitude);
    const lng = toNumber(geolocation?.longitude);
    const valid = lat !== null && lng !== null && Math.abs(lat) <= 90 && Math.abs(lng) <= 180;

    return valid ? { geoLat: lat, geoLng: lng } : { geoLat: null, geoLng: null };
};

export const collectImages = (posting: ZonapropPosting): string[] =>
    (posting.visiblePictures?.pictures ?? [])
        .map((picture) => emptyToNull(picture.url730x532) ?? emptyToNull(picture.url360x266))
        .filter((url): url is string => url !== null);

/** Maps one raw `listPostings` entry onto a UnifiedListing. Throws NormalizationError. */
export const normalizePosting = (raw: unknown, now: Date = new Date()): UnifiedListing => {
    const parsed = PostingSchema.safeParse(raw);
    if (!parsed.success) {
        const [issue] = parsed.error.issues;
        throw new NormalizationError(`Unexpected posting shape at ${issue.path.join('.')}: ${issue.message}`);
    }
    const posting = parsed.data;

    const platformListingId = firstNonEmptyId(posting.postingId, posting.id);
    if (!platformListingId) {
        throw new NormalizationError('Posting has no identifier');
    }

    const { price, currency } = resolvePrice(posting, platformListingId);
    const expenses = parseNonNegativeNumber(toNumber(posting.expenses?.amount));
    const hasExpenses = expenses !== null && expenses > 0;
    const features = posting.mainFeatures ?? {};
    const feature = (code: string): unknown => features[code]?.value;
    const nowIso = now.toISOString();

    return createListing({
        platform: SOURCE,
        platformListingId,
        listingUrl: resolveUrl(posting.url, BASE_URL),
        operationType: inferOperationType(posting.priceOperationTypes?.[0]?.operationType?.name),
        propertyType: emptyToNull(posting.realEstateType?.name) ?? 'unknown',
        status: 'active',
        price,
        currency,
        expenses: hasExpenses ? expenses : null,
        expensesCurrency: hasExpenses ? parseCurrency(posting.expenses?.currency) : null,
        addressText: emptyToNull(posting.postingLocation?.address?.name),
        ...resolveCoordinates(posting),
        surfaceTotal: parseNonNegativeNumber(feature(FEATURE.surfaceTotal)),
        surfaceCovered: parseNonNegativeNumber(feature(FEATURE.surfaceCovered)),
        rooms: parseCount(feature(FEATURE.rooms)),
        bedrooms: parseCount(feature(FEATURE.bedrooms)),
        bathrooms: parseCount(feature(FEATURE.bathrooms)),
        title: emptyToNull(posting.title),
        description: emptyToNull(posting.descriptionNormalized) ?? emptyToNull(posting.description),
        images: collectImages(posting),
        agentPublisher: emptyToNull(posting.publisher?.name),
        // Upstream exposes no creation date
        sourceCreatedAt: nowIso,
        sourceUpdatedAt: parseSourceTimestamp(posting.modified_date) ?? nowIso,
    });
};

export const buildSearchPayload = (request: PageRequest, propertyTypeCode: string): Record<string, unknown> => ({
    q: null,
    moneda: '',
    tipoDePropiedad: propertyTypeCode,
    tipoDeOperacion: request.operation.code,
    preTipoDeOperacion: request.operation.code,
    habitacionesminimo: 0,
    habitacionesmaximo: 0,
    ambientesminimo: 0,
    ambientesmaximo: 0,
    superficieCubierta: 1,
    idunidaddemedida: 1,
    tipoAnunciante: 'ALL',
    sort: 'relevance',
    province: request.zone.provinceCode,
    zone: request.zone.zoneCode,
    page: request.page,
    offset: request.offset,
    limit: request.limit,
});

export const parseSearchResponse = (body: unknown, request: PageRequest): PageResponse => {
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new TransportError('Invalid response format: listPostings missing');
    }
    const { listPostings, paging } = parsed.data;
    // No paging block means there is nothing more to ask for
    const lastPage = paging?.lastPage ?? true;

    return {
        items: listPostings,
        paging: {
            currentPage: paging?.currentPage ?? request.page,
            totalPages: paging?.totalPages ?? null,
            total: paging?.total ?? null,
            lastPage,
            nextOffset: lastPage ? null : (paging?.offset ?? request.offset) + (paging?.limit ?? request.limit),
        },
    };
};

const statusCodeOf = (error: unknown): number | null => {
    if (typeof error !== 'object' || error === null || !('response' in error)) return null;
    const { response } = error;
    if (typeof response !== 'object' || response === null || !('statusCode' in response)) return null;
    return typeof response.statusCode === 'number' ? response.statusCode : null;
};

export interface ZonapropFetcherOptions {
    propertyTypeCode: string;
    requestTimeoutSecs?: number;
    proxyConfiguration?: ProxyConfiguration;
}

export const createZonapropFetcher =
    ({
        propertyTypeCode,
        requestTimeoutSecs = REQUEST_TIMEOUT_SECS,
        proxyConfiguration,
    }: ZonapropFetcherOptions): PageFetcher =>
    async (request) => {
        const proxyUrl = await proxyConfiguration?.newUrl();
        let body: unknown;
        try {
            ({ body } = (await gotScraping({
                url: SEARCH_API,
                method: 'POST',
                json: buildSearchPayload(request, propertyTypeCode),
                headers: { ...FETCH_HEADERS, Origin: BASE_URL, Referer: `${BASE_URL}/` },
                responseType: 'json',
                timeout: { request: requestTimeoutSecs * 1000 },
                proxyUrl,
            })) as { body: unknown });
        } catch (error) {
            throw new TransportError(`Search request failed: ${errorMessage(error)}`, statusCodeOf(error), {
                cause: error,
            });
        }
        return parseSearchResponse(body, request);
    };

export interface ZonapropConnectorOptions extends Partial<ZonapropFetcherOptions> {
    pageSize?: number;
    pageDelayMs?: number;
    fetchPage?: PageFetcher;
    now?: () => Date;
}

export const createZonapropConnector = (options: ZonapropConnectorOptions = {}): Connector =>
    createConnector({
        platform: SOURCE,
        maxPageSize: MAX_PAGE_SIZE,
        pageSize: options.pageSize,
        pageDelayMs: options.pageDelayMs,
        fetchPage:
            options.fetchPage ??
            createZonapropFetcher({
                propertyTypeCode: options.propertyTypeCode ?? '2',
                requestTimeoutSecs: options.requestTimeoutSecs,
                proxyConfiguration: options.proxyConfiguration,
            }),
        normalize: (raw) => normalizePosting(raw, options.now?.()),
    });
