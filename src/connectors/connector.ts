import { log } from 'apify';

import { lookupOperation, lookupZone } from '../catalog.js';
import { PAGE_DELAY_MS } from '../constants.js';
import { ConfigurationError, errorMessage, NormalizationError, TransportError } from '../errors.js';
import type { IngestionError } from '../errors.js';
import type { OperationConfig, Platform, UnifiedListing, ZoneConfig } from '../types.js';
import { sleep } from '../utils.js';

export interface PagingInfo {
    currentPage: number;
    totalPages: number | null;
    total: number | null;
    lastPage: boolean;
    nextOffset: number | null;
}

export interface PageRequest {
    zone: Readonly<ZoneConfig>;
    operation: Readonly<OperationConfig>;
    page: number; // 1-indexed
    offset: number;
    limit: number;
}

export interface PageResponse {
    items: unknown[];
    paging: PagingInfo;
}

/** Performs one upstream request. Any thrown error ends pagination for the combination. */
export type PageFetcher = (request: PageRequest) => Promise<PageResponse>;

export type ItemNormalizer = (rawItem: unknown) => UnifiedListing;

export interface PaginationState {
    zoneKey: string | null;
    operationKey: string | null;
    currentPage: number;
    pagesFetched: number;
    pageSize: number;
    paging: PagingInfo | null;
}

export interface FetchOptions {
    maxPages?: number | null;
    signal?: AbortSignal;
    onError?: (error: IngestionError) => void;
}

export interface Connector {
    readonly platform: Platform;
    readonly state: Readonly<PaginationState>;
    fetch(zoneKey: string, operationKey: string, options?: FetchOptions): AsyncGenerator<UnifiedListing, void>;
}

export interface ConnectorOptions {
    platform: Platform;
    /** Provider ceiling; a larger `pageSize` is clamped to it. */
    maxPageSize: number;
    pageSize?: number;
    pageDelayMs?: number;
    fetchPage: PageFetcher;
    normalize: ItemNormalizer;
}

const asNormalizationError = (error: unknown): NormalizationError =>
    error instanceof NormalizationError
        ? error
        : new NormalizationError(`Unexpected payload shape: ${errorMessage(error)}`, null, { cause: error });

const asTransportError = (error: unknown): TransportError =>
    error instanceof TransportError ? error : new TransportError(errorMessage(error), null, { cause: error });

/**
 * Builds a connector around a platform's page fetcher and item normalizer.
 * Walks one (zone, operation) result set page by page and yields listings lazily.
 */
export const createConnector = (options: ConnectorOptions): Connector => {
    const { platform, maxPageSize, fetchPage, normalize } = options;
    const pageSize = Math.min(options.pageSize ?? maxPageSize, maxPageSize);
    const pageDelayMs = options.pageDelayMs ?? PAGE_DELAY_MS;
    const logPrefix = `[${platform}]`;

    const state: PaginationState = {
        zoneKey: null,
        operationKey: null,
        currentPage: 1,
        pagesFetched: 0,
        pageSize,
        paging: null,
    };

    async function* fetchListings(
        zoneKey: string,
        operationKey: string,
        { maxPages = null, signal, onError }: FetchOptions = {},
    ): AsyncGenerator<UnifiedListing, void> {
        const report = (error: IngestionError): void => onError?.(error);

        Object.assign(state, { zoneKey, operationKey, currentPage: 1, pagesFetched: 0, paging: null });

        const zone = lookupZone(zoneKey);
        const operation = lookupOperation(operationKey);
        if (!zone || !operation) {
            const error = new ConfigurationError(
                !zone ? `Zone '${zoneKey}' not found in catalog` : `Operation '${operationKey}' not found in catalog`,
            );
            log.warning(`${logPrefix} ${error.message}`);
            report(error);
            return;
        }

        log.info(`${logPrefix} Starting ${zone.displayName} - ${operation.displayName}`);

        while (true) {
            if (signal?.aborted) {
                log.info(`${logPrefix} Interrupted before page ${state.currentPage}`);
                break;
            }
            if (maxPages != null && state.pagesFetched >= maxPages) break;

            const page = state.currentPage;
            log.debug(`${logPrefix} Fetching page ${page} (${zone.key}/${operation.key})`);

            let response: PageResponse;
            try {
                response = await fetchPage({ zone, operation, page, offset: (page - 1) * pageSize, limit: pageSize });
            } catch (err) {
                const error = asTransportError(err);
                log.error(`${logPrefix} Page ${page} failed, stopping ${zone.key}/${operation.key}: ${error.message}`, {
                    statusCode: error.statusCode,
                });
                report(error);
                break;
            }

            state.pagesFetched += 1;
            state.paging = response.paging;

            if (page === 1 && response.paging.total !== null) {
                log.info(`${logPrefix} Total available: ${response.paging.total} (${zone.key}/${operation.key})`);
            }

            if (response.items.length === 0) {
                log.info(`${logPrefix} No items on page ${page} (${zone.key}/${operation.key})`);
                break;
            }

            for (const rawItem of response.items) {
                let listing: UnifiedListing;
                try {
                    listing = normalize(rawItem);
                } catch (err) {
                    const error = asNormalizationError(err);
                    log.warning(`${logPrefix} Skipping item on page ${page}: ${error.message}`, {
                        platformListingId: error.platformListingId,
                    });
                    report(error);
                    continue;
                }
                yield listing;
            }

            if (response.paging.lastPage) {
                log.info(`${logPrefix} Reached last page (${page})`);
                break;
            }

            state.currentPage = page + 1;
            await sleep(pageDelayMs, signal);
        }
    }

    return {
        platform,
        state,
        fetch: fetchListings,
    };
};
