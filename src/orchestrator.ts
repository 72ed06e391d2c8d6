import { log } from 'apify';

import { lookupOperation, lookupZone, operationKeys, zoneKeys } from './catalog.js';
import { COMBINATION_DELAY_MS, PROGRESS_LOG_EVERY } from './constants.js';
import type { Connector } from './connectors/connector.js';
import { ConfigurationError, errorMessage, FatalIngestionError, type IngestionError } from './errors.js';
import type { ListingSink } from './sinks/sink.js';
import type { IngestionRun, RunStatistics } from './types.js';
import { calcListingsPerMinute, sleep, uniqueKeys } from './utils.js';

export interface RunOptions {
    /** Empty or omitted: every zone in the catalog. */
    zones?: readonly string[];
    /** Empty or omitted: every operation in the catalog. */
    operations?: readonly string[];
    maxPagesPerCombination?: number | null;
    persist?: boolean;
}

export interface RunDependencies {
    connector: Connector;
    /** Required when `persist` is true. */
    sink?: ListingSink;
    signal?: AbortSignal;
    combinationDelayMs?: number;
    now?: () => Date;
}

interface Combination {
    zoneKey: string;
    operationKey: string;
}

export const buildCombinations = (zones: readonly string[], operations: readonly string[]): Combination[] =>
    zones.flatMap((zoneKey) => operations.map((operationKey) => ({ zoneKey, operationKey })));

/** Validates a combination's keys against the catalog before any request is issued. */
const unknownKeyError = ({ zoneKey, operationKey }: Combination): ConfigurationError | null => {
    if (!lookupZone(zoneKey)) return new ConfigurationError(`Zone '${zoneKey}' not found in catalog`);
    if (!lookupOperation(operationKey)) {
        return new ConfigurationError(`Operation '${operationKey}' not found in catalog`);
    }
    return null;
};

export const logSummary = (stats: RunStatistics): void => {
    log.info('Ingestion summary', {
        totalListings: stats.totalListings,
        combinationsAttempted: stats.combinationsAttempted,
        combinationsCompleted: stats.combinationsCompleted,
        errors: stats.errors,
        listingsNew: stats.listingsNew,
        listingsUpdated: stats.listingsUpdated,
        durationMinutes: Math.round((stats.durationMs / 60_000) * 100) / 100,
        listingsPerMinute: stats.listingsPerMinute,
        interrupted: stats.interrupted,
    });
};

/**
 * Drives every selected zone × operation combination through the connector, one at
 * a time, and optionally hands each listing to the sink. Per-item and per-combination
 * failures are counted and the run goes on; anything else ends the run with a
 * FatalIngestionError carrying the statistics gathered so far.
 */
export const runIngestion = async (options: RunOptions, deps: RunDependencies): Promise<RunStatistics> => {
    const { connector, sink, signal, combinationDelayMs = COMBINATION_DELAY_MS, now = () => new Date() } = deps;
    const persist = options.persist ?? true;
    const logPrefix = `[${connector.platform}]`;

    if (persist && !sink) {
        throw new Error('A sink is required when persist is enabled');
    }
    const activeSink = persist && sink ? sink : null;

    const zones = options.zones?.length ? uniqueKeys(options.zones) : zoneKeys();
    const operations = options.operations?.length ? uniqueKeys(options.operations) : operationKeys();
    const combinations = buildCombinations(zones, operations);
    if (combinations.length === 0) {
        throw new Error('Catalog has no zone/operation combinations to run');
    }

    const startedAt = now();
    let totalListings = 0;
    let combinationsAttempted = 0;
    let combinationsCompleted = 0;
    let fetchErrors = 0;

    // `run` is the finalized ingestion run, whose error count already includes fetchErrors
    const statistics = (run: IngestionRun | null): RunStatistics => {
        const finishedAt = now();
        const durationMs = finishedAt.getTime() - startedAt.getTime();
        return {
            totalListings,
            combinationsAttempted,
            combinationsCompleted,
            errors: run ? run.errors : fetchErrors,
            listingsNew: run?.listingsNew ?? 0,
            listingsUpdated: run?.listingsUpdated ?? 0,
            startedAt: startedAt.toISOString(),
            finishedAt: finishedAt.toISOString(),
            durationMs,
            listingsPerMinute: calcListingsPerMinute(totalListings, durationMs),
            interrupted: signal?.aborted ?? false,
        };
    };

    log.info(`${logPrefix} Starting ingestion of ${combinations.length} combinations`, {
        zones,
        operations,
        maxPagesPerCombination: options.maxPagesPerCombination ?? 'unlimited',
        persist,
    });

    if (activeSink) await activeSink.startRun(connector.platform);

    try {
        for (const [index, combination] of combinations.entries()) {
            if (signal?.aborted) {
                const remaining = combinations.length - index;
                log.warning(`${logPrefix} Interrupted, skipping the remaining ${remaining} combinations`);
                break;
            }
            if (index > 0) {
                await sleep(combinationDelayMs, signal);
                if (signal?.aborted) continue;
            }

            const { zoneKey, operationKey } = combination;
            const label = `[${index + 1}/${combinations.length}] ${zoneKey}/${operationKey}`;
            combinationsAttempted += 1;

            const configError = unknownKeyError(combination);
            if (configError) {
                log.warning(`${logPrefix} ${label} skipped: ${configError.message}`);
                fetchErrors += 1;
                continue;
            }

            let combinationFailed = false;
            let combinationListings = 0;
            const onError = (error: IngestionError): void => {
                fetchErrors += 1;
                if (error.kind === 'transport' || error.kind === 'configuration') combinationFailed = true;
            };

            log.info(`${logPrefix} ${label} processing`);
            for await (const listing of connector.fetch(zoneKey, operationKey, {
                maxPages: options.maxPagesPerCombination,
                signal,
                onError,
            })) {
                if (activeSink) await activeSink.upsert(listing);
                combinationListings += 1;
                totalListings += 1;
                if (combinationListings % PROGRESS_LOG_EVERY === 0) {
                    log.info(`${logPrefix} ${label} processed ${combinationListings} listings`);
                }
            }

            if (!combinationFailed && !signal?.aborted) combinationsCompleted += 1;
            log.info(`${logPrefix} ${label} finished with ${combinationListings} listings`);
        }
    } catch (error) {
        let failedRun: IngestionRun | null = null;
        if (activeSink) {
            try {
                failedRun = await activeSink.finishRun('failed', { fetchErrors });
            } catch (finishError) {
                log.error(`${logPrefix} Could not finalize the ingestion run: ${errorMessage(finishError)}`);
            }
        }
        const stats = statistics(failedRun);
        logSummary(stats);
        throw new FatalIngestionError(`Ingestion aborted: ${errorMessage(error)}`, stats, { cause: error });
    }

    // Interrupted runs are recorded as failed
    const finalRun = activeSink
        ? await activeSink.finishRun(signal?.aborted ? 'failed' : 'completed', { fetchErrors })
        : null;
    const stats = statistics(finalRun);
    logSummary(stats);
    return stats;
};
