import { randomUUID } from 'node:crypto';

import { log } from 'apify';

import { BATCH_SIZE } from '../constants.js';
import { errorMessage, PersistenceError } from '../errors.js';
import { listingKey, toStoredListing } from '../listing.js';
import type { IngestionRun, Platform, RunStatus, StoredListing, UnifiedListing } from '../types.js';

export type UpsertOutcome = 'inserted' | 'updated';

/** Per-record result of a batch write; `failed` records are retried one by one. */
export type BatchOutcome = UpsertOutcome | 'failed';

export type WriteResult = UpsertOutcome | PersistenceError;

/** Storage-specific half of a sink. Errors thrown here are contained by the sink. */
export interface SinkBackend {
    readonly name: string;
    /** Merge-by-natural-key write of a single record. */
    writeOne(record: StoredListing): Promise<UpsertOutcome>;
    /**
     * Optional bulk path; outcomes are returned in input order. Throws only when no
     * record was written, otherwise marks the records it could not write as `failed`.
     */
    writeBatch?(records: StoredListing[]): Promise<BatchOutcome[]>;
    saveRun(run: IngestionRun): Promise<void>;
    close(): Promise<void>;
}

export interface PendingWrite {
    readonly naturalKey: string;
    /** Settles once a flush writes the record: its outcome, or the PersistenceError that kept it out. */
    readonly result: Promise<WriteResult>;
}

export interface ListingSink {
    readonly name: string;
    readonly run: Readonly<IngestionRun> | null;
    startRun(platform: Platform): Promise<IngestionRun>;
    upsert(listing: UnifiedListing): Promise<PendingWrite>;
    flush(): Promise<void>;
    finishRun(status: RunStatus, totals?: { fetchErrors?: number }): Promise<IngestionRun>;
    close(): Promise<void>;
}

export interface SinkOptions {
    batchSize?: number;
    now?: () => Date;
}

interface Buffered {
    listing: UnifiedListing;
    // Every upsert of the key since the last flush waits on the one write
    settle: ((result: WriteResult) => void)[];
}

interface Write {
    record: StoredListing;
    settle: ((result: WriteResult) => void)[];
}

/**
 * Wraps a backend with run bookkeeping and write buffering. Buffered listings are
 * keyed by natural key, so a batch never holds two records for one listing, and
 * flushes run one after another so no record is ever written by two flushes at once.
 */
export const createSink = (
    backend: SinkBackend,
    { batchSize = BATCH_SIZE, now = () => new Date() }: SinkOptions = {},
): ListingSink => {
    const logPrefix = `[sink:${backend.name}]`;
    const pending = new Map<string, Buffered>();
    let queue: Promise<void> = Promise.resolve();
    let run: IngestionRun | null = null;

    const requireRun = (): IngestionRun => {
        if (!run) throw new Error(`${logPrefix} startRun() must be called before writing`);
        return run;
    };

    const saveRun = async (current: IngestionRun): Promise<void> => {
        try {
            await backend.saveRun({ ...current });
        } catch (error) {
            log.error(`${logPrefix} Could not save ingestion run ${current.runId}: ${errorMessage(error)}`);
        }
    };

    const writeOne = async (record: StoredListing): Promise<WriteResult> => {
        try {
            return await backend.writeOne(record);
        } catch (cause) {
            const error = new PersistenceError(`Write failed: ${errorMessage(cause)}`, record.naturalKey, { cause });
            log.error(`${logPrefix} ${error.message}`, { naturalKey: error.naturalKey });
            return error;
        }
    };

    const drain = async (): Promise<void> => {
        if (pending.size === 0) return;
        const current = requireRun();
        const writtenAt = now();
        const writes: Write[] = [...pending.values()].map(({ listing, settle }) => ({
            record: toStoredListing(listing, writtenAt),
            settle,
        }));
        pending.clear();

        const complete = ({ settle }: Write, result: WriteResult): void => {
            if (result instanceof PersistenceError) current.errors += 1;
            else if (result === 'inserted') current.listingsNew += 1;
            else current.listingsUpdated += 1;
            settle.forEach((resolve) => resolve(result));
        };

        let retry = writes;
        if (backend.writeBatch && writes.length > 1) {
            try {
                const outcomes = await backend.writeBatch(writes.map((write) => write.record));
                retry = writes.filter((write, index) => {
                    const outcome = outcomes[index];
                    if (outcome === undefined || outcome === 'failed') return true;
                    complete(write, outcome);
                    return false;
                });
                if (retry.length > 0) {
                    log.warning(`${logPrefix} ${retry.length} of ${writes.length} batch records failed, retrying them`);
                } else {
                    log.debug(`${logPrefix} Flushed ${writes.length} records`);
                }
            } catch (error) {
                log.warning(
                    `${logPrefix} Batch of ${writes.length} failed, retrying record by record: ${errorMessage(error)}`,
                );
            }
        }

        for (const write of retry) {
            complete(write, await writeOne(write.record));
        }
    };

    const flush = async (): Promise<void> => {
        queue = queue.then(drain);
        await queue;
    };

    return {
        name: backend.name,
        get run() {
            return run;
        },

        async startRun(platform) {
            run = {
                runId: randomUUID(),
                platform,
                status: 'started',
                listingsProcessed: 0,
                listingsNew: 0,
                listingsUpdated: 0,
                errors: 0,
                timestamp: now().toISOString(),
                finishedAt: null,
            };
            await saveRun(run);
            return { ...run };
        },

        async upsert(listing) {
            const current = requireRun();
            current.listingsProcessed += 1;
            const naturalKey = listingKey(listing);
            const settle = pending.get(naturalKey)?.settle ?? [];
            const result = new Promise<WriteResult>((resolve) => settle.push(resolve));
            // Re-inserting moves the key to the end: the later copy wins
            pending.delete(naturalKey);
            pending.set(naturalKey, { listing, settle });
            if (pending.size >= batchSize) await flush();
            return { naturalKey, result };
        },

        flush,

        async finishRun(status, { fetchErrors = 0 } = {}) {
            await flush();
            const current = requireRun();
            current.status = status;
            current.errors += fetchErrors;
            current.finishedAt = now().toISOString();
            await saveRun(current);
            log.info(`${logPrefix} Run ${current.runId} ${status}`, {
                processed: current.listingsProcessed,
                new: current.listingsNew,
                updated: current.listingsUpdated,
                errors: current.errors,
            });
            return { ...current };
        },

        async close() {
            await backend.close();
        },
    };
};
