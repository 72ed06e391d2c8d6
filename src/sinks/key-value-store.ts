import { createHash } from 'node:crypto';

import { NATURAL_KEY_SEPARATOR } from '../constants.js';
import type { IngestionRun } from '../types.js';
import type { SinkBackend } from './sink.js';

/** The slice of an Apify KeyValueStore this backend uses. */
export interface RecordStore {
    getValue(key: string): Promise<unknown>;
    setValue(key: string, value: unknown): Promise<void>;
}

// Key-value store keys are limited to this alphabet and length
const STORE_KEY_PATTERN = /^[a-zA-Z0-9!\-_.'()]{1,256}$/;

/**
 * `zonaprop:123` → `zonaprop.123`. Natural keys outside the store's key alphabet
 * are hashed instead; the `h-` prefix keeps them apart from platform-prefixed keys.
 */
export const storeKeyFor = (naturalKey: string): string => {
    const candidate = naturalKey.replace(NATURAL_KEY_SEPARATOR, '.');
    return STORE_KEY_PATTERN.test(candidate)
        ? candidate
        : `h-${createHash('sha256').update(naturalKey).digest('hex')}`;
};

export const runKeyFor = (runId: string): string => `run-${runId}`;

export const createKeyValueStoreBackend = (listings: RecordStore, runs: RecordStore): SinkBackend => ({
    name: 'key-value-store',

    async writeOne(record) {
        const key = storeKeyFor(record.naturalKey);
        const existing = await listings.getValue(key);
        await listings.setValue(key, record);
        return existing == null ? 'inserted' : 'updated';
    },

    async saveRun(run: IngestionRun) {
        await runs.setValue(runKeyFor(run.runId), run);
    },

    async close() {
        // Stores are managed by the Actor and persisted on exit
    },
});
