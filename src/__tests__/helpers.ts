import { log } from 'apify';
import { vi } from 'vitest';

import type { PageResponse } from '../connectors/connector.js';
import type { RecordStore } from '../sinks/key-value-store.js';

export const silenceLogs = (): void => {
    vi.spyOn(log, 'debug').mockReturnValue(undefined);
    vi.spyOn(log, 'info').mockReturnValue(undefined);
    vi.spyOn(log, 'warning').mockReturnValue(undefined);
    vi.spyOn(log, 'error').mockReturnValue(undefined);
};

/** Minimal raw posting as returned in `listPostings`. */
export const rawPosting = (id: number | string, overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
    postingId: String(id),
    url: `/propiedades/casa-${id}.html`,
    title: `Casa ${id}`,
    priceOperationTypes: [{ operationType: { name: 'Venta' }, prices: [{ amount: 100_000, currency: 'USD' }] }],
    realEstateType: { name: 'Casa' },
    modified_date: '2026-01-20T11:49:39-0500',
    ...overrides,
});

export const pageOf = (items: unknown[], currentPage: number, lastPage: boolean): PageResponse => ({
    items,
    paging: { currentPage, totalPages: null, total: null, lastPage, nextOffset: null },
});

export class MemoryStore implements RecordStore {
    readonly entries = new Map<string, unknown>();

    async getValue(key: string): Promise<unknown> {
        return this.entries.get(key) ?? null;
    }

    async setValue(key: string, value: unknown): Promise<void> {
        if (value === null) this.entries.delete(key);
        else this.entries.set(key, value);
    }
}
