import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';

/** Drops blanks and duplicates while keeping the caller's order. */
export const uniqueKeys = (keys: readonly string[]): string[] => [
    ...new Set(keys.map((key) => key.trim()).filter((key) => key.length > 0)),
];

export const warnInvalidKeys = (
    keys: readonly string[],
    isKnown: (key: string) => boolean,
    label: string,
    logPrefix: string,
): string[] => {
    const invalid = uniqueKeys(keys).filter((key) => !isKnown(key));
    if (invalid.length > 0) {
        log.warning(`${logPrefix} Ignoring unrecognised ${label}: ${invalid.join(', ')}`);
    }
    return invalid;
};

/**
 * Accepts numbers and plain numeric strings ("120", "45.5"); anything else, including
 * negatives and strings with units, is treated as absent.
 */
export const parseNonNegativeNumber = (value: unknown): number | null => {
    if (typeof value === 'number') return Number.isFinite(value) && value >= 0 ? value : null;
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    if (!/^\d+(\.\d+)?$/.test(trimmed)) return null;
    return Number.parseFloat(trimmed);
};

export const parseCount = (value: unknown): number | null => {
    const num = parseNonNegativeNumber(value);
    return num === null ? null : Math.floor(num);
};

export const emptyToNull = (value: string | null | undefined): string | null => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
};

export const resolveUrl = (rawUrl: string | null | undefined, baseUrl: string): string | null => {
    const url = emptyToNull(rawUrl);
    if (!url) return null;
    if (/^https?:\/\//i.test(url)) return url;
    return url.startsWith('/') ? `${baseUrl}${url}` : `${baseUrl}/${url}`;
};

export const calcListingsPerMinute = (listings: number, durationMs: number): number =>
    durationMs > 0 ? Math.round((listings / (durationMs / 60_000)) * 100) / 100 : 0;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects on abort. */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (ms <= 0 || signal?.aborted) return;
    try {
        await setTimeout(ms, undefined, { signal });
    } catch (error) {
        if (!signal?.aborted) throw error;
    }
};
