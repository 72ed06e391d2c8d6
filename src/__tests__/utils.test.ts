import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
    calcListingsPerMinute,
    emptyToNull,
    parseCount,
    parseNonNegativeNumber,
    resolveUrl,
    sleep,
    uniqueKeys,
    warnInvalidKeys,
} from '../utils.js';

describe('parseNonNegativeNumber', () => {
    it('should return a number given a number', () => {
        expect(parseNonNegativeNumber(288)).toBe(288);
    });

    it('should parse integer and decimal strings', () => {
        expect(parseNonNegativeNumber('100')).toBe(100);
        expect(parseNonNegativeNumber(' 45.5 ')).toBe(45.5);
    });

    it('should return null for negative values', () => {
        expect(parseNonNegativeNumber(-3)).toBeNull();
        expect(parseNonNegativeNumber('-3')).toBeNull();
    });

    it('should return null for strings with units', () => {
        expect(parseNonNegativeNumber('288 m²')).toBeNull();
    });

    it('should return null for undefined and non-numeric values', () => {
        expect(parseNonNegativeNumber(undefined)).toBeNull();
        expect(parseNonNegativeNumber('consultar')).toBeNull();
        expect(parseNonNegativeNumber(Number.NaN)).toBeNull();
    });
});

describe('parseCount', () => {
    it('should floor decimal counts', () => {
        expect(parseCount('2.7')).toBe(2);
    });

    it('should keep zero', () => {
        expect(parseCount('0')).toBe(0);
    });

    it('should return null when the value is not a number', () => {
        expect(parseCount('tres')).toBeNull();
    });
});

describe('emptyToNull', () => {
    it('should trim and keep non-empty strings', () => {
        expect(emptyToNull('  Palermo ')).toBe('Palermo');
    });

    it('should turn blank, null and undefined into null', () => {
        expect(emptyToNull('   ')).toBeNull();
        expect(emptyToNull(null)).toBeNull();
        expect(emptyToNull(undefined)).toBeNull();
    });
});

describe('resolveUrl', () => {
    const base = 'https://www.example.com.ar';

    it('should keep absolute urls', () => {
        expect(resolveUrl('https://other.example/x', base)).toBe('https://other.example/x');
    });

    it('should prefix root-relative paths with the base url', () => {
        expect(resolveUrl('/propiedades/casa-1.html', base)).toBe('https://www.example.com.ar/propiedades/casa-1.html');
    });

    it('should insert a slash for bare relative paths', () => {
        expect(resolveUrl('casa-1.html', base)).toBe('https://www.example.com.ar/casa-1.html');
    });

    it('should return null for missing urls', () => {
        expect(resolveUrl('', base)).toBeNull();
        expect(resolveUrl(null, base)).toBeNull();
    });
});

describe('calcListingsPerMinute', () => {
    it('should compute and round throughput', () => {
        expect(calcListingsPerMinute(100, 120_000)).toBe(50);
        expect(calcListingsPerMinute(10, 90_000)).toBe(6.67);
    });

    it('should return 0 when no time has passed', () => {
        expect(calcListingsPerMinute(10, 0)).toBe(0);
    });
});

describe('uniqueKeys', () => {
    it('should trim, drop blanks and deduplicate while keeping order', () => {
        expect(uniqueKeys(['rent', ' sale ', '', 'rent'])).toEqual(['rent', 'sale']);
    });
});

describe('sleep', () => {
    it('should resolve immediately when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const started = Date.now();

        await sleep(10_000, controller.signal);

        expect(Date.now() - started).toBeLessThan(1000);
    });

    it('should resolve early when aborted while waiting', async () => {
        const controller = new AbortController();
        const started = Date.now();
        setTimeout(() => controller.abort(), 10);

        await expect(sleep(10_000, controller.signal)).resolves.toBeUndefined();
        expect(Date.now() - started).toBeLessThan(5000);
    });
});

describe('warnInvalidKeys', () => {
    beforeEach(() => {
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const isKnown = (key: string) => ['capital_federal', 'cordoba'].includes(key);

    it('should not warn when all keys are valid', () => {
        expect(warnInvalidKeys(['capital_federal', 'cordoba'], isKnown, 'zones', '[test]')).toEqual([]);

        expect(log.warning).not.toHaveBeenCalled();
    });

    it('should not warn when the list is empty', () => {
        warnInvalidKeys([], isKnown, 'zones', '[test]');

        expect(log.warning).not.toHaveBeenCalled();
    });

    it('should list all invalid keys in one warning', () => {
        expect(warnInvalidKeys(['bad1', 'cordoba', 'bad2'], isKnown, 'zones', '[test]')).toEqual(['bad1', 'bad2']);

        expect(log.warning).toHaveBeenCalledWith('[test] Ignoring unrecognised zones: bad1, bad2');
    });
});
