import { describe, expect, it } from 'vitest';

import {
    lookupOperation,
    lookupPropertyType,
    lookupZone,
    operationKeys,
    propertyTypeKeys,
    zoneKeys,
} from '../catalog.js';

describe('lookupZone', () => {
    it('should return the provider codes for a known zone', () => {
        expect(lookupZone('capital_federal')).toEqual({
            key: 'capital_federal',
            displayName: 'Capital Federal',
            description: 'Ciudad Autónoma de Buenos Aires',
            provinceCode: '6',
            zoneCode: null,
        });
    });

    it('should return undefined for unknown keys and inherited properties', () => {
        expect(lookupZone('atlantis')).toBeUndefined();
        expect(lookupZone('toString')).toBeUndefined();
    });

    it('should hand out frozen entries', () => {
        expect(Object.isFrozen(lookupZone('cordoba'))).toBe(true);
    });
});

describe('lookupOperation', () => {
    it('should map sale and rent to their upstream codes', () => {
        expect(lookupOperation('sale')?.code).toBe('1');
        expect(lookupOperation('rent')?.code).toBe('2');
    });

    it('should return undefined for unknown operations', () => {
        expect(lookupOperation('lease')).toBeUndefined();
    });
});

describe('lookupPropertyType', () => {
    it('should map house to code 2 and all to an empty code', () => {
        expect(lookupPropertyType('house')?.code).toBe('2');
        expect(lookupPropertyType('all')?.code).toBe('');
    });
});

describe('enumeration', () => {
    it('should list every zone', () => {
        expect(zoneKeys()).toEqual([
            'capital_federal',
            'zona_norte_gba',
            'santa_fe',
            'cordoba',
            'mendoza',
            'entre_rios',
        ]);
    });

    it('should list every operation', () => {
        expect(operationKeys()).toEqual(['sale', 'rent']);
    });

    it('should list every property type', () => {
        expect(propertyTypeKeys()).toEqual(['apartment', 'house', 'land', 'commercial', 'all']);
    });
});
