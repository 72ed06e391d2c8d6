import type { OperationConfig, OperationType, PropertyTypeConfig, ZoneConfig } from './types.js';

const freezeAll = <T extends object>(table: Record<string, T>): Readonly<Record<string, Readonly<T>>> =>
    Object.freeze(Object.fromEntries(Object.entries(table).map(([key, value]) => [key, Object.freeze(value)])));

// Province codes are the ones the zonaprop search API expects in its `province` filter
const ZONES = freezeAll<ZoneConfig>({
    capital_federal: {
        key: 'capital_federal',
        displayName: 'Capital Federal',
        description: 'Ciudad Autónoma de Buenos Aires',
        provinceCode: '6',
        zoneCode: null,
    },
    zona_norte_gba: {
        key: 'zona_norte_gba',
        displayName: 'Zona Norte GBA',
        description: 'Zona Norte del Gran Buenos Aires',
        provinceCode: '990',
        zoneCode: null,
    },
    santa_fe: {
        key: 'santa_fe',
        displayName: 'Santa Fe',
        description: 'Provincia de Santa Fe',
        provinceCode: '25',
        zoneCode: null,
    },
    cordoba: {
        key: 'cordoba',
        displayName: 'Córdoba',
        description: 'Provincia de Córdoba',
        provinceCode: '7',
        zoneCode: null,
    },
    mendoza: {
        key: 'mendoza',
        displayName: 'Mendoza',
        description: 'Provincia de Mendoza',
        provinceCode: '17',
        zoneCode: null,
    },
    entre_rios: {
        key: 'entre_rios',
        displayName: 'Entre Ríos',
        description: 'Provincia de Entre Ríos',
        provinceCode: '12',
        zoneCode: null,
    },
});

const OPERATIONS: Readonly<Record<OperationType, Readonly<OperationConfig>>> = Object.freeze({
    sale: Object.freeze({ key: 'sale', displayName: 'Venta', code: '1' }),
    rent: Object.freeze({ key: 'rent', displayName: 'Alquiler', code: '2' }),
});

const PROPERTY_TYPES = freezeAll<PropertyTypeConfig>({
    apartment: { key: 'apartment', code: '1' },
    house: { key: 'house', code: '2' },
    land: { key: 'land', code: '3' },
    commercial: { key: 'commercial', code: '4' },
    all: { key: 'all', code: '' },
});

const has = (table: object, key: string): boolean => Object.prototype.hasOwnProperty.call(table, key);

export const lookupZone = (key: string): Readonly<ZoneConfig> | undefined => (has(ZONES, key) ? ZONES[key] : undefined);

export const lookupOperation = (key: string): Readonly<OperationConfig> | undefined =>
    Object.values(OPERATIONS).find((operation) => operation.key === key);

export const lookupPropertyType = (key: string): Readonly<PropertyTypeConfig> | undefined =>
    has(PROPERTY_TYPES, key) ? PROPERTY_TYPES[key] : undefined;

export const zoneKeys = (): string[] => Object.keys(ZONES);

export const operationKeys = (): OperationType[] => Object.values(OPERATIONS).map((operation) => operation.key);

export const propertyTypeKeys = (): string[] => Object.keys(PROPERTY_TYPES);
