import { ConfigurationError } from '../errors.js';
import { PLATFORMS } from '../types.js';
import type { Platform, UnifiedListing } from '../types.js';
import type { Connector } from './connector.js';
import { createZonapropConnector, normalizePosting, type ZonapropConnectorOptions } from './zonaprop.js';

export type PlatformNormalizer = (rawItem: unknown, now?: Date) => UnifiedListing;
export type ConnectorFactory = (options: ZonapropConnectorOptions) => Connector;

// Payload shapes differ per platform; only platforms with an observed payload get an adapter.
const NORMALIZERS: Record<Platform, PlatformNormalizer | null> = {
    zonaprop: normalizePosting,
    mercadolibre: null,
    properati: null,
    argenprop: null,
};

const CONNECTORS: Record<Platform, ConnectorFactory | null> = {
    zonaprop: createZonapropConnector,
    mercadolibre: null,
    properati: null,
    argenprop: null,
};

export const supportedPlatforms = (): Platform[] =>
    PLATFORMS.filter((platform) => CONNECTORS[platform] !== null);

export const normalize = (rawItem: unknown, platform: Platform, now?: Date): UnifiedListing => {
    const normalizer = NORMALIZERS[platform];
    if (!normalizer) throw new ConfigurationError(`No normalizer for platform '${platform}'`);
    return normalizer(rawItem, now);
};

export const createPlatformConnector = (platform: Platform, options: ZonapropConnectorOptions = {}): Connector => {
    const factory = CONNECTORS[platform];
    if (!factory) {
        throw new ConfigurationError(
            `No connector for platform '${platform}' (supported: ${supportedPlatforms().join(', ')})`,
        );
    }
    return factory(options);
};

