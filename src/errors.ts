import type { RunStatistics } from './types.js';

export type IngestionErrorKind = 'configuration' | 'transport' | 'normalization' | 'persistence';

/** Base class for failures the pipeline contains and counts instead of propagating. */
export abstract class IngestionError extends Error {
    abstract readonly kind: IngestionErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Unknown zone, operation, property type or platform. */
export class ConfigurationError extends IngestionError {
    readonly kind = 'configuration';
}

export class TransportError extends IngestionError {
    readonly kind = 'transport';

    constructor(
        message: string,
        readonly statusCode: number | null = null,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export class NormalizationError extends IngestionError {
    readonly kind = 'normalization';

    constructor(
        message: string,
        readonly platformListingId: string | null = null,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export class PersistenceError extends IngestionError {
    readonly kind = 'persistence';

    constructor(
        message: string,
        readonly naturalKey: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

/** Whole-run failure. Carries whatever statistics were gathered before it happened. */
export class FatalIngestionError extends Error {
    constructor(
        message: string,
        readonly statistics: RunStatistics,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'FatalIngestionError';
    }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
