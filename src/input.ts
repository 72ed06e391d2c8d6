import { z } from 'zod';

import { lookupPropertyType, propertyTypeKeys } from './catalog.js';
import { INPUT_DEFAULTS } from './constants.js';
import { PLATFORMS, STORAGE_BACKENDS } from './types.js';

const ProxySchema = z.object({
    useApifyProxy: z.boolean().optional(),
    apifyProxyGroups: z.array(z.string()).optional(),
    apifyProxyCountry: z.string().optional(),
    proxyUrls: z.array(z.string()).optional(),
});

export const InputSchema = z.object({
    platform: z.enum(PLATFORMS).default(INPUT_DEFAULTS.platform),
    zones: z.array(z.string()).default([]),
    operations: z.array(z.string()).default([]),
    propertyType: z
        .string()
        .refine((key) => lookupPropertyType(key) !== undefined, {
            message: `Expected one of: ${propertyTypeKeys().join(', ')}`,
        })
        .default(INPUT_DEFAULTS.propertyType),
    maxPages: z.number().int().positive().nullable().default(INPUT_DEFAULTS.maxPages), // null = all pages
    persist: z.boolean().default(INPUT_DEFAULTS.persist),
    storage: z.enum(STORAGE_BACKENDS).default(INPUT_DEFAULTS.storage),
    mongoUri: z.string().min(1).optional(), // falls back to MONGODB_URI
    mongoDatabase: z.string().min(1).default(INPUT_DEFAULTS.mongoDatabase),
    batchSize: z.number().int().positive().default(INPUT_DEFAULTS.batchSize),
    pageDelayMs: z.number().int().nonnegative().default(INPUT_DEFAULTS.pageDelayMs),
    combinationDelayMs: z.number().int().nonnegative().default(INPUT_DEFAULTS.combinationDelayMs),
    requestTimeoutSecs: z.number().positive().default(INPUT_DEFAULTS.requestTimeoutSecs),
    proxyConfiguration: ProxySchema.optional(),
    debug: z.boolean().default(INPUT_DEFAULTS.debug),
});

export type Input = z.infer<typeof InputSchema>;

/**
 * Applies defaults and rejects malformed values. A missing input (local run without
 * INPUT.json) yields the defaults.
 */
export const parseInput = (raw: unknown, env: NodeJS.ProcessEnv = process.env): Input => {
    const result = InputSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
        throw new Error(`Invalid input: ${issues.join('; ')}`);
    }
    const input = result.data;
    if (input.persist && input.storage === 'mongodb' && !input.mongoUri) {
        const mongoUri = env.MONGODB_URI;
        if (!mongoUri) throw new Error('Invalid input: mongoUri or MONGODB_URI is required for mongodb storage');
        return { ...input, mongoUri };
    }
    return input;
};
