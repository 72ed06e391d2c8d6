import { Actor, log } from 'apify';

import { lookupOperation, lookupPropertyType, lookupZone } from './catalog.js';
import { createPlatformConnector } from './connectors/index.js';
import { LISTINGS_STORE_NAME, RUNS_STORE_NAME } from './constants.js';
import { FatalIngestionError } from './errors.js';
import { parseInput, type Input } from './input.js';
import { runIngestion } from './orchestrator.js';
import { createKeyValueStoreBackend } from './sinks/key-value-store.js';
import { createMongoBackend } from './sinks/mongo.js';
import { createSink, type ListingSink, type SinkBackend } from './sinks/sink.js';
import { warnInvalidKeys } from './utils.js';

const openBackend = async (input: Input): Promise<SinkBackend> => {
    if (input.storage === 'mongodb' && input.mongoUri) {
        return createMongoBackend({ uri: input.mongoUri, dbName: input.mongoDatabase });
    }
    const [listings, runs] = await Promise.all([
        Actor.openKeyValueStore(LISTINGS_STORE_NAME),
        Actor.openKeyValueStore(RUNS_STORE_NAME),
    ]);
    return createKeyValueStoreBackend(listings, runs);
};

await Actor.init();

const controller = new AbortController();
const interrupt = (reason: string) => (): void => {
    if (controller.signal.aborted) return;
    log.warning(`${reason}: finishing the current page, then stopping`);
    controller.abort();
};

Actor.on('aborting', interrupt('Run is aborting'));
process.once('SIGINT', interrupt('Interrupted by operator'));

const input = parseInput(await Actor.getInput());
if (input.debug) log.setLevel(log.LEVELS.DEBUG);

log.info('Starting real-estate ingestion', {
    platform: input.platform,
    zones: input.zones,
    operations: input.operations,
    propertyType: input.propertyType,
    maxPages: input.maxPages,
    persist: input.persist,
    storage: input.persist ? input.storage : 'none',
});

warnInvalidKeys(input.zones, (key) => lookupZone(key) !== undefined, 'zones', '[input]');
warnInvalidKeys(input.operations, (key) => lookupOperation(key) !== undefined, 'operations', '[input]');

const proxyConfiguration = input.proxyConfiguration
    ? await Actor.createProxyConfiguration(input.proxyConfiguration)
    : undefined;

const connector = createPlatformConnector(input.platform, {
    propertyTypeCode: lookupPropertyType(input.propertyType)?.code,
    pageDelayMs: input.pageDelayMs,
    requestTimeoutSecs: input.requestTimeoutSecs,
    proxyConfiguration,
});

const sink: ListingSink | undefined = input.persist
    ? createSink(await openBackend(input), { batchSize: input.batchSize })
    : undefined;

try {
    const stats = await runIngestion(
        {
            zones: input.zones,
            operations: input.operations,
            maxPagesPerCombination: input.maxPages,
            persist: input.persist,
        },
        { connector, sink, signal: controller.signal, combinationDelayMs: input.combinationDelayMs },
    );
    await Actor.setValue('OUTPUT', stats);
    log.info(`Done. Ingested ${stats.totalListings} listings with ${stats.errors} errors.`);
} catch (error) {
    if (error instanceof FatalIngestionError) {
        await Actor.setValue('OUTPUT', error.statistics);
        await Actor.fail(error.message);
    }
    throw error;
} finally {
    await sink?.close();
}

await Actor.exit();
