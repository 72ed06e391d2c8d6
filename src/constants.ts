export const PAGE_DELAY_MS = 500;
export const COMBINATION_DELAY_MS = 2000;
export const REQUEST_TIMEOUT_SECS = 10;
export const BATCH_SIZE = 100;
export const PROGRESS_LOG_EVERY = 10;

export const NATURAL_KEY_SEPARATOR = ':';

export const LISTINGS_STORE_NAME = 'data-lake';
export const RUNS_STORE_NAME = 'ingestion-runs';

export const MONGO_DATABASE = 'RealStates';
export const MONGO_LISTINGS_COLLECTION = 'DataLake';
export const MONGO_RUNS_COLLECTION = 'ingestion_runs';

export const INPUT_DEFAULTS = {
    platform: 'zonaprop' as const,
    propertyType: 'house',
    maxPages: null,
    persist: true,
    storage: 'key-value-store' as const,
    mongoDatabase: MONGO_DATABASE,
    batchSize: BATCH_SIZE,
    pageDelayMs: PAGE_DELAY_MS,
    combinationDelayMs: COMBINATION_DELAY_MS,
    requestTimeoutSecs: REQUEST_TIMEOUT_SECS,
    debug: false,
};

export const FETCH_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:146.0) Gecko/20100101 Firefox/146.0',
    Accept: '*/*',
    'Accept-Language': 'es-AR,es;q=0.8,en-US;q=0.5,en;q=0.3',
    'Content-Type': 'application/json',
    'X-Requested-With': 'XMLHttpRequest',
};
