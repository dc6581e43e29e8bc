// Filename: constants/api.ts

/** Polygon.io REST API (equities and forex aggregates) */
export const POLYGON_BASE_URL = 'https://api.polygon.io';

/** CoinGecko REST API */
export const COINGECKO_BASE_URL = 'https://api.coingecko.com';

/** Forex pair Polygon quotes spot gold under (prefixed with `C:` in the path) */
export const GOLD_FOREX_TICKER = 'XAUUSD';

export const CLI_NAME = 'mcap-ratio';
export const CLI_VERSION = '0.1.0';

/** Sent to CoinGecko, which rejects some anonymous clients */
export const USER_AGENT = `${CLI_NAME}/${CLI_VERSION}`;
