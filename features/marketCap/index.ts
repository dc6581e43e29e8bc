/**
 * Market Cap Retrieval
 *
 * Classifies identifiers and fetches their USD market cap from Polygon.io
 * (equities, gold) or CoinGecko (crypto).
 */

// Dispatcher
export { fetchMarketCap, fetchMarketCapPair } from './fetchMarketCap.js';

// Building blocks
export { classifyAsset } from './classifyAsset.js';
export { buildTickerDetailsUrl, buildForexPrevUrl, buildCoinMarketsUrl } from './urlBuilders.js';
export { fetchStockMarketCap, fetchGoldMarketCap, goldMarketCap } from './polygonClient.js';
export { fetchCryptoMarketCap } from './coingeckoClient.js';

// Constants
export { TONNE_TO_TROY_OUNCE, DEFAULT_ABOVE_GROUND_TONNES } from './constants.js';

// Types
export type { AssetMarketCap } from './types.js';
