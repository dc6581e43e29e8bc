/**
 * CoinGecko adapter: crypto market cap from `/coins/markets`.
 */

import { USER_AGENT } from '../../constants/api.js';
import type { ApiKeys } from '../../config/configApiKeys.js';
import type { HttpClient } from '../../utils/httpClient.js';
import { log, LOG, TMI, WARN } from '../../utils/log.js';
import { DeserializationError, ProviderError } from '../../utils/errors.js';
import { buildCoinMarketsUrl } from './urlBuilders.js';
import { coinMarketsSchema, decodeBody } from './schemas.js';
import { ensurePositiveMarketCap } from './sanity.js';

// CoinGecko client specific emoji
const LOG_EMOJI = '🦎';

/**
 * Fetches a coin's market cap (USD) by CoinGecko id.
 *
 * CoinGecko has no fixed error body, so any non-2xx is reported with the raw
 * body. Unknown ids come back as `200 []` and are reported the same way.
 *
 * @throws ProviderError, DeserializationError, TransportError
 */
export async function fetchCryptoMarketCap(
  client: HttpClient,
  coinId: string,
  keys: ApiKeys
): Promise<number> {
  log(`${LOG_EMOJI} Fetching market data for ${coinId}...`, TMI);

  const url = buildCoinMarketsUrl(coinId, keys.coingecko);
  const response = await client.getText(url, {
    context: 'CoinGecko API',
    headers: { 'User-Agent': USER_AGENT },
  });

  if (!response.ok) {
    throw new ProviderError('coingecko', response.body);
  }

  if (response.body.trim() === '[]') {
    log(`${LOG_EMOJI} ⚠️ No market data for ${coinId}`, WARN);
    throw new ProviderError('coingecko', response.body);
  }

  const decoded = decodeBody(response.body, coinMarketsSchema);
  if (!decoded.success) {
    throw new DeserializationError(decoded.reason, coinId);
  }

  const [coin] = decoded.data;
  if (!coin) {
    throw new ProviderError('coingecko', response.body);
  }

  const marketCap = ensurePositiveMarketCap('coingecko', coinId, coin.market_cap);
  log(`${LOG_EMOJI} ${coinId} market cap: $${marketCap.toLocaleString()}`, LOG);
  return marketCap;
}
