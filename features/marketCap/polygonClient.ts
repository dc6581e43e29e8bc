/**
 * Polygon.io adapters: equity market cap from ticker details, and gold market
 * cap derived from the previous XAUUSD close.
 */

import { GOLD_FOREX_TICKER } from '../../constants/api.js';
import type { ApiKeys } from '../../config/configApiKeys.js';
import type { HttpClient, HttpTextResponse } from '../../utils/httpClient.js';
import { log, LOG, TMI } from '../../utils/log.js';
import {
  DeserializationError,
  ProviderError,
  UnexpectedStatusError,
} from '../../utils/errors.js';
import { TONNE_TO_TROY_OUNCE } from './constants.js';
import { buildForexPrevUrl, buildTickerDetailsUrl } from './urlBuilders.js';
import {
  decodeBody,
  forexPrevSchema,
  polygonErrorSchema,
  tickerDetailsSchema,
} from './schemas.js';
import { ensurePositiveMarketCap } from './sanity.js';

// Polygon client specific emoji
const LOG_EMOJI = '📈';
const CONTEXT = 'Polygon API';

/**
 * Turns a non-2xx Polygon response into the error the user sees.
 * Polygon answers errors with `{status, request_id, message}`; anything else
 * is reported by status code alone.
 */
function polygonFailure(response: HttpTextResponse): Error {
  const decoded = decodeBody(response.body, polygonErrorSchema);
  if (!decoded.success) {
    return new UnexpectedStatusError(response.status);
  }
  return new ProviderError('polygon', decoded.data.message);
}

/**
 * Fetches an equity's market cap (USD) from Polygon's ticker details.
 * @throws ProviderError, UnexpectedStatusError, DeserializationError, TransportError
 */
export async function fetchStockMarketCap(
  client: HttpClient,
  symbol: string,
  keys: ApiKeys
): Promise<number> {
  log(`${LOG_EMOJI} Fetching ticker details for ${symbol}...`, TMI);

  const url = buildTickerDetailsUrl(symbol, keys.polygon);
  const response = await client.getText(url, { context: CONTEXT });

  if (!response.ok) {
    throw polygonFailure(response);
  }

  const decoded = decodeBody(response.body, tickerDetailsSchema);
  if (!decoded.success) {
    throw new DeserializationError(decoded.reason, symbol);
  }

  const marketCap = ensurePositiveMarketCap('polygon', symbol, decoded.data.results.market_cap);
  log(`${LOG_EMOJI} ${symbol} market cap: $${marketCap.toLocaleString()}`, LOG);
  return marketCap;
}

/** Spot price (USD/oz) × above-ground stock (t) × oz per t */
export function goldMarketCap(closeUsdPerOunce: number, aboveGroundTonnes: number): number {
  return closeUsdPerOunce * aboveGroundTonnes * TONNE_TO_TROY_OUNCE;
}

/**
 * Values all above-ground gold at the previous XAUUSD close.
 * @throws ProviderError, UnexpectedStatusError, DeserializationError, TransportError
 */
export async function fetchGoldMarketCap(
  client: HttpClient,
  aboveGroundTonnes: number,
  keys: ApiKeys
): Promise<number> {
  log(`${LOG_EMOJI} Fetching previous ${GOLD_FOREX_TICKER} close...`, TMI);

  const url = buildForexPrevUrl(keys.polygon, GOLD_FOREX_TICKER);
  const response = await client.getText(url, { context: CONTEXT });

  if (!response.ok) {
    throw polygonFailure(response);
  }

  const decoded = decodeBody(response.body, forexPrevSchema);
  if (!decoded.success) {
    throw new DeserializationError(decoded.reason, GOLD_FOREX_TICKER);
  }

  const close = decoded.data.results[0].c;
  log(`${LOG_EMOJI} ${GOLD_FOREX_TICKER} close: $${close} for ${aboveGroundTonnes} t`, TMI);

  const marketCap = ensurePositiveMarketCap(
    'polygon',
    GOLD_FOREX_TICKER,
    goldMarketCap(close, aboveGroundTonnes)
  );
  log(`${LOG_EMOJI} Gold market cap: $${marketCap.toLocaleString()}`, LOG);
  return marketCap;
}
