/**
 * Request URLs for the three provider endpoints.
 *
 * Query strings are appended through URLSearchParams, so values are
 * form-encoded and keep the order they are appended in.
 */

import { COINGECKO_BASE_URL, GOLD_FOREX_TICKER, POLYGON_BASE_URL } from '../../constants/api.js';
import { InvalidUrlError, errorMessage } from '../../utils/errors.js';

function parseUrl(raw: string): URL {
  try {
    return new URL(raw);
  } catch (error) {
    throw new InvalidUrlError(`${errorMessage(error)} (${raw})`);
  }
}

/**
 * Polygon ticker details v3: `/v3/reference/tickers/{symbol}?apiKey=`
 * The symbol goes into the path as given.
 */
export function buildTickerDetailsUrl(
  symbol: string,
  apiKey: string,
  baseUrl: string = POLYGON_BASE_URL
): string {
  const url = parseUrl(`${baseUrl}/v3/reference/tickers/${symbol}`);
  url.searchParams.append('apiKey', apiKey);
  return url.toString();
}

/**
 * Polygon previous-day aggregate for a forex pair: `/v2/aggs/ticker/C:{ticker}/prev?apiKey=`
 */
export function buildForexPrevUrl(
  apiKey: string,
  forexTicker: string = GOLD_FOREX_TICKER,
  baseUrl: string = POLYGON_BASE_URL
): string {
  const url = parseUrl(`${baseUrl}/v2/aggs/ticker/C:${forexTicker}/prev`);
  url.searchParams.append('apiKey', apiKey);
  return url.toString();
}

/**
 * CoinGecko `/api/v3/coins/markets` for a single coin id, priced in USD
 */
export function buildCoinMarketsUrl(
  coinId: string,
  apiKey: string,
  baseUrl: string = COINGECKO_BASE_URL
): string {
  const url = parseUrl(`${baseUrl}/api/v3/coins/markets`);
  url.searchParams.append('vs_currency', 'usd');
  url.searchParams.append('ids', coinId);
  url.searchParams.append('x_cg_key', apiKey);
  return url.toString();
}
