/**
 * Response shapes for the provider endpoints.
 *
 * Only the fields a market cap is derived from are required. Everything else
 * the providers send (branding, addresses, OHLC besides the close, ROI, ...)
 * is stripped by zod's default object parsing.
 */

import { z } from 'zod';

/** Polygon `/v3/reference/tickers/{symbol}` */
export const tickerDetailsSchema = z.object({
  status: z.string().optional(),
  request_id: z.string().optional(),
  results: z.object({
    ticker: z.string().optional(),
    name: z.string().optional(),
    market_cap: z.number(),
  }),
});

export type TickerDetails = z.infer<typeof tickerDetailsSchema>;

/** One previous-day candle; `c` is the close in USD per troy ounce for XAUUSD */
const candleSchema = z.object({
  T: z.string().optional(),
  o: z.number().optional(),
  h: z.number().optional(),
  l: z.number().optional(),
  c: z.number(),
  t: z.number().optional(),
});

/** Polygon `/v2/aggs/ticker/{ticker}/prev` */
export const forexPrevSchema = z.object({
  ticker: z.string().optional(),
  status: z.string().optional(),
  results: z.array(candleSchema).min(1),
});

export type ForexPrev = z.infer<typeof forexPrevSchema>;

/** Polygon error body, returned with non-2xx statuses */
export const polygonErrorSchema = z.object({
  status: z.string().optional(),
  request_id: z.string().optional(),
  message: z.string(),
});

/** CoinGecko `/api/v3/coins/markets` entry */
const coinMarketSchema = z.object({
  id: z.string().optional(),
  symbol: z.string().optional(),
  market_cap: z.number(),
});

export const coinMarketsSchema = z.array(coinMarketSchema);

export type CoinMarkets = z.infer<typeof coinMarketsSchema>;

/** One-line diagnostic from a failed parse, e.g. `results.market_cap: Required` */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * JSON.parse + schema validation.
 * Returns the parsed value, or the diagnostic to put in a DeserializationError.
 */
export function decodeBody<T>(
  body: string,
  schema: z.ZodType<T>
): { success: true; data: T } | { success: false; reason: string } {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return { success: false, reason: error instanceof Error ? error.message : 'invalid JSON' };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { success: false, reason: describeIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}
