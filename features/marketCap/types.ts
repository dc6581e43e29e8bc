/**
 * Type definitions for market cap retrieval
 */

/**
 * An identifier as typed on the command line together with its market cap.
 */
export interface AssetMarketCap {
  /** Identifier exactly as given (ticker, coin id, or gold) */
  asset: string;

  /** Market capitalization in USD; finite and positive */
  marketCap: number;
}
