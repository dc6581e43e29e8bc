/**
 * Type definitions for the market cap ratio
 */

import type { AssetMarketCap } from '../marketCap/types.js';

/**
 * Output of calculateRatio. The smaller asset is always the numerator.
 */
export interface RatioResult {
  /** numerator.marketCap / denominator.marketCap, in (0, 1] */
  ratio: number;

  /** ratio × 100 truncated toward zero */
  percentage: number;

  numerator: AssetMarketCap;
  denominator: AssetMarketCap;
}

export type OutputMode = 'gauge' | 'plain' | 'json';
