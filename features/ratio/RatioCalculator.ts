/**
 * Market Cap Ratio Calculator
 *
 * Puts the smaller market cap over the larger so the ratio stays in (0, 1].
 */

import { log, TMI } from '../../utils/log.js';
import type { AssetMarketCap } from '../marketCap/types.js';
import type { RatioResult } from './types.js';

/**
 * Calculates the ratio between two assets.
 *
 * `a` is the numerator only when strictly smaller. On a tie `b` goes on top,
 * which only changes the labels: the ratio is 1 either way.
 *
 * @returns RatioResult with the truncated integer percentage
 */
export function calculateRatio(a: AssetMarketCap, b: AssetMarketCap): RatioResult {
  const [numerator, denominator] = a.marketCap < b.marketCap ? [a, b] : [b, a];

  const ratio = numerator.marketCap / denominator.marketCap;
  const percentage = Math.trunc(ratio * 100);

  log(`⚖️ ${numerator.asset}/${denominator.asset} = ${ratio} (${percentage}%)`, TMI);

  return {
    ratio,
    percentage,
    numerator,
    denominator,
  };
}
