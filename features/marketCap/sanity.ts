import type { ProviderName } from '../../constants/AssetClasses.js';
import { ProviderError } from '../../utils/errors.js';

/**
 * A live asset always has a finite, positive market cap. Zero, negative or
 * NaN means the provider sent something unusable (delisted ticker, coin
 * without supply data).
 */
export function ensurePositiveMarketCap(provider: ProviderName, assetId: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ProviderError(provider, `market cap for ${assetId} is ${value}`);
  }
  return value;
}
