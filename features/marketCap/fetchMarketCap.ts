/**
 * Routes an identifier to the adapter for its asset class.
 */

import { PROVIDER_BY_ASSET_CLASS } from '../../constants/AssetClasses.js';
import type { ApiKeys } from '../../config/configApiKeys.js';
import type { HttpClient } from '../../utils/httpClient.js';
import { log, LOG, TMI } from '../../utils/log.js';
import { UnknownAssetError } from '../../utils/errors.js';
import { classifyAsset } from './classifyAsset.js';
import { fetchGoldMarketCap, fetchStockMarketCap } from './polygonClient.js';
import { fetchCryptoMarketCap } from './coingeckoClient.js';
import type { AssetMarketCap } from './types.js';

/**
 * Fetches one asset's market cap in USD.
 * UNKNOWN identifiers fail before any request is made; adapter errors
 * propagate untouched.
 */
export async function fetchMarketCap(
  client: HttpClient,
  assetId: string,
  keys: ApiKeys,
  aboveGroundTonnes: number
): Promise<number> {
  const assetClass = classifyAsset(assetId);
  if (assetClass !== 'UNKNOWN') {
    log(`💰 ${assetId} → ${assetClass} via ${PROVIDER_BY_ASSET_CLASS[assetClass]}`, TMI);
  }

  switch (assetClass) {
    case 'GOLD':
      return fetchGoldMarketCap(client, aboveGroundTonnes, keys);
    case 'EQUITY':
      return fetchStockMarketCap(client, assetId, keys);
    case 'CRYPTO':
      return fetchCryptoMarketCap(client, assetId, keys);
    case 'UNKNOWN':
      throw new UnknownAssetError(assetId);
  }
}

/**
 * Fetches both assets one after the other. If the first fails the second
 * request is never sent.
 */
export async function fetchMarketCapPair(
  client: HttpClient,
  [assetA, assetB]: readonly [string, string],
  keys: ApiKeys,
  aboveGroundTonnes: number
): Promise<[AssetMarketCap, AssetMarketCap]> {
  log('💰 Starting market cap fetch...', LOG);

  const marketCapA = await fetchMarketCap(client, assetA, keys, aboveGroundTonnes);
  const marketCapB = await fetchMarketCap(client, assetB, keys, aboveGroundTonnes);

  log('💰 Both market caps fetched', LOG);

  return [
    { asset: assetA, marketCap: marketCapA },
    { asset: assetB, marketCap: marketCapB },
  ];
}
