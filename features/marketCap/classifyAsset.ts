import type { AssetClass } from '../../constants/AssetClasses.js';

/**
 * Decides which provider an identifier belongs to from its letter case alone.
 *
 * - `gold` / `Gold` → GOLD
 * - unchanged by upper-casing → EQUITY (tickers like `AAPL`, `BRK.B`)
 * - unchanged by lower-casing → CRYPTO (CoinGecko ids like `ethereum`)
 * - anything else → UNKNOWN
 *
 * Identifiers with no letters at all (`123`) are unchanged by both and land
 * on EQUITY, the first matching rule. `GOLD` is also an equity ticker.
 */
export function classifyAsset(id: string): AssetClass {
  if (id.length === 0) return 'UNKNOWN';
  if (id === 'gold' || id === 'Gold') return 'GOLD';
  if (id === id.toUpperCase()) return 'EQUITY';
  if (id === id.toLowerCase()) return 'CRYPTO';
  return 'UNKNOWN';
}
