// Filename: constants/AssetClasses.ts

/**
 * --- ASSET CLASSES ---
 * Every identifier passed on the command line resolves to exactly one of these.
 */
export const ALL_ASSET_CLASSES = [
  "GOLD", // Physical gold, priced through Polygon's XAUUSD forex pair.
  "EQUITY", // Uppercase ticker symbol, e.g. AAPL.
  "CRYPTO", // Lowercase CoinGecko coin id, e.g. ethereum.
  "UNKNOWN", // Mixed case. Rejected before any request is sent.
] as const;

export type AssetClass = (typeof ALL_ASSET_CLASSES)[number];

/** Data provider serving each fetchable class */
export const PROVIDER_BY_ASSET_CLASS = {
  GOLD: "polygon",
  EQUITY: "polygon",
  CRYPTO: "coingecko",
} as const satisfies Record<Exclude<AssetClass, "UNKNOWN">, string>;

export type ProviderName = (typeof PROVIDER_BY_ASSET_CLASS)[keyof typeof PROVIDER_BY_ASSET_CLASS];
