// Filename: utils/errors.ts

import type { ProviderName } from '../constants/AssetClasses.js';

export type MarketCapErrorKind =
  | 'EnvMissing'
  | 'InvalidUrl'
  | 'TransportFailure'
  | 'UnexpectedStatus'
  | 'Deserialization'
  | 'ProviderError'
  | 'UnknownAsset'
  | 'CliUsage';

/**
 * Base class for every failure the CLI reports.
 * The message is what ends up on stderr, so it is written for the user.
 */
export abstract class MarketCapError extends Error {
  abstract readonly kind: MarketCapErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required environment variable is unset or empty */
export class EnvMissingError extends MarketCapError {
  readonly kind = 'EnvMissing';

  constructor(public readonly variable: string) {
    super(`Required environmental variable not set. Use 'export ${variable}=YOURKEY' to set it.`);
  }
}

export class InvalidUrlError extends MarketCapError {
  readonly kind = 'InvalidUrl';

  constructor(public readonly reason: string) {
    super(`URL is not valid: ${reason}`);
  }
}

/** The request never produced a response (DNS, TLS, reset, timeout) */
export class TransportError extends MarketCapError {
  readonly kind = 'TransportFailure';

  constructor(public readonly reason: string) {
    super(`Error sending request: ${reason}`);
  }
}

/** Non-2xx whose body is not the provider's error shape */
export class UnexpectedStatusError extends MarketCapError {
  readonly kind = 'UnexpectedStatus';

  constructor(public readonly status: number) {
    super(`Unexpected status code: ${status}`);
  }
}

/** A 2xx body that lacks the market-cap field */
export class DeserializationError extends MarketCapError {
  readonly kind = 'Deserialization';

  constructor(
    public readonly reason: string,
    public readonly assetId: string
  ) {
    super(`Failed to deserialize response: '${reason}' for asset ${assetId}`);
  }
}

const COINGECKO_MARKETS_DOCS = 'https://docs.coingecko.com/reference/coins-markets';

/**
 * The provider answered, but with an error (or, for CoinGecko, an empty list).
 * `detail` is Polygon's `message` field or CoinGecko's raw body.
 */
export class ProviderError extends MarketCapError {
  readonly kind = 'ProviderError';

  constructor(
    public readonly provider: ProviderName,
    public readonly detail: string
  ) {
    super(
      provider === 'polygon'
        ? `Polygon API error: ${detail}`
        : `Coingecko API did not return expected payload.\nReceived ${detail}, expected ${COINGECKO_MARKETS_DOCS}`
    );
  }
}

export class UnknownAssetError extends MarketCapError {
  readonly kind = 'UnknownAsset';

  constructor(public readonly assetId: string) {
    super(
      `Could not identify if ${assetId} is a crypto asset or a stock, please use all caps for stock symbols and lower caps for crypto coingecko-ids`
    );
  }
}

/** Bad command line: unknown flag, extra positional, invalid tonnage */
export class CliUsageError extends MarketCapError {
  readonly kind = 'CliUsage';
}

/** Message of anything thrown, for logging */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
