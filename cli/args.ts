// Filename: cli/args.ts

import { parseArgs } from 'node:util';
import { CLI_NAME } from '../constants/api.js';
import { CliUsageError, errorMessage } from '../utils/errors.js';
import { DEFAULT_ABOVE_GROUND_TONNES } from '../features/marketCap/constants.js';

export const DEFAULT_ASSET_A = 'ethereum';
export const DEFAULT_ASSET_B = 'bitcoin';

export interface CliOptions {
  assetA: string;
  assetB: string;
  /** Above-ground gold stock in tonnes; always finite and positive */
  aboveGround: number;
  plain: boolean;
  json: boolean;
}

export type CliCommand =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'run'; options: CliOptions };

export const HELP_TEXT = `Compare market caps between crypto, stock and gold by calculating their ratio
- CLI returns percentages and market caps
- Requires https://polygon.io and https://coingecko.com API Keys as environmental variables: POLYGON_KEY and COINGECKO_KEY

Usage: ${CLI_NAME} [OPTIONS] [ASSET_A] [ASSET_B]

Arguments:
  [ASSET_A]  Ticker (AAPL), CoinGecko id (ethereum) or gold [default: ${DEFAULT_ASSET_A}]
  [ASSET_B]  Ticker (AAPL), CoinGecko id (ethereum) or gold [default: ${DEFAULT_ASSET_B}]

Options:
      --above-ground <ABOVE_GROUND>  Set the estimated above ground stock of gold in tonnes [default: ${DEFAULT_ABOVE_GROUND_TONNES}]
  -p, --plain                        Return 'numerator-asset denominator-asset percentage'. E.g.  'AAPL gold 17'
  -j, --json                         Return json
  -h, --help                         Print help
  -V, --version                      Print version`;

function parseTonnes(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_ABOVE_GROUND_TONNES;

  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`invalid value '${raw}' for '--above-ground <ABOVE_GROUND>': not a number`);
  }
  if (value <= 0) {
    throw new CliUsageError(`invalid value '${raw}' for '--above-ground <ABOVE_GROUND>': must be greater than 0`);
  }
  return value;
}

function readArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        'above-ground': { type: 'string' },
        plain: { type: 'boolean', short: 'p' },
        json: { type: 'boolean', short: 'j' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'V' },
      },
    });
  } catch (error) {
    throw new CliUsageError(`${errorMessage(error)}\n\nFor more information, try '--help'.`);
  }
}

/**
 * Parses argv (without the node and script entries).
 * @throws CliUsageError on unknown flags, extra positionals or bad tonnage
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgv(argv);

  if (values.help) return { command: 'help' };
  if (values.version) return { command: 'version' };

  if (positionals.length > 2) {
    throw new CliUsageError(
      `unexpected argument '${positionals[2]}' found\n\nUsage: ${CLI_NAME} [OPTIONS] [ASSET_A] [ASSET_B]`
    );
  }

  return {
    command: 'run',
    options: {
      assetA: positionals[0] ?? DEFAULT_ASSET_A,
      assetB: positionals[1] ?? DEFAULT_ASSET_B,
      aboveGround: parseTonnes(values['above-ground']),
      plain: values.plain ?? false,
      json: values.json ?? false,
    },
  };
}
