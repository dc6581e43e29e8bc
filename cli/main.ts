// Filename: cli/main.ts
/**
 * mcap-ratio command
 *
 * 1. Parses the command line (help and version need no keys)
 * 2. Loads POLYGON_KEY and COINGECKO_KEY (.env.local is read first)
 * 3. Fetches asset A, then asset B, over one HttpClient
 * 4. Prints the ratio as gauge, plain line or JSON
 *
 * Any failure prints its message to stderr and exits 1.
 */

import { CLI_NAME, CLI_VERSION } from '../constants/api.js';
import { loadApiKeys, loadLocalEnv } from '../config/configApiKeys.js';
import { HttpClient } from '../utils/httpClient.js';
import { log, ERR, LOG } from '../utils/log.js';
import { errorMessage } from '../utils/errors.js';
import { fetchMarketCapPair } from '../features/marketCap/index.js';
import { calculateRatio, renderRatio, selectOutputMode } from '../features/ratio/index.js';
import { HELP_TEXT, parseCliArgs } from './args.js';

/** Where output goes and what the process looks like; swapped out in tests */
export interface CliIo {
  stdout: (line: string) => void;
  stderr: (message: string) => void;
  env: NodeJS.ProcessEnv;
  /** Whether stdout is an interactive terminal */
  isTty: boolean;
  /** Provided by tests to avoid the network */
  httpClient?: HttpClient;
  /** Skip reading .env.local */
  skipEnvFile?: boolean;
}

export const defaultIo = (): CliIo => ({
  stdout: (line) => console.log(line),
  stderr: (message) => console.error(message),
  env: process.env,
  isTty: process.stdout.isTTY === true,
});

/** Colour unless NO_COLOR is set or stdout is redirected */
export function shouldUseColor(io: Pick<CliIo, 'env' | 'isTty'>): boolean {
  return io.isTty && !io.env.NO_COLOR;
}

/**
 * Runs the command and resolves to the process exit code.
 */
export async function main(argv: readonly string[], io: CliIo = defaultIo()): Promise<number> {
  try {
    const command = parseCliArgs(argv);

    if (command.command === 'help') {
      io.stdout(HELP_TEXT);
      return 0;
    }
    if (command.command === 'version') {
      io.stdout(`${CLI_NAME} ${CLI_VERSION}`);
      return 0;
    }

    const { options } = command;

    if (!io.skipEnvFile) {
      loadLocalEnv();
    }
    const keys = loadApiKeys(io.env);

    const client = io.httpClient ?? new HttpClient();
    const [a, b] = await fetchMarketCapPair(
      client,
      [options.assetA, options.assetB],
      keys,
      options.aboveGround
    );

    const result = calculateRatio(a, b);
    const mode = selectOutputMode(options);
    log(`🖨️ Rendering ${mode} output`, LOG);

    for (const line of renderRatio(result, mode, { color: shouldUseColor(io) })) {
      io.stdout(line);
    }
    return 0;
  } catch (error) {
    log(`${CLI_NAME} failed: ${errorMessage(error)}`, ERR);
    io.stderr(errorMessage(error));
    return 1;
  }
}
