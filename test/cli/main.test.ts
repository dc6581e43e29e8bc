import { describe, it, expect, vi, beforeEach } from 'vitest';
import { main, shouldUseColor, type CliIo } from '../../cli/main.js';
import { HELP_TEXT } from '../../cli/args.js';
import type { HttpClient } from '../../utils/httpClient.js';
import {
  AAPL_MARKET_CAP,
  type FakeRoute,
  coinMarketsBody,
  fakeClient,
  forexPrevBody,
  polygonErrorBody,
  tickerDetailsBody,
} from '../helpers/fakeHttp.js';

// Mock the log module
vi.mock('../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

const ROUTES: FakeRoute[] = [
  { match: 'tickers/AAPL', body: tickerDetailsBody(AAPL_MARKET_CAP) },
  { match: 'C:XAUUSD/prev', body: forexPrevBody() },
  { match: 'ids=ethereum', body: coinMarketsBody('ethereum', 292802217292) },
  { match: 'ids=bitcoin', body: coinMarketsBody('bitcoin', 1.2e12) },
  { match: 'tickers/ZZZZ', status: 404, body: polygonErrorBody('Ticker not found.', 'NOT_FOUND') },
  { match: 'ids=notacoin', body: '[]' },
];

function makeIo(httpClient: HttpClient, env: NodeJS.ProcessEnv = { POLYGON_KEY: 'test-polygon', COINGECKO_KEY: 'test-coingecko' }) {
  const stdout = vi.fn<(line: string) => void>();
  const stderr = vi.fn<(message: string) => void>();
  const io: CliIo = { stdout, stderr, env, isTty: false, httpClient, skipEnvFile: true };
  return { io, stdout, stderr };
}

describe('main', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should print the plain ratio for a stock against gold', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout, stderr } = makeIo(client);

    await expect(main(['AAPL', 'gold', '--plain'], io)).resolves.toBe(0);

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(stdout).toHaveBeenCalledWith('AAPL gold 17');
    expect(stderr).not.toHaveBeenCalled();
  });

  it('should print the same plain line when the assets are swapped', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client);

    await expect(main(['gold', 'AAPL', '-p'], io)).resolves.toBe(0);

    expect(stdout).toHaveBeenCalledWith('AAPL gold 17');
  });

  it('should print compact JSON', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client);

    await main(['AAPL', 'gold', '--json'], io);

    expect(stdout).toHaveBeenCalledWith(
      '{"percentage":17,"numerator":{"asset":"AAPL","market_cap":3387000000000},"denominator":{"asset":"gold","market_cap":19190066192691}}'
    );
  });

  it('should prefer plain when both output flags are given', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client);

    await main(['AAPL', 'gold', '-j', '-p'], io);

    expect(stdout.mock.calls).toEqual([['AAPL gold 17']]);
  });

  it('should print the gauge and both market caps by default', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client);

    await expect(main(['AAPL', 'gold'], io)).resolves.toBe(0);

    expect(stdout.mock.calls).toEqual([
      [`[${'█'.repeat(7)}${' '.repeat(33)}] 18%`],
      ['AAPL: 3.4T'],
      ['gold: 19.2T'],
    ]);
  });

  it('should print an identical gauge when the assets are swapped', async () => {
    const forward = makeIo(fakeClient(ROUTES).client);
    const backward = makeIo(fakeClient(ROUTES).client);

    await main(['ethereum', 'AAPL'], forward.io);
    await main(['AAPL', 'ethereum'], backward.io);

    expect(backward.stdout.mock.calls).toEqual(forward.stdout.mock.calls);
  });

  it('should compare ethereum with bitcoin when no assets are given', async () => {
    const { client, fetchImpl } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client);

    await main(['--plain'], io);

    expect(stdout).toHaveBeenCalledWith('ethereum bitcoin 24');
    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([
      'https://api.coingecko.com/api/v3/coins/markets?vs_currency=usd&ids=ethereum&x_cg_key=test-coingecko',
      'https://api.coingecko.com/api/v3/coins/markets?vs_currency=usd&ids=bitcoin&x_cg_key=test-coingecko',
    ]);
  });

  it('should apply --above-ground to gold', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client);

    // Half the default stock halves gold's cap: 3.387e12 / 9.595e12 → 35%
    await main(['AAPL', 'gold', '--above-ground', '106291', '-p'], io);

    expect(stdout).toHaveBeenCalledWith('AAPL gold 35');
  });

  it('should fail before any request when a key is missing', async () => {
    const { client, fetchImpl } = fakeClient(ROUTES);
    const { io, stdout, stderr } = makeIo(client, { COINGECKO_KEY: 'test-coingecko' });

    await expect(main(['AAPL', 'gold'], io)).resolves.toBe(1);

    expect(stderr).toHaveBeenCalledWith(
      "Required environmental variable not set. Use 'export POLYGON_KEY=YOURKEY' to set it."
    );
    expect(stdout).not.toHaveBeenCalled();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should fail on an unknown asset without a request', async () => {
    const { client, fetchImpl } = fakeClient(ROUTES);
    const { io, stderr } = makeIo(client);

    await expect(main(['FooBar', 'gold'], io)).resolves.toBe(1);

    expect(stderr).toHaveBeenCalledWith(
      'Could not identify if FooBar is a crypto asset or a stock, please use all caps for stock symbols and lower caps for crypto coingecko-ids'
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should not request the second asset when the first fails', async () => {
    const { client, fetchImpl } = fakeClient(ROUTES);
    const { io, stderr } = makeIo(client);

    await expect(main(['ZZZZ', 'gold'], io)).resolves.toBe(1);

    expect(stderr).toHaveBeenCalledWith('Polygon API error: Ticker not found.');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should report an unknown coin id', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stderr } = makeIo(client);

    await expect(main(['AAPL', 'notacoin'], io)).resolves.toBe(1);

    expect(stderr).toHaveBeenCalledWith(
      'Coingecko API did not return expected payload.\nReceived [], expected https://docs.coingecko.com/reference/coins-markets'
    );
  });

  it('should reject a non-positive tonnage with exit code 1', async () => {
    const { client, fetchImpl } = fakeClient(ROUTES);
    const { io, stderr } = makeIo(client);

    await expect(main(['--above-ground=0'], io)).resolves.toBe(1);

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should print help without needing keys', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client, {});

    await expect(main(['--help'], io)).resolves.toBe(0);

    expect(stdout).toHaveBeenCalledWith(HELP_TEXT);
  });

  it('should print the version', async () => {
    const { client } = fakeClient(ROUTES);
    const { io, stdout } = makeIo(client, {});

    await expect(main(['-V'], io)).resolves.toBe(0);

    expect(stdout).toHaveBeenCalledWith('mcap-ratio 0.1.0');
  });
});

describe('shouldUseColor', () => {
  it('should colour only interactive terminals without NO_COLOR', () => {
    expect(shouldUseColor({ isTty: true, env: {} })).toBe(true);
    expect(shouldUseColor({ isTty: false, env: {} })).toBe(false);
    expect(shouldUseColor({ isTty: true, env: { NO_COLOR: '1' } })).toBe(false);
  });
});
