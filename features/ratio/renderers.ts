/**
 * Output renderers: gauge (default), plain line, compact JSON.
 *
 * The gauge shows Math.round(ratio × 100) while plain and JSON truncate, so
 * the two can differ by one (17.65% is "18%" in the gauge and 17 elsewhere).
 */

import { formatShortScale } from '../../utils/formatNumber.js';
import { BAR_LENGTH, EMPTY_CELL, FILLED_CELL } from './constants.js';
import type { OutputMode, RatioResult } from './types.js';

const GREEN = '\u001b[32m';
const RESET = '\u001b[0m';

export interface RenderOptions {
  /** Wrap the filled part of the gauge in ANSI green */
  color?: boolean;
}

export interface GaugeOptions extends RenderOptions {
  /** Number of cells in the bar */
  length?: number;
}

/** --plain wins when both flags are given */
export function selectOutputMode(flags: { plain?: boolean; json?: boolean }): OutputMode {
  if (flags.plain) return 'plain';
  if (flags.json) return 'json';
  return 'gauge';
}

/**
 * `[██████      ] 18%`
 * @throws RangeError for a ratio outside [0, 1]
 */
export function renderGauge(ratio: number, options: GaugeOptions = {}): string {
  const length = options.length ?? BAR_LENGTH;
  if (!(ratio >= 0 && ratio <= 1)) {
    throw new RangeError(`Ratio must be between 0 and 1, got ${ratio}`);
  }

  const filledLength = Math.round(ratio * length);
  const filled = FILLED_CELL.repeat(filledLength);
  const empty = EMPTY_CELL.repeat(length - filledLength);
  const percentage = Math.round(ratio * 100);

  const filledPart = options.color && filledLength > 0 ? `${GREEN}${filled}${RESET}` : filled;
  return `[${filledPart}${empty}] ${percentage}%`;
}

/** `AAPL gold 17` */
export function renderPlain(result: RatioResult): string {
  return `${result.numerator.asset} ${result.denominator.asset} ${result.percentage}`;
}

/** One-line JSON with integer market caps */
export function renderJson(result: RatioResult): string {
  return JSON.stringify({
    percentage: result.percentage,
    numerator: {
      asset: result.numerator.asset,
      market_cap: Math.trunc(result.numerator.marketCap),
    },
    denominator: {
      asset: result.denominator.asset,
      market_cap: Math.trunc(result.denominator.marketCap),
    },
  });
}

/**
 * Lines to print on stdout for the chosen mode.
 * Gauge mode follows the bar with each asset's formatted market cap.
 */
export function renderRatio(result: RatioResult, mode: OutputMode, options: RenderOptions = {}): string[] {
  switch (mode) {
    case 'plain':
      return [renderPlain(result)];
    case 'json':
      return [renderJson(result)];
    case 'gauge':
      return [
        renderGauge(result.ratio, { color: options.color }),
        `${result.numerator.asset}: ${formatShortScale(result.numerator.marketCap)}`,
        `${result.denominator.asset}: ${formatShortScale(result.denominator.marketCap)}`,
      ];
  }
}
