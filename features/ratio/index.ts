/**
 * Market Cap Ratio
 *
 * Main exports for the ratio feature: the calculator and its renderers.
 */

// Main calculation function
export { calculateRatio } from './RatioCalculator.js';

// Renderers
export {
  selectOutputMode,
  renderGauge,
  renderPlain,
  renderJson,
  renderRatio,
} from './renderers.js';
export type { RenderOptions, GaugeOptions } from './renderers.js';

// Constants
export { BAR_LENGTH } from './constants.js';

// Types
export type { RatioResult, OutputMode } from './types.js';
