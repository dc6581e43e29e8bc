// Filename: utils/formatNumber.ts

/** Short-scale suffixes, one per power of 1000 */
const SHORT_SCALE = ['', 'K', 'M', 'B', 'T', 'P', 'E'] as const;

/**
 * Formats a number with one decimal and a short-scale suffix,
 * e.g. 3.387e12 → "3.4T", 292802217292 → "292.8B", 950 → "950.0".
 */
export function formatShortScale(value: number): string {
  if (!Number.isFinite(value)) return String(value);

  let scaled = value;
  let index = 0;
  while (Math.abs(scaled) >= 1000 && index < SHORT_SCALE.length - 1) {
    scaled /= 1000;
    index++;
  }

  // 999.96B rounds to "1000.0B"; carry into the next suffix instead
  if (Math.abs(Number(scaled.toFixed(1))) >= 1000 && index < SHORT_SCALE.length - 1) {
    scaled /= 1000;
    index++;
  }

  return `${scaled.toFixed(1)}${SHORT_SCALE[index]}`;
}
