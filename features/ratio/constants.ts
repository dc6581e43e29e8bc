/**
 * Constants for the ratio renderers
 */

/** Cells in the gauge bar */
export const BAR_LENGTH = 40;

/** Glyph for a filled gauge cell */
export const FILLED_CELL = '█';

/** Glyph for an empty gauge cell */
export const EMPTY_CELL = ' ';
