/**
 * Constants for the market cap adapters
 */

/** Troy ounces in one metric tonne */
export const TONNE_TO_TROY_OUNCE = 35273.96194958;

/** Estimated above-ground gold stock (tonnes) used when --above-ground is not given */
export const DEFAULT_ABOVE_GROUND_TONNES = 212582.0;
