export const QUANTITY_DECIMALS = 3;
export const PRICE_DECIMALS = 2;

const QUANTITY_SCALE = 10 ** QUANTITY_DECIMALS;
const PRICE_SCALE = 10 ** PRICE_DECIMALS;

// Cost units are 1/(QUANTITY_SCALE * PRICE_SCALE) of a currency unit.
const UNITS_PER_MINOR = (QUANTITY_SCALE * PRICE_SCALE) / 100;

/**
 * Exact cost of `quantity` at `unitPrice`, in integer cost units. Inputs are
 * snapped to their fixed precision first so binary float noise cannot leak in.
 */
export function costUnits(quantity: number, unitPrice: number) {
  return Math.round(quantity * QUANTITY_SCALE) * Math.round(unitPrice * PRICE_SCALE);
}

/** Rounds cost units half-up to minor units (cents, paise). */
export function unitsToMinor(units: number) {
  return Math.floor((units + UNITS_PER_MINOR / 2) / UNITS_PER_MINOR);
}

export function minorToAmount(minor: number) {
  return minor / 100;
}

export function hasAtMostDecimals(value: number, decimals: number) {
  const scaled = value * 10 ** decimals;
  return Math.abs(scaled - Math.round(scaled)) < 1e-6;
}
