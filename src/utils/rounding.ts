/**
 * Decimal rounding helpers.
 *
 * All rounding in the mapper and the schema checker is round-half-to-even
 * ("banker's rounding"): an exact tie goes to the neighbour with an even last
 * digit, so 0.125 → 0.12, 0.375 → 0.38, 2.5 → 2 and 3.5 → 4. `Math.round`
 * would instead round every tie upwards.
 *
 * Most decimal fractions have no exact binary representation; a value is treated
 * as a tie when its scaled fractional part is within TIE_TOLERANCE of one half.
 * This differs from rounding the stored binary value: 2.675 is held as
 * 2.67499999999999982236431605997495353221893310546875, which a binary
 * half-to-even round takes to 2.67, while here it is a decimal tie and
 * becomes 2.68.
 */

const TIE_TOLERANCE = 1e-9;

export function roundHalfEven(value: number, decimals = 0): number {
  if (!Number.isFinite(value)) return value;

  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded: number;
  if (Math.abs(fraction - 0.5) < TIE_TOLERANCE) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }

  // Avoid returning -0 for small negative inputs
  return rounded / factor + 0;
}
