/**
 * Math Domain
 *
 * Checked arithmetic and unit conversion
 */

export { add, sub, mul, div, pow10 } from './safe-math.js';
export { parseUnits, formatUnits } from './units.js';
