import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `number` filter.
 *
 * - `number()`: plain string conversion
 * - `number(decimals)`: fixed decimals
 * - `number(decimals, decimalSep)`: custom decimal separator
 * - `number(decimals, decimalSep, thousandsSep)`: with digit grouping
 *
 * Non-numeric input is passed through as a string.
 *
 * @param val - Input value.
 * @param args - Formatting arguments.
 * @returns Formatted number string.
 */
export function filterNumber (val: unknown, args: unknown[]): string {
  const num = (typeof val === 'number') ? val : Number(val);
  if (val === null || val === '' || !Number.isFinite(num)) return tplStringify(val);

  const [ decimals, decimalSep, thousandsSep ] = args;
  const fixed = (typeof decimals === 'number') ? num.toFixed(Math.max(0, Math.floor(decimals))) : String(num);
  const m = /^(-?)(\d+)(?:\.(\d+))?$/.exec(fixed);
  // exponent notation is left alone
  if (!m) return fixed;

  const [ , sign, intPart, frac = '' ] = m;
  const grouped = (typeof thousandsSep === 'string' && thousandsSep.length > 0)
    ? intPart.replace(/\B(?=(\d{3})+(?!\d))/g, thousandsSep)
    : intPart;
  const decChar = (typeof decimalSep === 'string') ? decimalSep : '.';
  return sign + grouped + (frac.length > 0 ? decChar + frac : '');
}
