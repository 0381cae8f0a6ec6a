import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `trim` filter.
 *
 * Optional mode as first argument: 'left', 'right' or 'both' (default).
 *
 * @param val - Input value.
 * @param args - Optional `[mode]`.
 * @returns Trimmed string representation (empty string for null/undefined).
 */
export function filterTrim (val: unknown, args: unknown[]): string {
  const str = tplStringify(val);
  const mode = (typeof args[0] === 'string') ? args[0].toLowerCase() : 'both';

  if (mode === 'left') return str.trimStart();
  if (mode === 'right') return str.trimEnd();
  return str.trim();
}
