import type {
  TemplateFilterHandler,
} from './types.js';

import { filterDateformat } from './filters/dateformat.js';
import { filterJson } from './filters/json.js';
import { filterLower } from './filters/lower.js';
import { filterNumber } from './filters/number.js';
import { filterReplace } from './filters/replace.js';
import { filterString } from './filters/string.js';
import { filterTrim } from './filters/trim.js';
import { filterUpper } from './filters/upper.js';
import { filterUrlencode } from './filters/urlencode.js';

/**
 * Internal registry for value filters used by the expression pipe operator.
 */
const templateFilterRegistry = new Map<string, TemplateFilterHandler>();

/**
 * Register (or override) a value filter.
 *
 * Registering a filter makes it available as `${ value | filterName(...) }`.
 *
 * @param name - Filter name (must match `/^[a-z][\w]*$/`).
 * @param handler - Function that receives the current value and the evaluated arguments.
 */
export const registerTemplateFilter = (name: string, handler: TemplateFilterHandler): void => {
  if (!/^[a-z][\w]*$/.test(name)) {
    throw new TypeError(`Invalid filter name: ${name}`);
  }
  if (typeof handler !== 'function') {
    throw new TypeError('Filter handler must be a function');
  }
  templateFilterRegistry.set(name, handler);
};

/**
 * Apply one filter of a pipe.
 *
 * @param name - Filter name.
 * @param value - Input value.
 * @param args - Evaluated filter arguments.
 * @returns Filtered value.
 * @throws Error if no filter is registered under the name.
 */
export const applyTemplateFilter = (name: string, value: unknown, args: unknown[]): unknown => {
  const handler = templateFilterRegistry.get(name);
  if (!handler) throw new Error(`Unknown filter "${name}"`);
  return handler(value, args);
};

/*
 * Register built-in filters.
 */
registerTemplateFilter('dateformat', filterDateformat);
registerTemplateFilter('json', filterJson);
registerTemplateFilter('lower', filterLower);
registerTemplateFilter('number', filterNumber);
registerTemplateFilter('replace', filterReplace);
registerTemplateFilter('string', filterString);
registerTemplateFilter('trim', filterTrim);
registerTemplateFilter('upper', filterUpper);
registerTemplateFilter('urlencode', filterUrlencode);
