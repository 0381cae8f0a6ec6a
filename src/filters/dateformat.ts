import dayjs from 'dayjs';

/**
 * Built-in `dateformat` filter.
 *
 * Formats dates, timestamps and date strings through dayjs. Everything inside
 * `[...]` in the format is kept literally, e.g. `YYYY[Y]MM[M]` -> `2026Y01M`.
 *
 * @param val - Date, timestamp, ISO string or dayjs instance.
 * @param args - `[format]`; defaults to `YYYY-MM-DD HH:mm:ss`.
 * @returns Formatted date, or an empty string for missing and invalid dates.
 */
export function filterDateformat (val: unknown, args: unknown[]): string {
  if (val === undefined || val === null) return '';

  const format = (typeof args[0] === 'string') ? args[0] : 'YYYY-MM-DD HH:mm:ss';
  let date: dayjs.Dayjs;
  if (dayjs.isDayjs(val)) {
    date = val;
  } else if (val instanceof Date || typeof val === 'string' || typeof val === 'number') {
    date = dayjs(val);
  } else {
    return '';
  }
  return date.isValid() ? date.format(format) : '';
}
