/**
 * Escape a string for use as markup text or as a double-quoted attribute value.
 *
 * Encodes `&`, `<` and `>`; with `quotes` enabled `"` is encoded as well.
 *
 * @param str The string to escape.
 * @param quotes Whether to escape double quotes (attribute context).
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * escapeMarkup('<b title="x">A & B</b>');
 * // '&lt;b title=&quot;x&quot;&gt;A &amp; B&lt;/b&gt;'
 * escapeMarkup('"quoted" <text>', false);
 * // '"quoted" &lt;text&gt;'
 * ```
 */
export function escapeMarkup (str: string, quotes = true): string {
  const re = quotes ? /[&<>"]/g : /[&<>]/g;
  return str.replace(re, (ch) => {
    switch (ch) {
      case '&': return '&amp;';
      case '<': return '&lt;';
      case '>': return '&gt;';
      default: return '&quot;';
    }
  });
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: '\'',
};

/**
 * Decode entity and character references in markup text.
 *
 * Handles the five predefined XML entities and decimal/hexadecimal character
 * references. Unknown named entities (e.g. `&nbsp;`) are kept verbatim.
 *
 * @param str The string to unescape.
 * @returns The decoded string.
 *
 * @example
 * ```ts
 * unescapeMarkup('&lt;p&gt; &#65;&#x42; &nbsp;');
 * // '<p> AB &nbsp;'
 * ```
 */
export function unescapeMarkup (str: string): string {
  if (!str.includes('&')) return str;
  return str.replace(/&(#[xX][0-9a-fA-F]+|#\d+|[A-Za-z][\w.-]*);/g, (m: string, ref: string) => {
    if (ref.startsWith('#')) {
      const code = (ref[1] === 'x' || ref[1] === 'X') ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      return (code > 0 && code <= 0x10ffff) ? String.fromCodePoint(code) : m;
    }
    return Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, ref) ? NAMED_ENTITIES[ref] : m;
  });
}
