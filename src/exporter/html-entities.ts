/**
 * Character reference decoding for raw note fields.
 * Fields come back from the host HTML-escaped (&nbsp;, &eacute;, &#39; ...).
 */

import { decodeHTML } from 'entities';

/**
 * Decodes the full HTML5 reference set in a single pass, so '&amp;lt;'
 * becomes '&lt;' and not '<'. Legacy references without a trailing ';'
 * (&copy 2024) are decoded too; unknown names are kept as written and
 * invalid code points become U+FFFD.
 */
export function decodeHtmlEntities(text: string): string {
  if (!text.includes('&')) {
    return text;
  }
  return decodeHTML(text);
}
