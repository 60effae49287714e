/**
 * Name Sanitizer
 * Turns deck names into ASCII, lowercase tokens that are safe as path segments.
 */

export const EMPTY_TOKEN = '_';

/**
 * 'Économie & Gestion' → 'economie_gestion'
 * Punctuation-only input yields ''.
 */
export function sanitize(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '')
    .replace(/[^\w\s-]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[-\s]+/g, '_');
}

/**
 * sanitize() for use as a path segment: an empty token becomes '_'.
 */
export function toPathToken(text: string): string {
  return sanitize(text) || EMPTY_TOKEN;
}
