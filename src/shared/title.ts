/**
 * Page title codec
 *
 * Titles travel in two forms: the display form ("AT&T Park") used as cache key
 * and the URL path form ("AT%26T_Park") used by /wiki/ links. Every key the
 * oracle stores is the output of normalizeTitle().
 */

import { InvalidTitleError } from './errors.js';

const ENCODINGS: ReadonlyArray<readonly [string, string]> = [
  [' ', '_'],
  ['!', '%21'],
  ['"', '%22'],
  ['&', '%26'],
  ["'", '%27'],
  ['*', '%2A'],
  ['+', '%2B'],
  [',', '%2C'],
  ['/', '%2F'],
  [';', '%3B'],
  ['=', '%3D'],
  ['?', '%3F'],
  ['@', '%40'],
  ['\\', '%5C'],
  ['`', '%60'],
  ['–', '%E2%80%93'],
];

/** A `%` that does not already start a `%XX` escape. */
const STRAY_PERCENT = /%(?![0-9a-fA-F]{2})/g;

const ILLEGAL_CHARS = /[{}<>[\]|]/;

/**
 * Percent-encode a title the way the site writes it in article URLs.
 * Existing `%XX` sequences are left alone, so encoding twice does not
 * double-escape.
 */
export function encodeTitle(title: string): string {
  let encoded = title;
  for (const [ch, escape] of ENCODINGS) {
    encoded = encoded.split(ch).join(escape);
  }
  return encoded.replace(STRAY_PERCENT, '%25');
}

/** Reverse of encodeTitle(); also decodes any UTF-8 percent escape. */
export function decodeTitle(encoded: string): string {
  const spaced = encoded.replace(/_/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    // malformed escape somewhere; undo only the escapes we know about
    let decoded = spaced;
    for (const [ch, escape] of ENCODINGS) {
      if (ch === ' ') continue;
      decoded = decoded.split(escape).join(ch);
    }
    return decoded.split('%25').join('%');
  }
}

/**
 * Canonical cache key for a title: fragment and leading colon removed,
 * underscores and whitespace runs collapsed to one space, percent escapes
 * decoded, first character upper-cased, NFC.
 *
 * @throws InvalidTitleError for empty titles or titles with `{}<>[]|`
 */
export function normalizeTitle(raw: string): string {
  let title = raw;
  const hash = title.indexOf('#');
  if (hash >= 0) {
    title = title.slice(0, hash);
  }
  if (title.startsWith(':')) {
    title = title.slice(1);
  }
  title = decodeTitle(title).replace(/\s+/g, ' ').trim();

  if (title.length === 0) {
    throw new InvalidTitleError(raw, 'empty or whitespace-only title');
  }
  if (ILLEGAL_CHARS.test(title)) {
    throw new InvalidTitleError(raw, 'contains one of { } < > [ ] |');
  }

  return (title.charAt(0).toUpperCase() + title.slice(1)).normalize('NFC');
}

/** normalizeTitle() that yields null instead of throwing. */
export function tryNormalizeTitle(raw: string): string | null {
  try {
    return normalizeTitle(raw);
  } catch (err) {
    if (err instanceof InvalidTitleError) return null;
    throw err;
  }
}

/** Case-insensitive comparison of two normalized titles. */
export function sameTitle(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
