import { invariant } from '../diagnostics/errors.js';

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');

const BACKSLASH = 0x5c;
const QUOTE = 0x22;

function hexValue(b: number | undefined): number | undefined {
  if (b === undefined) return undefined;
  if (b >= 0x30 && b <= 0x39) return b - 0x30;
  if (b >= 0x41 && b <= 0x46) return b - 0x41 + 10;
  if (b >= 0x61 && b <= 0x66) return b - 0x61 + 10;
  return undefined;
}

/**
 * Replace escape sequences in `s` with the bytes they denote.
 *
 * - `\XX` (two hex digits, either case) becomes the byte `0xXX`.
 * - `\\` becomes a single backslash.
 * - A backslash followed by anything else is kept as-is.
 *
 * Everything else is taken as its UTF-8 encoding.
 */
export function unescapeBytes(s: string): Uint8Array {
  const src = utf8Encoder.encode(s);
  if (!src.includes(BACKSLASH)) return src;

  const out: number[] = [];
  for (let i = 0; i < src.length; i++) {
    const b = src[i];
    if (b === undefined) break;
    if (b === BACKSLASH) {
      if (src[i + 1] === BACKSLASH) {
        out.push(BACKSLASH);
        i += 1;
        continue;
      }
      const hi = hexValue(src[i + 1]);
      const lo = hexValue(src[i + 2]);
      if (hi !== undefined && lo !== undefined) {
        out.push(hi * 16 + lo);
        i += 2;
        continue;
      }
    }
    out.push(b);
  }
  return Uint8Array.from(out);
}

/**
 * Inverse of {@link unescapeBytes}: printable ASCII other than `"` and `\` is kept, a backslash is
 * doubled, and every other byte becomes `\XX` with upper-case hex digits.
 */
export function escapeBytes(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    if (b === BACKSLASH) {
      out += '\\\\';
    } else if (b >= 0x20 && b <= 0x7e && b !== QUOTE) {
      out += String.fromCharCode(b);
    } else {
      out += `\\${b.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

/** `"` + {@link escapeBytes}(bytes) + `"`. */
export function quote(bytes: Uint8Array): string {
  return `"${escapeBytes(bytes)}"`;
}

export function isQuoted(s: string): boolean {
  return s.length >= 2 && s.startsWith('"') && s.endsWith('"');
}

/**
 * Strip the surrounding quotes of `s` and unescape its contents.
 *
 * `s` must be quoted; the grammar guarantees this for string literals.
 */
export function unquoteBytes(s: string): Uint8Array {
  invariant(isQuoted(s), `invalid quoted string ${JSON.stringify(s)}; missing surrounding quotes`);
  return unescapeBytes(s.slice(1, -1));
}

/**
 * Decode a possibly quoted identifier body. Unquoted spellings are returned unchanged.
 */
export function unquoteName(s: string): string {
  if (!isQuoted(s)) return s;
  return decodeUtf8(unquoteBytes(s));
}

export function decodeUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}
