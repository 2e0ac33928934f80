const HEX = '0123456789abcdef';
const utf8 = new TextDecoder('utf-8');

/**
 * Quotes and escapes a string as a JSON string literal that is also safe to
 * embed in HTML or evaluate as JavaScript.
 *
 * Control characters, `"` and `\` are escaped as JSON requires. `<`, `>` and
 * `&` become `\u003c`, `\u003e` and `\u0026`, and U+2028/U+2029 are always
 * escaped. Malformed input (a lone surrogate in a string, an invalid UTF-8
 * byte in a buffer) becomes `\ufffd`.
 */
export function sanitizeString(input: string | Uint8Array): string {
  return typeof input === 'string' ? sanitizeUtf16(input) : sanitizeUtf8(input);
}

function isSafeAscii(b: number): boolean {
  return b >= 0x20 && b !== 0x5c && b !== 0x22 && b !== 0x3c && b !== 0x3e && b !== 0x26;
}

function escapeAscii(b: number): string {
  switch (b) {
    case 0x5c:
      return '\\\\';
    case 0x22:
      return '\\"';
    case 0x0a:
      return '\\n';
    case 0x0d:
      return '\\r';
    case 0x09:
      return '\\t';
    default:
      return '\\u00' + HEX[b >> 4] + HEX[b & 0xf];
  }
}

function sanitizeUtf16(s: string): string {
  const out: string[] = ['"'];
  let start = 0;
  let i = 0;

  while (i < s.length) {
    const c = s.charCodeAt(i);
    let escaped: string | null = null;
    let width = 1;

    if (c < 0x80) {
      if (!isSafeAscii(c)) {
        escaped = escapeAscii(c);
      }
    } else if (c >= 0xd800 && c <= 0xdfff) {
      const next = s.charCodeAt(i + 1);
      if (c <= 0xdbff && next >= 0xdc00 && next <= 0xdfff) {
        width = 2;
      } else {
        escaped = '\\ufffd';
      }
    } else if (c === 0x2028 || c === 0x2029) {
      escaped = '\\u202' + HEX[c & 0xf];
    }

    if (escaped !== null) {
      if (start < i) out.push(s.substring(start, i));
      out.push(escaped);
      start = i + width;
    }
    i += width;
  }

  if (start < s.length) out.push(s.substring(start));
  out.push('"');
  return out.join('');
}

function sanitizeUtf8(bytes: Uint8Array): string {
  const out: string[] = ['"'];
  let start = 0;
  let i = 0;

  const flush = (end: number) => {
    if (start < end) out.push(utf8.decode(bytes.subarray(start, end)));
  };

  while (i < bytes.length) {
    const b = bytes[i];
    if (b < 0x80) {
      if (isSafeAscii(b)) {
        i++;
        continue;
      }
      flush(i);
      out.push(escapeAscii(b));
      i++;
      start = i;
      continue;
    }

    const rune = decodeRune(bytes, i);
    if (rune.codePoint < 0) {
      flush(i);
      out.push('\\ufffd');
      i++;
      start = i;
      continue;
    }
    if (rune.codePoint === 0x2028 || rune.codePoint === 0x2029) {
      flush(i);
      out.push('\\u202' + HEX[rune.codePoint & 0xf]);
      i += rune.size;
      start = i;
      continue;
    }
    i += rune.size;
  }

  flush(bytes.length);
  out.push('"');
  return out.join('');
}

interface Rune {
  /** -1 when the bytes at the offset do not start a valid sequence. */
  codePoint: number;
  size: number;
}

const INVALID: Rune = { codePoint: -1, size: 1 };

// Accepts only shortest-form sequences outside the surrogate range.
function decodeRune(bytes: Uint8Array, i: number): Rune {
  const b0 = bytes[i];
  const cont = (offset: number, lo = 0x80, hi = 0xbf): number => {
    if (i + offset >= bytes.length) return -1;
    const b = bytes[i + offset];
    return b >= lo && b <= hi ? b & 0x3f : -1;
  };

  if (b0 >= 0xc2 && b0 <= 0xdf) {
    const c1 = cont(1);
    if (c1 < 0) return INVALID;
    return { codePoint: ((b0 & 0x1f) << 6) | c1, size: 2 };
  }

  if (b0 >= 0xe0 && b0 <= 0xef) {
    const lo = b0 === 0xe0 ? 0xa0 : 0x80;
    const hi = b0 === 0xed ? 0x9f : 0xbf;
    const c1 = cont(1, lo, hi);
    if (c1 < 0) return INVALID;
    const c2 = cont(2);
    if (c2 < 0) return INVALID;
    return { codePoint: ((b0 & 0x0f) << 12) | (c1 << 6) | c2, size: 3 };
  }

  if (b0 >= 0xf0 && b0 <= 0xf4) {
    const lo = b0 === 0xf0 ? 0x90 : 0x80;
    const hi = b0 === 0xf4 ? 0x8f : 0xbf;
    const c1 = cont(1, lo, hi);
    if (c1 < 0) return INVALID;
    const c2 = cont(2);
    if (c2 < 0) return INVALID;
    const c3 = cont(3);
    if (c3 < 0) return INVALID;
    return { codePoint: ((b0 & 0x07) << 18) | (c1 << 12) | (c2 << 6) | c3, size: 4 };
  }

  return INVALID;
}
