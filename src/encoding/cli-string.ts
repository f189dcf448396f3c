/**
 * CLI string codec
 *
 * Converts between program strings and the atomic/quoted wire form.
 * Strings are quoted only when they hold a character outside the atom set.
 */

import { base64Encode } from './base64.js';

/**
 * Characters that may appear in an unquoted encoded string
 */
const ATOM_CHAR = /^[A-Za-z0-9@_-]$/;

const HEX_CODE = /^[0-9A-Fa-f]{3,6}$/;

function isDecimalDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

/**
 * Encodes a string for use as a command argument
 *
 * @param value - The string to encode
 * @returns The string, escaped and quoted when needed; empty input gives ''
 */
export function encodeString(value: string | null | undefined): string {
  if (!value) {
    return '';
  }

  let result = '';
  let requiresQuotes = false;
  let lastWasCarriageReturn = false;

  for (const char of value) {
    if (!ATOM_CHAR.test(char)) {
      requiresQuotes = true;
    }

    if (char === '\r') {
      result += '\\r';
      lastWasCarriageReturn = true;
      continue;
    }

    if (char === '\n' && lastWasCarriageReturn) {
      // CRLF travels as the single \e escape
      result = result.slice(0, -2) + '\\e';
    } else if (char === '\n') {
      result += '\\n';
    } else if (char === '\\') {
      result += '\\\\';
    } else if (char === '"') {
      result += '\\"';
    } else if (char === '\t') {
      result += '\\t';
    } else {
      result += char;
    }
    lastWasCarriageReturn = false;
  }

  return requiresQuotes ? `"${result}"` : result;
}

/**
 * Decodes an encoded string back to program text
 *
 * Unknown or malformed escapes are kept verbatim, backslash included.
 *
 * @param encoded - Quoted or unquoted wire string
 * @returns Decoded text
 */
export function decodeString(encoded: string | null | undefined): string {
  if (!encoded) {
    return '';
  }

  let s = encoded;
  if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) {
    s = s.slice(1, -1);
  }

  let result = '';
  let i = 0;

  while (i < s.length) {
    const char = s[i];

    if (char !== '\\' || i + 1 >= s.length) {
      result += char;
      i++;
      continue;
    }

    const next = s[i + 1];
    switch (next) {
      case '\\':
        result += '\\';
        i += 2;
        continue;
      case '"':
        result += '"';
        i += 2;
        continue;
      case 'r':
        result += '\r';
        i += 2;
        continue;
      case 'n':
        result += '\n';
        i += 2;
        continue;
      case 'e':
        result += '\r\n';
        i += 2;
        continue;
      case 't':
        result += '\t';
        i += 2;
        continue;
      case 'u': {
        // \u'HHHHHH' with 3 to 6 hex digits
        if (s[i + 2] === "'") {
          const end = s.indexOf("'", i + 3);
          const hex = end === -1 ? '' : s.slice(i + 3, end);
          const codePoint = parseInt(hex, 16);
          if (HEX_CODE.test(hex) && codePoint <= 0x10ffff) {
            result += String.fromCodePoint(codePoint);
            i = end + 1;
            continue;
          }
        }
        break;
      }
      default:
        // \DDD decimal character code
        if (isDecimalDigit(next) && isDecimalDigit(s[i + 2]) && isDecimalDigit(s[i + 3])) {
          result += String.fromCharCode(parseInt(s.slice(i + 1, i + 4), 10));
          i += 4;
          continue;
        }
    }

    result += char + next;
    i += 2;
  }

  return result;
}

/**
 * Values that can be encoded as command arguments
 */
export type EncodableValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | Buffer
  | EncodableValue[]
  | Map<string, EncodableValue>
  | { [key: string]: EncodableValue };

function encodeEntries(entries: Iterable<[string, EncodableValue]>): string {
  let result = '{';
  for (const [key, item] of entries) {
    result += `${encodeString(key)}=${encodeObject(item)};`;
  }
  return result + '}';
}

/**
 * Encodes a value tree as a command argument
 *
 * Mappings become dictionaries, arrays become arrays, buffers become
 * data blocks and anything else goes through {@link encodeString}.
 *
 * @example
 * ```typescript
 * encodeObject({ MaxAccounts: 3, Aliases: ['a', 'b'] });
 * // => '{MaxAccounts=3;Aliases=(a,b);}'
 * ```
 */
export function encodeObject(value: EncodableValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return encodeString(value);
  }
  if (Buffer.isBuffer(value)) {
    return `[${base64Encode(value)}]`;
  }
  if (Array.isArray(value)) {
    return `(${value.map((item) => encodeObject(item)).join(',')})`;
  }
  if (value instanceof Map) {
    return encodeEntries(value.entries());
  }
  if (typeof value === 'object') {
    return encodeEntries(Object.entries(value));
  }
  return encodeString(String(value));
}
