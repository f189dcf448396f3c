/**
 * CLI Response Tokenizer
 *
 * Splits a CLI response line into classified tokens: atoms, quoted strings,
 * `#` literals (integer, null, timestamp, IP address), data blocks and
 * structural punctuation. Any input matching no token class rejects the
 * whole line.
 *
 * @packageDocumentation
 */

import { isIPv4, isIPv6 } from 'net';
import { base64Decode } from '../encoding/base64.js';
import { decodeString } from '../encoding/cli-string.js';
import { CliParseError, type ParsePosition } from '../types/errors.js';

/**
 * Token types in CLI responses
 */
export type TokenType =
  | 'atom'
  | 'quoted'
  | 'integer'
  | 'null'
  | 'timestamp'
  | 'ip'
  | 'data'
  | 'punct';

export type Punctuation = '(' | ')' | '{' | '}' | '=' | ';' | ',';

interface TokenBase {
  /** Lexeme as it appears in the input */
  text: string;
  /** Offset of the first character */
  offset: number;
  /** Whether whitespace (or the start of input) precedes the token */
  spaced: boolean;
}

/**
 * A token from a CLI response
 */
export type Token =
  | (TokenBase & { type: 'atom' })
  | (TokenBase & { type: 'quoted'; value: string })
  | (TokenBase & { type: 'integer'; value: number | bigint })
  | (TokenBase & { type: 'null' })
  | (TokenBase & { type: 'timestamp'; value: string })
  | (TokenBase & { type: 'ip'; address: string; port?: number })
  | (TokenBase & { type: 'data'; value: Buffer })
  | (TokenBase & { type: 'punct'; text: Punctuation });

/**
 * Greeting text the server sends with an embedded comma
 */
const LOGIN_PROCEED = 'login OK, proceed';

const WHITESPACE = new Set([' ', '\t', '\r', '\n']);

const PUNCTUATION = new Set<string>(['(', ')', '{', '}', '=', ';', ',']);

const ATOM_SYMBOLS = new Set(['.', '-', '@', '_', '<', '>']);

const BASE64_CHAR = /[A-Za-z0-9+/= \t\r\n]/;

const TIMESTAMP = /FUTURE|PAST|\d{2}-\d{2}-\d{4}(?:_\d{2}:\d{2}:\d{2})?/y;
const IPV4 = /\d{1,3}(?:\.\d{1,3}){3}/y;
const IPV6 = /[0-9A-Fa-f:.]*:[0-9A-Fa-f:.]*/y;
const PORT = /:(\d{1,5})/y;

const RADIXES: ReadonlyArray<{ prefix: string; digits: RegExp }> = [
  { prefix: '0x', digits: /[0-9A-Fa-f]+/y },
  { prefix: '0o', digits: /[0-7]+/y },
  { prefix: '0b', digits: /[01]+/y }
];

const DECIMAL = /\d+/y;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

/**
 * Narrows a 64-bit integer to a number when it is exactly representable
 *
 * @returns number or bigint, or undefined outside the signed 64-bit range
 */
export function fromInt64(value: bigint): number | bigint | undefined {
  if (value < I64_MIN || value > I64_MAX) {
    return undefined;
  }
  const narrowed = Number(value);
  return Number.isSafeInteger(narrowed) ? narrowed : value;
}

function isPunctuation(char: string): char is Punctuation {
  return PUNCTUATION.has(char);
}

function isAtomChar(char: string): boolean {
  return (
    (char >= 'a' && char <= 'z') ||
    (char >= 'A' && char <= 'Z') ||
    (char >= '0' && char <= '9') ||
    ATOM_SYMBOLS.has(char) ||
    char.charCodeAt(0) >= 0x80
  );
}

/**
 * Runs a sticky pattern at the given offset
 */
function matchAt(pattern: RegExp, input: string, pos: number): RegExpExecArray | null {
  pattern.lastIndex = pos;
  return pattern.exec(input);
}

/**
 * Computes the 1-based line/column of an offset
 */
export function positionAt(input: string, offset: number): ParsePosition {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < input.length; i++) {
    if (input[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1, fragment: input.slice(offset, offset + 20) };
}

function lexError(message: string, input: string, offset: number): CliParseError {
  const position = positionAt(input, offset);
  return new CliParseError(
    `Lexer error on line ${position.line} col ${position.column}: ${message}; at '${position.fragment}'`,
    input,
    position
  );
}

/**
 * Tokenizes a CLI response line
 *
 * @param input - The response line to tokenize
 * @returns Tokens in input order; whitespace is not returned
 * @throws CliParseError on any character sequence no token class accepts
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let spaced = true;

  while (pos < input.length) {
    const char = input[pos];

    if (WHITESPACE.has(char)) {
      spaced = true;
      pos++;
      continue;
    }

    let result: { token: Token; pos: number };

    if (isPunctuation(char)) {
      result = { token: { type: 'punct', text: char, offset: pos, spaced }, pos: pos + 1 };
    } else if (char === '"') {
      result = parseQuotedString(input, pos, spaced);
    } else if (char === '#') {
      result = parseHashLiteral(input, pos, spaced);
    } else if (char === '[') {
      result = parseDataBlock(input, pos, spaced);
    } else if (input.startsWith(LOGIN_PROCEED, pos)) {
      result = {
        token: { type: 'atom', text: LOGIN_PROCEED, offset: pos, spaced },
        pos: pos + LOGIN_PROCEED.length
      };
    } else if (isAtomChar(char)) {
      result = parseAtom(input, pos, spaced);
    } else {
      throw lexError(`token recognition error at '${char}'`, input, pos);
    }

    tokens.push(result.token);
    pos = result.pos;
    spaced = false;
  }

  return tokens;
}

/**
 * Parses an atom (unquoted string)
 */
function parseAtom(input: string, startPos: number, spaced: boolean): { token: Token; pos: number } {
  let pos = startPos;
  while (pos < input.length && isAtomChar(input[pos])) {
    pos++;
  }
  return {
    token: { type: 'atom', text: input.slice(startPos, pos), offset: startPos, spaced },
    pos
  };
}

/**
 * Parses a quoted string starting at the given position
 */
function parseQuotedString(input: string, startPos: number, spaced: boolean): { token: Token; pos: number } {
  let pos = startPos + 1; // Skip opening quote

  while (pos < input.length) {
    const char = input[pos];

    if (char === '\\') {
      // An escape always consumes the following character
      pos += 2;
      continue;
    }

    if (char === '"') {
      const text = input.slice(startPos, pos + 1);
      return {
        token: { type: 'quoted', text, value: decodeString(text), offset: startPos, spaced },
        pos: pos + 1
      };
    }

    pos++;
  }

  throw lexError('unterminated quoted string', input, startPos);
}

/**
 * Parses a data block [base64]
 */
function parseDataBlock(input: string, startPos: number, spaced: boolean): { token: Token; pos: number } {
  let pos = startPos + 1; // Skip opening bracket

  while (pos < input.length && input[pos] !== ']') {
    if (!BASE64_CHAR.test(input[pos])) {
      throw lexError(`invalid character '${input[pos]}' in data block`, input, pos);
    }
    pos++;
  }

  if (pos >= input.length) {
    throw lexError('unterminated data block', input, startPos);
  }

  const content = input.slice(startPos + 1, pos);
  return {
    token: {
      type: 'data',
      text: input.slice(startPos, pos + 1),
      value: base64Decode(content),
      offset: startPos,
      spaced
    },
    pos: pos + 1
  };
}

/**
 * Parses the literals introduced by '#': #NULL#, #T..., #I..., and integers
 */
function parseHashLiteral(input: string, startPos: number, spaced: boolean): { token: Token; pos: number } {
  if (input.startsWith('#NULL#', startPos)) {
    return {
      token: { type: 'null', text: '#NULL#', offset: startPos, spaced },
      pos: startPos + 6
    };
  }

  const marker = input[startPos + 1];

  if (marker === 'T') {
    const match = matchAt(TIMESTAMP, input, startPos + 2);
    if (!match) {
      throw lexError('malformed timestamp', input, startPos);
    }
    const end = startPos + 2 + match[0].length;
    return {
      token: { type: 'timestamp', text: input.slice(startPos, end), value: match[0], offset: startPos, spaced },
      pos: end
    };
  }

  if (marker === 'I') {
    return parseIpAddress(input, startPos, spaced);
  }

  return parseInteger(input, startPos, spaced);
}

/**
 * Parses #[-]digits, #[-]0x.., #[-]0o.., #[-]0b..
 */
function parseInteger(input: string, startPos: number, spaced: boolean): { token: Token; pos: number } {
  let pos = startPos + 1;
  const negative = input[pos] === '-';
  if (negative) {
    pos++;
  }

  // BigInt reads the 0x/0o/0b prefixes itself
  let literal: string | null = null;

  for (const candidate of RADIXES) {
    if (input.startsWith(candidate.prefix, pos)) {
      const match = matchAt(candidate.digits, input, pos + 2);
      if (!match) {
        throw lexError(`missing digits after '${candidate.prefix}'`, input, startPos);
      }
      literal = candidate.prefix + match[0];
      pos += literal.length;
      break;
    }
  }

  if (literal === null) {
    const match = matchAt(DECIMAL, input, pos);
    if (!match) {
      throw lexError("malformed '#' literal", input, startPos);
    }
    literal = match[0];
    pos += literal.length;
  }

  const magnitude = BigInt(literal);
  const value = fromInt64(negative ? -magnitude : magnitude);
  if (value === undefined) {
    throw lexError('integer literal outside the 64-bit range', input, startPos);
  }

  return {
    token: { type: 'integer', text: input.slice(startPos, pos), value, offset: startPos, spaced },
    pos
  };
}

/**
 * Parses #I followed by an IPv4 address, a bare IPv6 address, or either
 * wrapped in brackets; an optional :port may follow IPv4 and bracketed forms.
 */
function parseIpAddress(input: string, startPos: number, spaced: boolean): { token: Token; pos: number } {
  let pos = startPos + 2;
  let address: string;
  let bracketed = false;

  if (input[pos] === '[') {
    const close = input.indexOf(']', pos);
    if (close === -1) {
      throw lexError('unterminated address', input, startPos);
    }
    address = input.slice(pos + 1, close);
    if (!isIPv4(address) && !isIPv6(address)) {
      throw lexError(`invalid IP address '${address}'`, input, startPos);
    }
    bracketed = true;
    pos = close + 1;
  } else {
    const v4 = matchAt(IPV4, input, pos);
    const v6 = v4 ? null : matchAt(IPV6, input, pos);
    const candidate = v4?.[0] ?? v6?.[0];
    if (candidate === undefined || !(v4 ? isIPv4(candidate) : isIPv6(candidate))) {
      throw lexError('invalid IP address', input, startPos);
    }
    address = candidate;
    pos += candidate.length;
  }

  let port: number | undefined;
  if (bracketed || isIPv4(address)) {
    const match = matchAt(PORT, input, pos);
    if (match) {
      port = parseInt(match[1], 10);
      if (port > 65535) {
        throw lexError(`invalid port ${port}`, input, pos);
      }
      pos += match[0].length;
    }
  }

  return {
    token: {
      type: 'ip',
      text: input.slice(startPos, pos),
      address,
      ...(port !== undefined ? { port } : {}),
      offset: startPos,
      spaced
    },
    pos
  };
}
