/**
 * CLI Response Parser
 *
 * Recursive-descent parser over the token stream. Builds the value tree
 * of a response line and extracts its leading status code.
 *
 * @packageDocumentation
 */

import { tokenize, positionAt, type Token } from './tokenizer.js';
import type { CliArray, CliDictionary, CliValue } from '../types/value.js';
import type { ParsedResponse } from '../types/protocol.js';
import { CliParseError } from '../types/errors.js';

const STATUS_CODE = /^\d+$/;

const INT32_MAX = 2 ** 31 - 1;

/**
 * Converts a non-structural token to its value
 */
function tokenToValue(token: Token): CliValue | null {
  switch (token.type) {
    case 'atom':
      return { kind: 'string', value: token.text, quoted: false };
    case 'quoted':
      return { kind: 'string', value: token.value, quoted: true };
    case 'integer':
      return { kind: 'integer', value: token.value };
    case 'null':
      return { kind: 'null' };
    case 'timestamp':
      return { kind: 'timestamp', value: token.value };
    case 'ip':
      return token.port === undefined
        ? { kind: 'ip', address: token.address }
        : { kind: 'ip', address: token.address, port: token.port };
    case 'data':
      return { kind: 'data', value: token.value };
    case 'punct':
      return null;
  }
}

class Parser {
  private index = 0;

  constructor(
    private readonly input: string,
    private readonly tokens: Token[]
  ) {}

  /**
   * cliData: objects separated by whitespace, then end of input
   */
  parseData(): CliValue[] {
    const values: CliValue[] = [];

    while (this.index < this.tokens.length) {
      const token = this.tokens[this.index];
      if (values.length > 0 && !token.spaced) {
        throw this.error(`extraneous input '${token.text}' expecting whitespace`, token);
      }
      values.push(this.parseObject());
    }

    return values;
  }

  private parseObject(): CliValue {
    const token = this.next('an object');

    if (token.type === 'punct') {
      if (token.text === '(') {
        return this.parseArray();
      }
      if (token.text === '{') {
        return this.parseDictionary();
      }
      throw this.error(`unexpected '${token.text}'`, token);
    }

    const value = tokenToValue(token);
    if (!value) {
      throw this.error(`unexpected '${token.text}'`, token);
    }
    return value;
  }

  /**
   * array: '(' [object (',' object)*] ')'
   */
  private parseArray(): CliArray {
    const items: CliValue[] = [];

    if (this.peekPunct(')')) {
      this.index++;
      return { kind: 'array', items };
    }

    for (;;) {
      items.push(this.parseObject());
      const separator = this.next("',' or ')'");
      if (separator.type === 'punct' && separator.text === ')') {
        return { kind: 'array', items };
      }
      if (separator.type !== 'punct' || separator.text !== ',') {
        throw this.error(`mismatched input '${separator.text}' expecting ',' or ')'`, separator);
      }
    }
  }

  /**
   * dictionary: '{' (key '=' object ';')* '}'
   */
  private parseDictionary(): CliDictionary {
    const entries: (readonly [string, CliValue])[] = [];

    for (;;) {
      const keyToken = this.next("a key or '}'");
      if (keyToken.type === 'punct' && keyToken.text === '}') {
        return { kind: 'dictionary', entries };
      }

      let key: string;
      if (keyToken.type === 'atom') {
        key = keyToken.text;
      } else if (keyToken.type === 'quoted') {
        key = keyToken.value;
      } else {
        throw this.error(`mismatched input '${keyToken.text}' expecting a key`, keyToken);
      }

      this.expectPunct('=');
      const value = this.parseObject();
      this.expectPunct(';');
      entries.push([key, value]);
    }
  }

  private peekPunct(text: string): boolean {
    const token = this.tokens[this.index];
    return token !== undefined && token.type === 'punct' && token.text === text;
  }

  private expectPunct(text: string): void {
    const token = this.next(`'${text}'`);
    if (token.type !== 'punct' || token.text !== text) {
      throw this.error(`mismatched input '${token.text}' expecting '${text}'`, token);
    }
  }

  private next(expecting: string): Token {
    const token = this.tokens[this.index];
    if (token === undefined) {
      throw this.error(`missing ${expecting} at end of input`);
    }
    this.index++;
    return token;
  }

  private error(message: string, token?: Token): CliParseError {
    const position = positionAt(this.input, token ? token.offset : this.input.length);
    return new CliParseError(
      `Parser error on line ${position.line} col ${position.column}: ${message}`,
      this.input,
      position
    );
  }
}

/**
 * Parses a CLI value sequence (the body of a response line)
 *
 * @param input - Wire text
 * @returns Top-level values in order
 * @throws CliParseError on any lexical or grammar violation
 */
export function parseValues(input: string): CliValue[] {
  return new Parser(input, tokenize(input)).parseData();
}

/**
 * Parses a single wire value, e.g. a dictionary literal
 *
 * @throws CliParseError unless the input holds exactly one object
 */
export function parseValue(input: string): CliValue {
  const values = parseValues(input);
  if (values.length !== 1) {
    throw new CliParseError(`Expected exactly one object, found ${values.length}`, input);
  }
  return values[0];
}

/**
 * Reads the status code from the first top-level value
 *
 * @returns The code, or -1 unless the value is an unquoted decimal atom
 *   that fits a signed 32-bit integer
 */
export function getStatusCode(values: readonly CliValue[]): number {
  const first = values[0];
  if (first === undefined || first.kind !== 'string' || first.quoted || !STATUS_CODE.test(first.value)) {
    return -1;
  }
  const code = parseInt(first.value, 10);
  return code <= INT32_MAX ? code : -1;
}

/**
 * Parses a complete response line
 *
 * A line without a leading status code parses fine and reports -1;
 * only malformed wire text throws.
 *
 * @param line - Raw response line (without line terminator)
 * @returns ParsedResponse with status code, value tree and raw text
 * @throws CliParseError on malformed input
 */
export function parseResponse(line: string): ParsedResponse {
  const root = parseValues(line);
  return {
    statusCode: getStatusCode(root),
    root,
    raw: line
  };
}
