/**
 * Tokenizer unit tests
 *
 * Each token class of the CLI wire format, plus lexical failures.
 */

import { describe, it, expect } from 'vitest';
import { tokenize, positionAt, type Token } from '../../src/protocol/tokenizer.js';
import { CliParseError } from '../../src/types/errors.js';

function types(tokens: Token[]): string[] {
  return tokens.map((t) => t.type);
}

function lexFailure(input: string): CliParseError {
  try {
    tokenize(input);
  } catch (err) {
    if (err instanceof CliParseError) {
      return err;
    }
    throw err;
  }
  throw new Error(`expected '${input}' to fail`);
}

describe('tokenize', () => {
  describe('Atoms', () => {
    it('should read atoms with letters, digits and atom symbols', () => {
      const tokens = tokenize('mail1.example.com <50.123@mail1.example.com> a-b_c');
      expect(types(tokens)).toEqual(['atom', 'atom', 'atom']);
      expect(tokens.map((t) => t.text)).toEqual([
        'mail1.example.com',
        '<50.123@mail1.example.com>',
        'a-b_c'
      ]);
    });

    it('should accept non-ASCII characters in atoms', () => {
      const tokens = tokenize('Zürich');
      expect(tokens).toHaveLength(1);
      expect(tokens[0].text).toBe('Zürich');
    });

    it('should read "login OK, proceed" as a single atom', () => {
      const tokens = tokenize('200 login OK, proceed');
      expect(tokens.map((t) => t.text)).toEqual(['200', 'login OK, proceed']);
      expect(types(tokens)).toEqual(['atom', 'atom']);
    });

    it('should mark whether whitespace precedes a token', () => {
      const tokens = tokenize('a (b)');
      expect(tokens.map((t) => t.spaced)).toEqual([true, true, false, false]);
    });
  });

  describe('Quoted strings', () => {
    it('should decode escapes into the value and keep the lexeme', () => {
      const [token] = tokenize('"say \\"hi\\"\\e"');
      expect(token.type).toBe('quoted');
      expect(token.text).toBe('"say \\"hi\\"\\e"');
      if (token.type === 'quoted') {
        expect(token.value).toBe('say "hi"\r\n');
      }
    });

    it('should read an empty quoted string', () => {
      const [token] = tokenize('""');
      expect(token).toMatchObject({ type: 'quoted', value: '' });
    });

    it('should reject an unterminated quoted string', () => {
      const err = lexFailure('200 "abc');
      expect(err.message).toContain('unterminated quoted string');
      expect(err.column).toBe(5);
    });

    it('should reject a quoted string ending in a bare backslash', () => {
      expect(() => tokenize('"abc\\')).toThrow(CliParseError);
    });
  });

  describe('Hash literals', () => {
    it('should parse integers in all four radixes', () => {
      const values = tokenize('#-234657 #0x17EF #0o45374 #-0b1000111000 #0')
        .map((t) => (t.type === 'integer' ? t.value : undefined));
      expect(values).toEqual([-234657, 6127, 19196, -568, 0]);
    });

    it('should parse #NULL#', () => {
      expect(types(tokenize('#NULL#'))).toEqual(['null']);
    });

    it('should parse timestamps', () => {
      const tokens = tokenize('#TFUTURE #TPAST #T24-12-2024 #T24-12-2024_13:05:59');
      expect(tokens.map((t) => (t.type === 'timestamp' ? t.value : undefined))).toEqual([
        'FUTURE',
        'PAST',
        '24-12-2024',
        '24-12-2024_13:05:59'
      ]);
    });

    it('should parse IPv4 addresses with and without port', () => {
      const [plain, withPort] = tokenize('#I10.0.44.55 #I10.0.44.55:25');
      expect(plain).toMatchObject({ type: 'ip', address: '10.0.44.55' });
      expect(plain).not.toHaveProperty('port');
      expect(withPort).toMatchObject({ type: 'ip', address: '10.0.44.55', port: 25 });
    });

    it('should parse IPv6 addresses including the compressed form', () => {
      const [full, compressed, bracketed] = tokenize('#I2001:db8:0:0:0:0:0:1 #I::1 #I[fe80::1]:8010');
      expect(full).toMatchObject({ type: 'ip', address: '2001:db8:0:0:0:0:0:1' });
      expect(compressed).toMatchObject({ type: 'ip', address: '::1' });
      expect(bracketed).toMatchObject({ type: 'ip', address: 'fe80::1', port: 8010 });
    });

    it('should reject malformed hash literals', () => {
      expect(() => tokenize('#')).toThrow(CliParseError);
      expect(() => tokenize('#abc')).toThrow(CliParseError);
      expect(() => tokenize('#0x')).toThrow(CliParseError);
      expect(() => tokenize('#NULL')).toThrow(CliParseError);
      expect(() => tokenize('#T2024')).toThrow(CliParseError);
      expect(() => tokenize('#I999.1.1.1')).toThrow(CliParseError);
      expect(() => tokenize('#I1.2.3.4:70000')).toThrow(CliParseError);
    });

    it('should keep integers beyond the safe range as bigint', () => {
      const values = tokenize('#9007199254740991 #9007199254740993 #-9007199254740993')
        .map((t) => (t.type === 'integer' ? t.value : undefined));
      expect(values).toEqual([9007199254740991, 9007199254740993n, -9007199254740993n]);
    });

    it('should accept the full signed 64-bit range', () => {
      const values = tokenize('#9223372036854775807 #-9223372036854775807 #-9223372036854775808 #0x7FFFFFFFFFFFFFFF')
        .map((t) => (t.type === 'integer' ? t.value : undefined));
      expect(values).toEqual([
        9223372036854775807n,
        -9223372036854775807n,
        -9223372036854775808n,
        9223372036854775807n
      ]);
    });

    it('should reject integers outside the signed 64-bit range', () => {
      expect(lexFailure('200 #9223372036854775808').message).toBe(
        "Lexer error on line 1 col 5: integer literal outside the 64-bit range; at '#9223372036854775808'"
      );
      expect(() => tokenize('#-9223372036854775809')).toThrow(CliParseError);
      expect(() => tokenize('#0x8000000000000000')).toThrow(CliParseError);
    });
  });

  describe('Data blocks', () => {
    it('should decode base64 ignoring whitespace', () => {
      const [token] = tokenize('[SGVs bG8=\r\n]');
      expect(token.type).toBe('data');
      if (token.type === 'data') {
        expect(token.value.toString('utf8')).toBe('Hello');
      }
    });

    it('should read an empty data block', () => {
      const [token] = tokenize('[]');
      expect(token.type).toBe('data');
      if (token.type === 'data') {
        expect(token.value.length).toBe(0);
      }
    });

    it('should only allow space, tab, CR and LF as whitespace', () => {
      expect(lexFailure('[aGk=\f]').message).toContain("invalid character '\f'");
      expect(() => tokenize('[aGk=\v]')).toThrow(CliParseError);
      expect(() => tokenize('[aG\u00a0k=]')).toThrow(CliParseError);
      expect(() => tokenize('[aG\u2028k=]')).toThrow(CliParseError);
    });

    it('should reject non-base64 characters and unterminated blocks', () => {
      expect(lexFailure('[abc!]').message).toContain("invalid character '!'");
      expect(lexFailure('[abc').message).toContain('unterminated data block');
    });
  });

  describe('Punctuation and whitespace', () => {
    it('should emit structural punctuation and skip whitespace', () => {
      const tokens = tokenize(' {A = (1 ,2) ;}\t');
      expect(tokens.map((t) => t.text)).toEqual(['{', 'A', '=', '(', '1', ',', '2', ')', ';', '}']);
    });

    it('should reject characters outside every token class', () => {
      const err = lexFailure('200 a!b');
      expect(err).toBeInstanceOf(CliParseError);
      expect(err.line).toBe(1);
      expect(err.column).toBe(6);
      expect(err.fragment).toBe('!b');
      expect(err.rawData).toBe('200 a!b');
    });
  });
});

describe('positionAt', () => {
  it('should report 1-based line and column across newlines', () => {
    expect(positionAt('ab\ncd', 4)).toEqual({ line: 2, column: 2, fragment: 'd' });
  });
});
