/**
 * Property-based tests for the response grammar
 *
 * Any value tree, rendered to wire text, parses back to an equal tree.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { encodeString } from '../../src/encoding/cli-string.js';
import { encodeValue } from '../../src/encoding/value-encoder.js';
import { parseResponse, parseValue, parseValues } from '../../src/protocol/parser.js';
import { fromInt64 } from '../../src/protocol/tokenizer.js';
import type { CliValue } from '../../src/types/value.js';

const pad = (width: number) => (n: number) => String(n).padStart(width, '0');

const stringValue = fc.string().map(
  (value): CliValue => ({ kind: 'string', value, quoted: value === '' || encodeString(value) !== value })
);

const int64Value = fc
  .bigInt({ min: -(2n ** 63n), max: 2n ** 63n - 1n })
  .map((value): CliValue => ({ kind: 'integer', value: fromInt64(value) ?? value }));
const integerValue = fc.oneof(
  fc.maxSafeInteger().map((value): CliValue => ({ kind: 'integer', value })),
  int64Value
);

const nullValue = fc.constant<CliValue>({ kind: 'null' });

const timestampValue = fc
  .oneof(
    fc.constantFrom('FUTURE', 'PAST'),
    fc
      .tuple(
        fc.integer({ min: 1, max: 28 }).map(pad(2)),
        fc.integer({ min: 1, max: 12 }).map(pad(2)),
        fc.integer({ min: 1970, max: 2100 }).map(pad(4)),
        fc.option(
          fc
            .tuple(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }), fc.integer({ min: 0, max: 59 }))
            .map(([h, m, s]) => `_${pad(2)(h)}:${pad(2)(m)}:${pad(2)(s)}`),
          { nil: '' }
        )
      )
      .map(([day, month, year, time]) => `${day}-${month}-${year}${time}`)
  )
  .map((value): CliValue => ({ kind: 'timestamp', value }));

const ipv6Address = fc
  .array(fc.hexaString({ minLength: 1, maxLength: 4 }), { minLength: 8, maxLength: 8 })
  .map((groups) => groups.join(':'));

const ipValue = fc
  .tuple(fc.oneof(fc.ipV4(), ipv6Address), fc.option(fc.integer({ min: 0, max: 65535 }), { nil: undefined }))
  .map(([address, port]): CliValue =>
    port === undefined ? { kind: 'ip', address } : { kind: 'ip', address, port }
  );

const dataValue = fc
  .uint8Array({ maxLength: 64 })
  .map((bytes): CliValue => ({ kind: 'data', value: Buffer.from(bytes) }));

const scalarValue = fc.oneof(stringValue, integerValue, nullValue, timestampValue, ipValue, dataValue);

const valueTree: fc.Memo<CliValue> = fc.memo((depth) => {
  if (depth <= 1) {
    return scalarValue;
  }
  return fc.oneof(
    scalarValue,
    fc.array(valueTree(depth - 1), { maxLength: 4 }).map((items): CliValue => ({ kind: 'array', items })),
    fc
      .array(fc.tuple(fc.string(), valueTree(depth - 1)), { maxLength: 4 })
      .map((entries): CliValue => ({ kind: 'dictionary', entries }))
  );
});

describe('Wire rendering round-trip', () => {
  it('parseValue(encodeValue(v)) equals v', () => {
    fc.assert(
      fc.property(valueTree(4), (value) => {
        expect(parseValue(encodeValue(value))).toEqual(value);
      }),
      { numRuns: 300 }
    );
  });

  it('whitespace-separated top-level values parse back in order', () => {
    fc.assert(
      fc.property(fc.array(valueTree(3), { maxLength: 5 }), (values) => {
        expect(parseValues(values.map(encodeValue).join(' '))).toEqual(values);
      }),
      { numRuns: 200 }
    );
  });

  it('a leading decimal atom is the status code', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 999 }), fc.array(valueTree(2), { maxLength: 3 }), (code, payload) => {
        const line = [String(code), ...payload.map(encodeValue)].join(' ');
        const response = parseResponse(line);
        expect(response.statusCode).toBe(code);
        expect(response.root.slice(1)).toEqual(payload);
      }),
      { numRuns: 200 }
    );
  });
});
