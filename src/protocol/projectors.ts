/**
 * Result extraction for CLI responses
 *
 * A response places its payload after the status code. {@link findFirst}
 * picks the first top-level payload value of a wanted shape and the
 * projectors turn it into plain JavaScript values.
 *
 * @packageDocumentation
 */

import type {
  CliArray,
  CliDictionary,
  CliValue,
  CliValueKind,
  CliValueOf,
  PlainValue
} from '../types/value.js';
import type { ParsedResponse } from '../types/protocol.js';
import { CliExtractionError } from '../types/errors.js';
import { encodeValue, formatIpAddress } from '../encoding/value-encoder.js';
import { base64Encode } from '../encoding/base64.js';
import { fromInt64 } from './tokenizer.js';

/**
 * Converts a parsed response into a typed result, or undefined when the
 * response carries no payload of the expected shape
 */
export type Projector<T> = (response: ParsedResponse) => T | undefined;

const INTEGER_TEXT = /^-?\d+$/;

function isKind<K extends CliValueKind>(value: CliValue, kinds: readonly K[]): value is CliValueOf<K> {
  return kinds.some((kind) => kind === value.kind);
}

/**
 * Left-to-right scan for the first value of one of the given kinds.
 * Containers are candidates themselves; their items are never searched.
 *
 * @param values - Values to search, in order
 * @param kinds - Wanted kinds
 */
export function findFirst<K extends CliValueKind>(
  values: readonly CliValue[],
  kinds: readonly K[]
): CliValueOf<K> | undefined {
  for (const value of values) {
    if (isKind(value, kinds)) {
      return value;
    }
  }

  return undefined;
}

/**
 * Values following the status-code position of a response
 */
export function payloadOf(response: ParsedResponse): readonly CliValue[] {
  return response.root.slice(1);
}

/**
 * Renders a value as text: strings as-is, scalars in their literal form
 * without the marker, containers in wire form
 */
export function toText(value: CliValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
      return String(value.value);
    case 'null':
      return '';
    case 'ip':
      return formatIpAddress(value);
    case 'timestamp':
      return value.value;
    case 'data':
      return base64Encode(value.value);
    case 'array':
    case 'dictionary':
      return encodeValue(value);
  }
}

/**
 * Renders a value tree as plain JavaScript data
 */
export function toPlain(value: CliValue): PlainValue {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
      return value.value;
    case 'null':
      return null;
    case 'data':
      return value.value;
    case 'ip':
    case 'timestamp':
      return toText(value);
    case 'array':
      return toList(value);
    case 'dictionary':
      return toRecord(value);
  }
}

/**
 * Stores an own enumerable property, so keys such as `__proto__` stay data
 */
function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Dictionary as a record; a repeated key keeps its last value
 */
export function toRecord(dictionary: CliDictionary): Record<string, PlainValue> {
  const record: Record<string, PlainValue> = {};
  for (const [key, value] of dictionary.entries) {
    setEntry(record, key, toPlain(value));
  }
  return record;
}

export function toList(array: CliArray): PlainValue[] {
  return array.items.map(toPlain);
}

/**
 * First string payload
 */
export const projectText: Projector<string> = (response) =>
  findFirst(payloadOf(response), ['string'])?.value;

/**
 * First dictionary payload, as a record
 */
export const projectDictionary: Projector<Record<string, PlainValue>> = (response) => {
  const dictionary = findFirst(payloadOf(response), ['dictionary']);
  return dictionary ? toRecord(dictionary) : undefined;
};

/**
 * First dictionary payload, every value rendered as text
 */
export const projectTextDictionary: Projector<Record<string, string>> = (response) => {
  const dictionary = findFirst(payloadOf(response), ['dictionary']);
  if (!dictionary) {
    return undefined;
  }
  const record: Record<string, string> = {};
  for (const [key, value] of dictionary.entries) {
    setEntry(record, key, toText(value));
  }
  return record;
};

/**
 * First array payload, as a list
 */
export const projectArray: Projector<PlainValue[]> = (response) => {
  const array = findFirst(payloadOf(response), ['array']);
  return array ? toList(array) : undefined;
};

/**
 * First integer or numeric-string payload; a bigint beyond the safe-integer range
 *
 * @throws CliExtractionError when the first candidate is a string that is not
 *   a signed 64-bit integer
 */
export const projectInteger: Projector<number | bigint> = (response) => {
  const value = findFirst(payloadOf(response), ['integer', 'string']);
  if (!value) {
    return undefined;
  }
  if (value.kind === 'integer') {
    return value.value;
  }
  if (!INTEGER_TEXT.test(value.value)) {
    throw new CliExtractionError(`Expected an integer, found '${value.value}'`, response.raw);
  }
  const parsed = fromInt64(BigInt(value.value));
  if (parsed === undefined) {
    throw new CliExtractionError(`Integer '${value.value}' is out of range`, response.raw);
  }
  return parsed;
};
