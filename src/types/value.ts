/**
 * Value model for cgp-cli
 *
 * Every object on a response line parses into one of these variants.
 * Trees are built once per response and never mutated.
 */

/** Quoted or unquoted string, escapes already resolved */
export interface CliString {
  readonly kind: 'string';
  readonly value: string;
  /** Whether the lexeme was quoted on the wire */
  readonly quoted: boolean;
}

/**
 * `#` integer literal in any of the four radixes. Signed 64-bit on the wire;
 * a number when exactly representable, otherwise a bigint.
 */
export interface CliInteger {
  readonly kind: 'integer';
  readonly value: number | bigint;
}

/** `#NULL#` */
export interface CliNull {
  readonly kind: 'null';
}

/** `#I` address literal */
export interface CliIpAddress {
  readonly kind: 'ip';
  readonly address: string;
  readonly port?: number;
}

/** `#T` timestamp, kept in its lexical form (`FUTURE`, `PAST`, `DD-MM-YYYY[_HH:MM:SS]`) */
export interface CliTimestamp {
  readonly kind: 'timestamp';
  readonly value: string;
}

/** `[...]` base64 data block */
export interface CliDataBlock {
  readonly kind: 'data';
  readonly value: Buffer;
}

export interface CliArray {
  readonly kind: 'array';
  readonly items: readonly CliValue[];
}

/**
 * Dictionary entries in wire order. Keys are not deduplicated here;
 * projection to a record keeps the last one.
 */
export interface CliDictionary {
  readonly kind: 'dictionary';
  readonly entries: readonly (readonly [string, CliValue])[];
}

export type CliValue =
  | CliString
  | CliInteger
  | CliNull
  | CliIpAddress
  | CliTimestamp
  | CliDataBlock
  | CliArray
  | CliDictionary;

export type CliValueKind = CliValue['kind'];

/** Narrow a value union member by its kind */
export type CliValueOf<K extends CliValueKind> = Extract<CliValue, { kind: K }>;

/**
 * Plain JavaScript rendering of a value tree, as handed to command-layer callers
 */
export type PlainValue =
  | string
  | number
  | bigint
  | null
  | Buffer
  | PlainValue[]
  | { [key: string]: PlainValue };
