/**
 * Wire rendering of parsed value trees
 */

import type { CliIpAddress, CliValue } from '../types/value.js';
import { base64Encode } from './base64.js';
import { encodeString } from './cli-string.js';

/**
 * Renders an address the way the `#I` literal writes it, without the marker
 */
export function formatIpAddress(ip: CliIpAddress): string {
  if (ip.port === undefined) {
    return ip.address;
  }
  return ip.address.includes(':') ? `[${ip.address}]:${ip.port}` : `${ip.address}:${ip.port}`;
}

/**
 * Renders a value tree back to wire text
 *
 * The output parses to an equal tree. Empty strings render as `""`
 * because an empty atom does not exist on the wire.
 */
export function encodeValue(value: CliValue): string {
  switch (value.kind) {
    case 'string':
      return encodeString(value.value) || '""';
    case 'integer':
      return `#${value.value}`;
    case 'null':
      return '#NULL#';
    case 'ip':
      return `#I${formatIpAddress(value)}`;
    case 'timestamp':
      return `#T${value.value}`;
    case 'data':
      return `[${base64Encode(value.value)}]`;
    case 'array':
      return `(${value.items.map(encodeValue).join(',')})`;
    case 'dictionary':
      return `{${value.entries.map(([key, item]) => `${encodeString(key) || '""'}=${encodeValue(item)};`).join('')}}`;
  }
}
