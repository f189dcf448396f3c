/**
 * Wire encoding utilities for CLI requests and responses
 *
 * @packageDocumentation
 */

export { base64Encode, base64Decode } from './base64.js';
export { encodeString, decodeString, encodeObject, type EncodableValue } from './cli-string.js';
export { encodeValue, formatIpAddress } from './value-encoder.js';
