/**
 * Base64 encoding/decoding for CLI data blocks, using Node.js Buffer
 */

/**
 * Encodes a string or Buffer to base64
 *
 * @param data - The data to encode (string or Buffer)
 * @returns Base64 encoded string
 */
export function base64Encode(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  return buffer.toString('base64');
}

/**
 * Decodes a base64 string to a Buffer
 *
 * Whitespace is not significant inside a data block and is dropped first.
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: string): Buffer {
  const cleaned = encoded.replace(/\s/g, '');
  return Buffer.from(cleaned, 'base64');
}
