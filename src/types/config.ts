/**
 * Configuration types for cgp-cli
 */

import { z } from 'zod';

/** Default CLI/PWD port */
export const DEFAULT_PORT = 106;

/** Default send/receive timeout in milliseconds */
export const DEFAULT_TIMEOUT = 100000;

/**
 * Session configuration schema
 */
export const cliConfigSchema = z.object({
  /** Server hostname or IP address */
  host: z.string().min(1),
  /** CLI/PWD port (default: 106) */
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  /** Administrator username */
  user: z.string().min(1),
  /** Administrator password */
  password: z.string(),
  /** Authenticate with an APOP hash instead of a cleartext password (default: false) */
  apop: z.boolean().default(false),
  /** Send/receive timeout in milliseconds (default: 100000) */
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT)
});

/**
 * Session configuration as accepted from callers
 */
export type CliConfig = z.input<typeof cliConfigSchema>;

/**
 * Session configuration with every default applied
 */
export type ResolvedCliConfig = z.output<typeof cliConfigSchema>;

/**
 * Internal connection options
 */
export interface ConnectionOptions {
  host: string;
  port: number;
  /** Connect and write timeout in milliseconds; 0 disables it */
  timeout: number;
}
