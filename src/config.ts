/**
 * Configuration loading for cgp-cli
 *
 * Validates caller-supplied settings and builds them from environment variables.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  cliConfigSchema,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  type CliConfig,
  type ResolvedCliConfig
} from './types/config.js';
import { CliConfigError } from './types/errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  CGP_CLI_HOST: z.string().min(1),
  CGP_CLI_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  CGP_CLI_USER: z.string().min(1),
  CGP_CLI_PASSWORD: z.string().default(''),
  CGP_CLI_APOP: booleanFlag,
  CGP_CLI_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT)
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates a session configuration and applies defaults
 *
 * @param config - Caller-supplied configuration
 * @returns Configuration with port, apop and timeout filled in
 * @throws CliConfigError listing every failing field
 */
export function parseConfig(config: CliConfig): ResolvedCliConfig {
  const result = cliConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new CliConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Builds a session configuration from environment variables:
 * `CGP_CLI_HOST`, `CGP_CLI_PORT`, `CGP_CLI_USER`, `CGP_CLI_PASSWORD`,
 * `CGP_CLI_APOP` and `CGP_CLI_TIMEOUT`.
 *
 * @param env - Variables to read (default: `process.env`)
 * @throws CliConfigError when a variable is missing or malformed
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedCliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new CliConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const vars = result.data;
  return parseConfig({
    host: vars.CGP_CLI_HOST,
    port: vars.CGP_CLI_PORT,
    user: vars.CGP_CLI_USER,
    password: vars.CGP_CLI_PASSWORD,
    apop: vars.CGP_CLI_APOP,
    timeout: vars.CGP_CLI_TIMEOUT
  });
}
