// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const DEFAULT_BASE_URL = 'https://api.webtender.host/api';
export const DEFAULT_TIMEOUT_MS = 30000;

export const ENV_BASE_URL = 'WEBTENDER_API_BASE_URL';
export const ENV_API_KEY = 'WEBTENDER_API_KEY';
export const ENV_API_SECRET = 'WEBTENDER_API_SECRET';
export const ENV_TIMEOUT_MS = 'WEBTENDER_API_TIMEOUT_MS';

// Client Configuration Schema
export const ClientConfigSchema = z.object({
  apiKey: z
    .string({ required_error: `API key is required (${ENV_API_KEY})` })
    .min(1, `API key is required (${ENV_API_KEY})`),
  apiSecret: z
    .string({ required_error: `API secret is required (${ENV_API_SECRET})` })
    .min(1, `API secret is required (${ENV_API_SECRET})`),
  baseURL: z
    .string({ required_error: `Base URL is required (${ENV_BASE_URL})` })
    .min(1, `Base URL is required (${ENV_BASE_URL})`)
    .url('Base URL must be a valid URL'),
  // 0 means "use the default"
  timeout: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TIMEOUT_MS)
    .transform((timeout) => (timeout === 0 ? DEFAULT_TIMEOUT_MS : timeout)),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Fill unset config values from the environment.
 *
 * Explicit values win; an empty string counts as unset. Only the base URL has
 * a default. Nothing is validated here.
 */
export function resolveConfigFromEnv(
  config: Partial<ClientConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): Partial<ClientConfigInput> {
  const timeoutFromEnv = env[ENV_TIMEOUT_MS] ? Number(env[ENV_TIMEOUT_MS]) : undefined;

  return {
    apiKey: config.apiKey || env[ENV_API_KEY],
    apiSecret: config.apiSecret || env[ENV_API_SECRET],
    baseURL: config.baseURL || env[ENV_BASE_URL] || DEFAULT_BASE_URL,
    timeout: config.timeout ?? timeoutFromEnv,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate client configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws {ConfigError} Listing every invalid field
 */
export function validateConfig(config: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }

  const issues = formatIssues(result.error);
  throw new ConfigError(`Invalid client configuration: ${issues.join('; ')}`, issues);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: ClientConfig, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: formatIssues(result.error),
  };
}
