/**
 * Conversion Service Configuration
 */

import { ConversionConfigSchema, DEFAULT_CONVERSION_CONFIG, type ConversionConfig } from './types.js';

/**
 * Create a conversion config with defaults applied
 *
 * @throws {z.ZodError} If the base URL is empty or invalid
 */
export function createConversionConfig(overrides?: Partial<ConversionConfig>): ConversionConfig {
  return ConversionConfigSchema.parse({ ...DEFAULT_CONVERSION_CONFIG, ...overrides });
}

/**
 * Loads conversion service configuration from environment variables.
 *
 * Optional environment variables:
 * - CONVERSION_API_URL: Base URL of the service (default: 'http://localhost:8000')
 * - CONVERSION_TIMEOUT_MS: Request timeout in ms (default: 60000)
 *
 * @throws {z.ZodError} If a variable is set to an invalid value
 */
export function loadConversionConfig(env: NodeJS.ProcessEnv = process.env): ConversionConfig {
  const rawConfig = {
    baseUrl: env['CONVERSION_API_URL'] ?? DEFAULT_CONVERSION_CONFIG.baseUrl,
    timeoutMs: env['CONVERSION_TIMEOUT_MS']
      ? parseInt(env['CONVERSION_TIMEOUT_MS'], 10)
      : DEFAULT_CONVERSION_CONFIG.timeoutMs,
  };

  return ConversionConfigSchema.parse(rawConfig);
}
