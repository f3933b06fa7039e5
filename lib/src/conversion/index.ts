/**
 * Conversion Module
 *
 * Client for the external document-to-markdown service.
 */

export {
  type RequestOptions,
  type DocumentConverter,
  SupportedExtensionsResponseSchema,
  type SupportedExtensionsResponse,
  ErrorResponseSchema,
  type ErrorResponse,
  ConversionConfigSchema,
  type ConversionConfig,
  DEFAULT_CONVERSION_CONFIG,
} from './types.js';

export { createConversionConfig, loadConversionConfig } from './config.js';
export { extractErrorMessage } from './error-message.js';
export { HttpConversionClient, type HttpConversionClientOptions } from './client.js';
