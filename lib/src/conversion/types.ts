/**
 * Conversion Types
 *
 * Contract for the service that turns uploaded documents into markdown.
 */

import { z } from 'zod';

// =============================================================================
// Converter Interface
// =============================================================================

export interface RequestOptions {
  /** Aborts the outbound request */
  signal?: AbortSignal | undefined;
}

/**
 * Converts documents to markdown and reports which file types it accepts
 */
export interface DocumentConverter {
  /**
   * Convert a document to markdown
   *
   * @returns the trimmed, non-empty markdown
   */
  convert(filename: string, data: Uint8Array, options?: RequestOptions): Promise<string>;

  /**
   * File extensions the converter accepts, as reported by the service
   */
  supportedExtensions(options?: RequestOptions): Promise<string[]>;
}

// =============================================================================
// Wire Formats
// =============================================================================

export const SupportedExtensionsResponseSchema = z.object({
  extensions: z.array(z.string()),
});

export type SupportedExtensionsResponse = z.infer<typeof SupportedExtensionsResponseSchema>;

/**
 * Error body returned by the service on non-200 responses. `detail` is either
 * a message or a list of validation errors carrying `msg`.
 */
export const ErrorResponseSchema = z
  .object({
    detail: z.union([z.string(), z.array(z.unknown())]).optional(),
    message: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =============================================================================
// Configuration
// =============================================================================

export const ConversionConfigSchema = z.object({
  /** Base URL of the conversion service */
  baseUrl: z.string().trim().min(1, 'CONVERSION_API_URL is required').url(),

  /** Per-request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(60000),
});

export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;

export const DEFAULT_CONVERSION_CONFIG = {
  baseUrl: 'http://localhost:8000',
  timeoutMs: 60000,
} as const;
