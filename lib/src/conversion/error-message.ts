/**
 * Error Message Extraction
 */

import { z } from 'zod';
import { ErrorResponseSchema } from './types.js';

const DetailItemSchema = z.object({ msg: z.string() }).passthrough();

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function detailMessage(detail: string | unknown[] | undefined): string | undefined {
  if (typeof detail === 'string') {
    return nonBlank(detail);
  }
  if (detail && detail.length > 0) {
    const first = DetailItemSchema.safeParse(detail[0]);
    return first.success ? nonBlank(first.data.msg) : undefined;
  }
  return undefined;
}

/**
 * Best-effort human-readable message from an error response body.
 *
 * Tries, in order: `detail` (a string, or the `msg` of its first entry),
 * `message`, `error`, the raw body, and finally `fallback` (usually the HTTP
 * status line).
 *
 * @example
 * ```typescript
 * extractErrorMessage('{"detail":[{"msg":"field required"}]}', '422');
 * // 'field required'
 * ```
 */
export function extractErrorMessage(body: string, fallback: string): string {
  if (body.trim() === '') {
    return fallback;
  }

  const payload = ErrorResponseSchema.safeParse(parseJson(body));
  if (payload.success) {
    const message =
      detailMessage(payload.data.detail) ??
      nonBlank(payload.data.message) ??
      nonBlank(payload.data.error);
    if (message !== undefined) {
      return message;
    }
  }

  return body.trim();
}
