/**
 * Unit Tests for the HTTP Conversion Client
 *
 * Requests are answered by an in-process axios adapter; nothing leaves the
 * test process.
 */

import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { HttpConversionClient } from '../../lib/src/conversion/index.js';
import { isDocumentProcessingError, type DocumentProcessingError } from '../../lib/src/errors/index.js';
import { createSilentLogger } from '../../lib/src/logging/index.js';

// =============================================================================
// Test Helpers
// =============================================================================

interface StubReply {
  status: number;
  data?: string;
  statusText?: string;
}

type StubHandler = (config: InternalAxiosRequestConfig) => StubReply;

function stubHttp(handler: StubHandler): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = handler(config);
      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: reply.statusText ?? '',
        headers: {},
        config,
      };
    },
  });
  return { http, requests };
}

function createClient(handler: StubHandler, timeoutMs = 60000) {
  const { http, requests } = stubHttp(handler);
  const client = new HttpConversionClient(
    { baseUrl: 'http://converter.test/', timeoutMs },
    { httpClient: http, logger: createSilentLogger() }
  );
  return { client, requests };
}

async function catchError(promise: Promise<unknown>): Promise<DocumentProcessingError> {
  try {
    await promise;
  } catch (error) {
    if (isDocumentProcessingError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
}

/** The multipart `file` entry of a captured request */
function uploadedFile(request: InternalAxiosRequestConfig): { name: string; size: number } | undefined {
  const form: unknown = request.data;
  if (!(form instanceof FormData)) {
    return undefined;
  }
  const entry = form.get('file');
  return entry === null || typeof entry === 'string' ? undefined : { name: entry.name, size: entry.size };
}

const PDF_BYTES = new TextEncoder().encode('%PDF-1.4 test');

// =============================================================================
// convert()
// =============================================================================

describe('HttpConversionClient', () => {
  it('should strip trailing slashes from the base URL', () => {
    const { client } = createClient(() => ({ status: 200 }));
    expect(client.getBaseUrl()).toBe('http://converter.test');
  });

  describe('convert()', () => {
    it('should post the file as multipart and return trimmed markdown', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: '\n# Title\n\nBody\n' }));

      await expect(client.convert('report.pdf', PDF_BYTES)).resolves.toBe('# Title\n\nBody');

      expect(requests).toHaveLength(1);
      const [request] = requests;
      expect(request.method).toBe('post');
      expect(request.url).toBe('http://converter.test/convert');
      expect(request.timeout).toBe(60000);
      expect(request.data).toBeInstanceOf(FormData);

      const file = uploadedFile(request);
      expect(file?.name).toBe('report.pdf');
      expect(file?.size).toBe(PDF_BYTES.byteLength);
    });

    it('should name a blank upload uploaded_file', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: 'ok' }));
      await client.convert('   ', PDF_BYTES);

      expect(uploadedFile(requests[0])?.name).toBe('uploaded_file');
    });

    it('should reject empty data without calling the service', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: 'ok' }));
      const error = await catchError(client.convert('a.pdf', new Uint8Array(0)));

      expect(error.message).toBe('file data is empty');
      expect(error.code).toBe('EMPTY_CONTENT');
      expect(requests).toHaveLength(0);
    });

    it('should report the detail message of an error response', async () => {
      const { client } = createClient(() => ({
        status: 422,
        data: '{"detail":[{"msg":"field required"}]}',
      }));
      const error = await catchError(client.convert('a.pdf', PDF_BYTES));

      expect(error.message).toBe('conversion failed for file a.pdf (status 422): field required');
      expect(error.code).toBe('CONVERSION_FAILED');
      expect(error.context.status).toBe(422);
      expect(error.retryable).toBe(true);
    });

    it('should fall back to the status line for an empty error body', async () => {
      const { client } = createClient(() => ({ status: 500, statusText: 'Internal Server Error' }));
      const error = await catchError(client.convert('a.pdf', PDF_BYTES));

      expect(error.message).toBe('conversion failed for file a.pdf (status 500): 500 Internal Server Error');
    });

    it('should reject a blank markdown response', async () => {
      const { client } = createClient(() => ({ status: 200, data: '  \n ' }));
      const error = await catchError(client.convert('a.pdf', PDF_BYTES));

      expect(error.message).toBe('conversion service returned empty content for file: a.pdf');
      expect(error.code).toBe('CONVERSION_FAILED');
    });

    it('should report cancellation', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: 'ok' }));
      const controller = new AbortController();
      controller.abort();

      const error = await catchError(client.convert('a.pdf', PDF_BYTES, { signal: controller.signal }));

      expect(error.message).toBe('request to http://converter.test/convert was cancelled');
      expect(error.code).toBe('REQUEST_CANCELLED');
      expect(error.retryable).toBe(false);
      expect(requests).toHaveLength(0);
    });

    it('should report timeouts', async () => {
      const { client } = createClient(() => {
        throw new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED');
      }, 50);
      const error = await catchError(client.convert('a.pdf', PDF_BYTES));

      expect(error.message).toBe('request to http://converter.test/convert timed out after 50ms');
      expect(error.code).toBe('CONVERSION_FAILED');
    });

    it('should wrap transport failures', async () => {
      const { client } = createClient(() => {
        throw new Error('socket hang up');
      });
      const error = await catchError(client.convert('a.pdf', PDF_BYTES));

      expect(error.message).toBe('failed to call http://converter.test/convert: socket hang up');
      expect(error.code).toBe('CONVERSION_FAILED');
      expect(error.context.filename).toBe('a.pdf');
    });
  });

  // ===========================================================================
  // supportedExtensions()
  // ===========================================================================

  describe('supportedExtensions()', () => {
    it('should return the advertised extensions', async () => {
      const { client, requests } = createClient(() => ({
        status: 200,
        data: '{"extensions":[".pdf",".docx"]}',
      }));

      await expect(client.supportedExtensions()).resolves.toEqual(['.pdf', '.docx']);
      expect(requests[0].method).toBe('get');
      expect(requests[0].url).toBe('http://converter.test/supported-extensions');
    });

    it('should report a failing status with the body message', async () => {
      const { client } = createClient(() => ({ status: 503, data: '{"message":"maintenance"}' }));
      const error = await catchError(client.supportedExtensions());

      expect(error.message).toBe('supported-extensions request failed (status 503): maintenance');
      expect(error.code).toBe('EXTENSIONS_UNAVAILABLE');
    });

    it('should reject a body that is not JSON', async () => {
      const { client } = createClient(() => ({ status: 200, data: 'not json' }));
      const error = await catchError(client.supportedExtensions());

      expect(error.message).toMatch(/^failed to parse supported-extensions response: /);
      expect(error.code).toBe('EXTENSIONS_UNAVAILABLE');
    });

    it('should reject a payload without an extensions list', async () => {
      const { client } = createClient(() => ({ status: 200, data: '{"items":[]}' }));
      const error = await catchError(client.supportedExtensions());

      expect(error.message).toBe(
        'failed to parse supported-extensions response: missing "extensions" list'
      );
    });
  });
});
