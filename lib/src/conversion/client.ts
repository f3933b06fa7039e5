/**
 * HTTP Conversion Client
 *
 * Talks to a document-to-markdown service:
 * - `POST {base}/convert` with a multipart `file` field, answered with raw markdown
 * - `GET {base}/supported-extensions`, answered with `{ "extensions": [...] }`
 *
 * Requests are never retried; failures surface as upstream errors and the
 * caller decides whether to try again.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import {
  ProcessingErrorCode,
  UpstreamError,
  ValidationError,
  wrapError,
  type ErrorContext,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { createConversionConfig } from './config.js';
import { extractErrorMessage } from './error-message.js';
import {
  SupportedExtensionsResponseSchema,
  type ConversionConfig,
  type DocumentConverter,
  type RequestOptions,
} from './types.js';

const DEFAULT_UPLOAD_NAME = 'uploaded_file';

export interface HttpConversionClientOptions {
  /** Preconfigured axios instance (custom agents, interceptors, test adapters) */
  httpClient?: AxiosInstance;
  logger?: Logger;
}

function responseText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  if (data instanceof Uint8Array) {
    return Buffer.from(data).toString('utf8');
  }
  return JSON.stringify(data);
}

function statusLine(response: AxiosResponse<unknown>): string {
  return `${response.status} ${response.statusText}`.trim();
}

export class HttpConversionClient implements DocumentConverter {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(config?: Partial<ConversionConfig>, options: HttpConversionClientOptions = {}) {
    const resolved = createConversionConfig(config);
    this.baseUrl = resolved.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = resolved.timeoutMs;
    this.http = options.httpClient ?? axios.create();
    this.logger = options.logger ?? createLogger('conversion');
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async convert(filename: string, data: Uint8Array, options: RequestOptions = {}): Promise<string> {
    const name = filename.trim() || DEFAULT_UPLOAD_NAME;
    if (data.byteLength === 0) {
      throw new ValidationError('file data is empty', ProcessingErrorCode.EMPTY_CONTENT, {
        context: { filename: name },
      });
    }

    const endpoint = `${this.baseUrl}/convert`;
    const context: ErrorContext = { filename: name, size: data.byteLength, endpoint };

    const form = new FormData();
    form.append('file', new Blob([data]), name);

    this.logger.debug('Converting document', { filename: name, size: data.byteLength });

    const response = await this.send(
      { method: 'POST', url: endpoint, data: form },
      options,
      ProcessingErrorCode.CONVERSION_FAILED,
      context
    );

    const body = responseText(response.data);
    if (response.status !== 200) {
      const message = extractErrorMessage(body, statusLine(response));
      throw new UpstreamError(
        `conversion failed for file ${name} (status ${response.status}): ${message}`,
        ProcessingErrorCode.CONVERSION_FAILED,
        { context: { ...context, status: response.status } }
      );
    }

    const markdown = body.trim();
    if (markdown === '') {
      throw new UpstreamError(
        `conversion service returned empty content for file: ${name}`,
        ProcessingErrorCode.CONVERSION_FAILED,
        { context: { ...context, status: response.status } }
      );
    }

    this.logger.debug('Document converted', { filename: name, markdownLength: markdown.length });
    return markdown;
  }

  async supportedExtensions(options: RequestOptions = {}): Promise<string[]> {
    const endpoint = `${this.baseUrl}/supported-extensions`;
    const context: ErrorContext = { endpoint };

    const response = await this.send(
      { method: 'GET', url: endpoint },
      options,
      ProcessingErrorCode.EXTENSIONS_UNAVAILABLE,
      context
    );

    const body = responseText(response.data);
    if (response.status !== 200) {
      const message = extractErrorMessage(body, statusLine(response));
      throw new UpstreamError(
        `supported-extensions request failed (status ${response.status}): ${message}`,
        ProcessingErrorCode.EXTENSIONS_UNAVAILABLE,
        { context: { ...context, status: response.status } }
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw wrapError(
        error,
        'failed to parse supported-extensions response',
        ProcessingErrorCode.EXTENSIONS_UNAVAILABLE,
        context
      );
    }

    const parsed = SupportedExtensionsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError(
        'failed to parse supported-extensions response: missing "extensions" list',
        ProcessingErrorCode.EXTENSIONS_UNAVAILABLE,
        { context, cause: parsed.error }
      );
    }

    this.logger.debug('Fetched supported extensions', { count: parsed.data.extensions.length });
    return parsed.data.extensions;
  }

  /**
   * Issue a request, resolving for every HTTP status. Transport failures,
   * timeouts and cancellation become upstream errors.
   */
  private async send(
    request: AxiosRequestConfig,
    options: RequestOptions,
    failureCode: ProcessingErrorCode,
    context: ErrorContext
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.http.request<unknown>({
        ...request,
        responseType: 'text',
        timeout: this.timeoutMs,
        validateStatus: () => true,
        ...(options.signal ? { signal: options.signal } : {}),
      });
    } catch (error) {
      if (axios.isCancel(error) || options.signal?.aborted) {
        throw new UpstreamError(
          `request to ${context.endpoint ?? this.baseUrl} was cancelled`,
          ProcessingErrorCode.REQUEST_CANCELLED,
          { context, cause: error }
        );
      }
      if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        throw new UpstreamError(
          `request to ${context.endpoint ?? this.baseUrl} timed out after ${this.timeoutMs}ms`,
          failureCode,
          { context, cause: error }
        );
      }
      throw wrapError(error, `failed to call ${context.endpoint ?? this.baseUrl}`, failureCode, context);
    }
  }
}
