// src/core/http/HttpCore.ts

import type { ApiRequest, ApiResult, HttpTransport, TransportResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { bodyReadFailure, normalizeResponse } from './ResponseNormalizer';
import { withHttpSpan } from '../../observability/tracing';
import {
  ApiStatusError,
  DecodeError,
  ResponseBodyReadError,
  TransportError,
  errorMessage,
} from '../../utils/errors';

export interface HttpCoreOptions {
  transport: HttpTransport;
  timeout: number;
  logger: Logger;
  metrics?: MetricsCollector;
}

/**
 * Sends one signed request and turns whatever comes back into an ApiResult.
 * Exactly one transport call per execute; nothing is retried.
 */
export class HttpCore {
  private readonly transport: HttpTransport;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: HttpCoreOptions) {
    this.transport = options.transport;
    this.timeout = options.timeout;
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  /**
   * @throws {TransportError} If no HTTP response was received
   */
  async execute(request: ApiRequest): Promise<ApiResult> {
    const method = request.method;

    this.logger.debug('HTTP request', {
      method,
      url: request.url,
      headers: request.headers,
    });

    return withHttpSpan(method, request.url, async (span) => {
      const startTime = Date.now();

      let response: TransportResponse;
      try {
        response = await this.transport.send(request, { timeout: this.timeout });
      } catch (error) {
        this.metrics?.incrementCounter('http_errors', { method, kind: 'transport' });
        this.logger.debug('HTTP transport failure', {
          method,
          url: request.url,
          error: errorMessage(error),
        });
        if (error instanceof TransportError) throw error;
        throw new TransportError(`Transport error: ${errorMessage(error)}`, {
          method,
          url: request.url,
          cause: error,
        });
      }

      span?.setAttribute('http.status_code', response.status);

      let result: ApiResult;
      try {
        const body = await response.readBody();
        result = normalizeResponse(response.status, body);
      } catch (error) {
        result = bodyReadFailure(response.status, error);
      }

      const durationMs = Date.now() - startTime;
      const labels = { method, status: response.status };
      this.metrics?.incrementCounter('http_requests_total', labels);
      this.metrics?.recordLatency('http_request_duration', durationMs, labels);

      if (!result.ok) {
        this.metrics?.incrementCounter('http_errors', { method, kind: this.failureKind(result.error) });
      }

      this.logger.debug('HTTP response', {
        method,
        url: request.url,
        status: response.status,
        durationMs,
        error: result.ok ? undefined : result.error.message,
      });

      return result;
    });
  }

  private failureKind(error: ResponseBodyReadError | DecodeError | ApiStatusError): string {
    if (error instanceof ResponseBodyReadError) return 'body_read';
    if (error instanceof DecodeError) return 'decode';
    return 'status';
  }
}
