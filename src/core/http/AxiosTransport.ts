// src/core/http/AxiosTransport.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { Readable } from 'stream';
import { buffer as readStream } from 'stream/consumers';
import type { ApiRequest, HttpTransport, TransportOptions, TransportResponse } from './types';
import { NetworkTimeoutError, TransportError, errorMessage } from '../../utils/errors';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Default transport. Every status code resolves; only failures below HTTP
 * (DNS, refused connections, TLS, timeouts) reject. Bodies are sent as given
 * and responses are handed back as a stream for the caller to read.
 */
export class AxiosTransport implements HttpTransport {
  private axiosInstance: AxiosInstance;

  constructor(instance?: AxiosInstance) {
    this.axiosInstance =
      instance ??
      axios.create({
        httpAgent: new http.Agent({ keepAlive: true }),
        httpsAgent: new https.Agent({ keepAlive: true }),
      });
  }

  async send(request: ApiRequest, options: TransportOptions): Promise<TransportResponse> {
    try {
      const response = await this.axiosInstance.request<Readable>({
        url: request.url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        timeout: options.timeout,
        responseType: 'stream',
        transformRequest: [(data: unknown) => data],
        validateStatus: () => true,
      });

      const stream = response.data;
      return {
        status: response.status,
        readBody: () => readStream(stream),
      };
    } catch (error) {
      throw this.transformError(error, request);
    }
  }

  private transformError(error: unknown, request: ApiRequest): TransportError {
    const details = { method: request.method, url: request.url, cause: error };

    if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
      return new NetworkTimeoutError('Request timeout', { ...details, code: error.code });
    }
    if (axios.isAxiosError(error)) {
      return new TransportError(`Transport error: ${error.message}`, {
        ...details,
        code: error.code,
      });
    }
    return new TransportError(`Transport error: ${errorMessage(error)}`, details);
  }
}
