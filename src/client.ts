// src/client.ts

import type { ApiRequest, ApiResult, HttpMethod, HttpTransport } from './core/http/types';
import type { ClientConfigInput } from './config/ConfigValidator';
import type { BodyInput } from './core/http/RequestBuilder';
import { validateConfig, resolveConfigFromEnv } from './config/ConfigValidator';
import { createRequest } from './core/http/RequestBuilder';
import { HttpCore } from './core/http/HttpCore';
import { AxiosTransport } from './core/http/AxiosTransport';
import { RequestSigner } from './core/signing/RequestSigner';
import { Logger, LoggerConfig } from './observability/Logger';
import type { MetricsCollector } from './observability/MetricsCollector';
import { BodyReadError, SigningError, errorMessage } from './utils/errors';

export interface ClientOptions extends Partial<ClientConfigInput> {
  transport?: HttpTransport;
  logger?: Logger;
  logging?: LoggerConfig;
  metrics?: MetricsCollector;
}

/**
 * Webtender API client.
 *
 * Every request is signed with the account's API key and secret. Responses
 * come back as an {@link ApiResult}: `ok` with the decoded JSON, or a failure
 * that still carries the status code and whatever was decoded. Failures with
 * no response at all (bad config, bad request, network) are thrown.
 *
 * @example
 * ```typescript
 * const client = WebtenderClient.fromEnv();
 *
 * const result = await client.get('/v1/servers');
 * if (!result.ok) {
 *   console.error(result.error.message); // "status: 401: Unauthenticated."
 * } else if (Array.isArray(result.response.data)) {
 *   console.log(`Found ${result.response.data.length} servers`);
 * }
 * ```
 */
export class WebtenderClient {
  private readonly baseUrl: string;
  private readonly signer: RequestSigner;
  private readonly http: HttpCore;

  /**
   * @throws {ConfigError} If apiKey, apiSecret or baseURL is missing or invalid
   */
  constructor(options: ClientOptions) {
    const { transport, logger, logging, metrics, ...raw } = options;
    const config = validateConfig(raw);

    this.baseUrl = config.baseURL;
    this.signer = new RequestSigner({ apiKey: config.apiKey, apiSecret: config.apiSecret });
    this.http = new HttpCore({
      transport: transport ?? new AxiosTransport(),
      timeout: config.timeout,
      logger: logger ?? new Logger(logging),
      metrics,
    });
  }

  /**
   * Build a client from WEBTENDER_API_KEY, WEBTENDER_API_SECRET and
   * WEBTENDER_API_BASE_URL. Options passed here override the environment.
   *
   * @throws {ConfigError} If the key or secret is set nowhere
   */
  static fromEnv(options: ClientOptions = {}, env: NodeJS.ProcessEnv = process.env): WebtenderClient {
    const { transport, logger, logging, metrics, ...raw } = options;
    return new WebtenderClient({
      ...resolveConfigFromEnv(raw, env),
      transport,
      logger,
      logging,
      metrics,
    });
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Build and sign a request without sending it.
   *
   * @throws {RequestConstructionError} If the method or joined URL is invalid
   * @throws {SigningError} If signing fails
   */
  async buildRequest(method: string, path: string, body?: BodyInput): Promise<ApiRequest> {
    const request = createRequest(this.baseUrl, method, path, body);
    try {
      await this.signer.signRequest(request);
    } catch (error) {
      throw new SigningError(`Failed to sign request: ${errorMessage(error)}`, { cause: error });
    }
    return request;
  }

  /**
   * Stamp X-API-Key, X-Timestamp and X-Signature onto a request, for callers
   * that send it through their own transport. The URL must already be the
   * exact string that will go on the wire.
   *
   * @throws {BodyReadError} If a stream body cannot be read; no header is set
   */
  async signRequest(request: ApiRequest): Promise<void> {
    try {
      await this.signer.signRequest(request);
    } catch (error) {
      if (error instanceof BodyReadError) throw error;
      throw new SigningError(`Failed to sign request: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Send a request built by {@link buildRequest}.
   *
   * @throws {TransportError} If no HTTP response was received
   */
  async execute(request: ApiRequest): Promise<ApiResult> {
    return this.http.execute(request);
  }

  getRequest(path: string): Promise<ApiRequest> {
    return this.buildRequest('GET', path);
  }

  postRequest(path: string, body: BodyInput): Promise<ApiRequest> {
    return this.buildRequest('POST', path, body);
  }

  patchRequest(path: string, body: BodyInput): Promise<ApiRequest> {
    return this.buildRequest('PATCH', path, body);
  }

  putRequest(path: string, body: BodyInput): Promise<ApiRequest> {
    return this.buildRequest('PUT', path, body);
  }

  deleteRequest(path: string): Promise<ApiRequest> {
    return this.buildRequest('DELETE', path);
  }

  async get(path: string): Promise<ApiResult> {
    return this.send('GET', path);
  }

  async post(path: string, body: BodyInput): Promise<ApiResult> {
    return this.send('POST', path, body);
  }

  async patch(path: string, body: BodyInput): Promise<ApiResult> {
    return this.send('PATCH', path, body);
  }

  async put(path: string, body: BodyInput): Promise<ApiResult> {
    return this.send('PUT', path, body);
  }

  async delete(path: string): Promise<ApiResult> {
    return this.send('DELETE', path);
  }

  private async send(method: HttpMethod, path: string, body?: BodyInput): Promise<ApiResult> {
    const request = await this.buildRequest(method, path, body);
    return this.execute(request);
  }
}
