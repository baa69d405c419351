// src/core/http/types.ts

import type { Readable } from 'stream';
import type { ResponseError } from '../../utils/errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Body of an outbound request. Requests built by the client always carry a
 * Buffer; a stream is accepted for callers that assemble requests themselves
 * and is replaced by a Buffer when the request is signed.
 */
export type RequestBody = Uint8Array | string | Readable;

export interface ApiRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: RequestBody;
}

export interface TransportOptions {
  timeout: number; // milliseconds
}

export interface TransportResponse {
  status: number;
  readBody(): Promise<Buffer>;
}

export interface HttpTransport {
  send(request: ApiRequest, options: TransportOptions): Promise<TransportResponse>;
}

export interface NormalizedResponse {
  readonly status: number;
  readonly data: JsonValue;
}

export type ApiResult =
  | { readonly ok: true; readonly response: NormalizedResponse }
  | { readonly ok: false; readonly response: NormalizedResponse; readonly error: ResponseError };
