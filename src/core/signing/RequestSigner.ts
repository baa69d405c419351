// src/core/signing/RequestSigner.ts

import crypto from 'crypto';
import { Readable } from 'stream';
import { buffer as readStream } from 'stream/consumers';
import type { ApiRequest, RequestBody } from '../http/types';
import type { Credentials, SignatureHeaders } from './types';
import { HEADER_API_KEY, HEADER_SIGNATURE, HEADER_TIMESTAMP } from './types';
import { BodyReadError, errorMessage } from '../../utils/errors';
import { setHeader } from '../../utils/headers';

/**
 * Build the exact byte sequence the server reproduces to verify a request.
 *
 * Without a body: `METHOD:URL:TIMESTAMP`
 * With a body:    `METHOD:URL:BODY:TIMESTAMP`
 *
 * The body bytes are copied in unchanged rather than decoded, so a body that
 * is not valid UTF-8 is still signed as sent.
 */
export function buildCanonicalMessage(
  method: string,
  fullUrl: string,
  body: Uint8Array,
  timestamp: string
): Buffer {
  if (body.length === 0) {
    return Buffer.from(`${method}:${fullUrl}:${timestamp}`, 'utf8');
  }
  return Buffer.concat([
    Buffer.from(`${method}:${fullUrl}:`, 'utf8'),
    body,
    Buffer.from(`:${timestamp}`, 'utf8'),
  ]);
}

/**
 * HMAC-SHA256 over the canonical message, lowercase hex.
 *
 * Deterministic for identical inputs. An empty secret still yields a
 * signature; rejecting it is left to configuration validation.
 */
export function computeSignature(
  secret: string,
  method: string,
  fullUrl: string,
  body: Uint8Array,
  timestamp: string
): string {
  return crypto
    .createHmac('sha256', secret)
    .update(buildCanonicalMessage(method, fullUrl, body, timestamp))
    .digest('hex');
}

/**
 * Current Unix time in whole seconds, as a decimal string
 */
export function unixTimestamp(nowMs: number = Date.now()): string {
  return Math.floor(nowMs / 1000).toString();
}

async function readBodyBytes(body: RequestBody | undefined): Promise<Buffer> {
  if (body === undefined) return Buffer.alloc(0);
  if (typeof body === 'string') return Buffer.from(body, 'utf8');
  if (body instanceof Readable) {
    if (body.readableEnded || body.destroyed) {
      throw new BodyReadError('Request body stream already consumed');
    }
    try {
      return await readStream(body);
    } catch (error) {
      throw new BodyReadError(`Failed to read request body: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
  return Buffer.from(body);
}

export class RequestSigner {
  constructor(private readonly credentials: Credentials) {}

  /**
   * Authentication headers for an already-read body
   */
  signatureHeaders(
    method: string,
    fullUrl: string,
    body: Uint8Array,
    timestamp: string = unixTimestamp()
  ): SignatureHeaders {
    return {
      [HEADER_API_KEY]: this.credentials.apiKey,
      [HEADER_TIMESTAMP]: timestamp,
      [HEADER_SIGNATURE]: computeSignature(
        this.credentials.apiSecret,
        method,
        fullUrl,
        body,
        timestamp
      ),
    };
  }

  /**
   * Stamp a request with X-API-Key, X-Timestamp and X-Signature.
   *
   * A stream body is drained and replaced by a Buffer holding the same bytes,
   * so the request still carries what was signed. If the body cannot be read
   * no header is touched.
   *
   * @throws {BodyReadError} If the body stream was consumed or fails mid-read
   */
  async signRequest(request: ApiRequest): Promise<void> {
    const timestamp = unixTimestamp();
    const body = await readBodyBytes(request.body);

    if (request.body !== undefined) {
      request.body = body;
    }

    const headers = this.signatureHeaders(request.method, request.url, body, timestamp);
    for (const [name, value] of Object.entries(headers)) {
      setHeader(request.headers, name, value);
    }
  }
}
