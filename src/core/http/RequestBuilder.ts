// src/core/http/RequestBuilder.ts

import type { ApiRequest } from './types';
import { RequestConstructionError } from '../../utils/errors';
import { joinUrl } from '../../utils/url';
import { setHeader } from '../../utils/headers';

// RFC 9110 token characters
const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export type BodyInput = Uint8Array | string;

function toBuffer(body: BodyInput): Buffer {
  if (typeof body === 'string') return Buffer.from(body, 'utf8');
  // copied: later writes by the caller must not change the signed bytes
  return Buffer.from(body);
}

/**
 * Assemble an unsigned request against the base URL.
 *
 * The URL stored on the request is the WHATWG serialization of the joined
 * string, which is what the transport puts on the wire and therefore what
 * has to be signed.
 */
export function createRequest(
  baseUrl: string,
  method: string,
  path: string,
  body?: BodyInput
): ApiRequest {
  if (!METHOD_TOKEN.test(method)) {
    throw new RequestConstructionError(`Invalid HTTP method: ${JSON.stringify(method)}`, {
      method,
    });
  }

  const joined = joinUrl(baseUrl, path);
  let url: URL;
  try {
    url = new URL(joined);
  } catch (error) {
    throw new RequestConstructionError(`Invalid request URL: ${joined}`, {
      url: joined,
      cause: error,
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RequestConstructionError(`Unsupported URL scheme: ${url.protocol}`, {
      url: joined,
    });
  }

  const request: ApiRequest = {
    method,
    url: url.href,
    headers: {},
    body: body === undefined ? undefined : toBuffer(body),
  };
  setHeader(request.headers, 'Accept', 'application/json');
  return request;
}
