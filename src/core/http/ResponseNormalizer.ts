// src/core/http/ResponseNormalizer.ts

import type { ApiResult, JsonValue, NormalizedResponse } from './types';
import { ApiStatusError, DecodeError, ResponseBodyReadError, errorMessage } from '../../utils/errors';
import { isJsonObject, parseJson } from '../../utils/json';

const MAX_SUCCESS_STATUS = 299;

function emptyData(): JsonValue {
  return {};
}

/**
 * Result for a response whose body could not be read. The status is kept so
 * the caller can still act on it.
 */
export function bodyReadFailure(status: number, cause: unknown): ApiResult {
  const response: NormalizedResponse = { status, data: emptyData() };
  return {
    ok: false,
    response,
    error: new ResponseBodyReadError(`Failed to read response body: ${errorMessage(cause)}`, status, {
      cause,
    }),
  };
}

export function statusErrorMessage(status: number, data: JsonValue): string {
  if (isJsonObject(data)) {
    const message = data.message;
    if (typeof message === 'string') {
      return `status: ${status}: ${message}`;
    }
  }
  return `status: ${status}`;
}

/**
 * Decode a response body as JSON and classify it by status.
 *
 * Any JSON shape is accepted. Status codes above 299 fail even when the body
 * decodes; the decoded payload is still returned on the result.
 */
export function normalizeResponse(status: number, body: Buffer): ApiResult {
  let data: JsonValue;
  try {
    data = parseJson(body.toString('utf8'));
  } catch (error) {
    return {
      ok: false,
      response: { status, data: emptyData() },
      error: new DecodeError(`Failed to decode response body: ${errorMessage(error)}`, status, {
        cause: error,
      }),
    };
  }

  const response: NormalizedResponse = { status, data };

  if (status > MAX_SUCCESS_STATUS) {
    return {
      ok: false,
      response,
      error: new ApiStatusError(statusErrorMessage(status, data), status, response),
    };
  }

  return { ok: true, response };
}
