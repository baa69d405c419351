// src/utils/errors.ts

import type { NormalizedResponse } from '../core/http/types';

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Construction-time errors
export class ConfigError extends SDKError {
  constructor(
    message: string,
    public issues: string[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class RequestConstructionError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REQUEST_CONSTRUCTION_ERROR', details);
  }
}

// Signing errors
export class SigningError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SIGNING_ERROR', details);
  }
}

export class BodyReadError extends SDKError {
  constructor(message: string = 'Failed to read request body', details?: Record<string, unknown>) {
    super(message, 'BODY_READ_ERROR', details);
  }
}

// Network errors
export class TransportError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

export class NetworkTimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Response errors, returned alongside a NormalizedResponse
export class ResponseBodyReadError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'RESPONSE_BODY_READ_ERROR', { ...details, status });
  }
}

export class DecodeError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'DECODE_ERROR', { ...details, status });
  }
}

export class ApiStatusError extends SDKError {
  constructor(
    message: string,
    public status: number,
    public response: NormalizedResponse
  ) {
    super(message, 'API_STATUS_ERROR', { status });
  }
}

export type ResponseError = ResponseBodyReadError | DecodeError | ApiStatusError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
