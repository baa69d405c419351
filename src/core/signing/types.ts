// src/core/signing/types.ts

export interface Credentials {
  readonly apiKey: string;
  readonly apiSecret: string;
}

export const HEADER_API_KEY = 'X-API-Key';
export const HEADER_TIMESTAMP = 'X-Timestamp';
export const HEADER_SIGNATURE = 'X-Signature';

export interface SignatureHeaders {
  [HEADER_API_KEY]: string;
  [HEADER_TIMESTAMP]: string;
  [HEADER_SIGNATURE]: string;
}
