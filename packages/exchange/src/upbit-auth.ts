/**
 * Request signing for Upbit private endpoints.
 *
 * Each private request carries a fresh HS256 token. When the request has
 * parameters, the token also binds a SHA-512 hash of their query string.
 */

import { createHash } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import type { UpbitParams } from './upbit-types.js';

export interface UpbitTokenPayload {
  access_key: string;
  nonce: string;
  query_hash?: string;
  query_hash_alg?: 'SHA512';
}

/**
 * Query string in parameter order, as the server rebuilds it for hashing.
 */
export function buildQueryString(params: UpbitParams): string {
  return new URLSearchParams(
    Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
  ).toString();
}

export function hashQuery(query: string): string {
  return createHash('sha512').update(query, 'utf-8').digest('hex');
}

export function buildTokenPayload(
  accessKey: string,
  params?: UpbitParams,
  nonce: string = uuidv4()
): UpbitTokenPayload {
  const payload: UpbitTokenPayload = { access_key: accessKey, nonce };

  if (params && Object.keys(params).length > 0) {
    payload.query_hash = hashQuery(buildQueryString(params));
    payload.query_hash_alg = 'SHA512';
  }

  return payload;
}

/**
 * Bearer header value for a private request.
 *
 * @example
 * ```typescript
 * const header = createAuthorization('test-access', 'test-secret', { market: 'KRW-BTC' });
 * // 'Bearer eyJhbGciOiJIUzI1NiIs...'
 * ```
 */
export function createAuthorization(
  accessKey: string,
  secretKey: string,
  params?: UpbitParams,
  nonce?: string
): string {
  const token = jwt.sign(buildTokenPayload(accessKey, params, nonce), secretKey, {
    algorithm: 'HS256',
  });
  return `Bearer ${token}`;
}
