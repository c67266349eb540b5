/**
 * @fileoverview Tests for Upbit request signing and response parsing helpers.
 */

import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import {
  buildQueryString,
  buildTokenPayload,
  createAuthorization,
  hashQuery,
} from '../src/upbit-auth.js';
import { formatVolume, parseOrder } from '../src/upbit-parse.js';

describe('buildQueryString', () => {
  it('should keep parameter order and stringify numbers', () => {
    expect(buildQueryString({ market: 'KRW-BTC', count: 200 })).toBe('market=KRW-BTC&count=200');
  });

  it('should form-encode values', () => {
    expect(buildQueryString({ side: 'bid', price: 5000, note: 'a b&c' })).toBe('side=bid&price=5000&note=a+b%26c');
  });
});

describe('buildTokenPayload', () => {
  it('should omit the query hash when there are no parameters', () => {
    expect(buildTokenPayload('test-access', undefined, 'nonce-1')).toEqual({
      access_key: 'test-access',
      nonce: 'nonce-1',
    });
    expect(buildTokenPayload('test-access', {}, 'nonce-1')).toEqual({
      access_key: 'test-access',
      nonce: 'nonce-1',
    });
  });

  it('should bind a SHA-512 hash of the query string', () => {
    const payload = buildTokenPayload('test-access', { uuid: 'abc' }, 'nonce-2');

    expect(payload.query_hash).toBe(hashQuery('uuid=abc'));
    expect(payload.query_hash).toHaveLength(128);
    expect(payload.query_hash_alg).toBe('SHA512');
  });

  it('should generate a fresh nonce per token', () => {
    const first = buildTokenPayload('test-access');
    const second = buildTokenPayload('test-access');

    expect(first.nonce).not.toBe(second.nonce);
  });
});

describe('createAuthorization', () => {
  it('should produce a bearer token verifiable with the secret', () => {
    const header = createAuthorization('test-access', 'test-secret', { market: 'KRW-BTC' }, 'nonce-3');

    expect(header.startsWith('Bearer ')).toBe(true);

    const token = header.slice('Bearer '.length);
    expect(jwt.decode(token, { complete: true })?.header.alg).toBe('HS256');
    expect(jwt.verify(token, 'test-secret')).toMatchObject({
      access_key: 'test-access',
      nonce: 'nonce-3',
      query_hash: hashQuery('market=KRW-BTC'),
    });
    expect(() => jwt.verify(token, 'other-secret')).toThrow();
  });
});

describe('formatVolume', () => {
  it('should print plain decimals with at most 8 places', () => {
    expect(formatVolume(0.5)).toBe('0.5');
    expect(formatVolume(3)).toBe('3');
    expect(formatVolume(10)).toBe('10');
    expect(formatVolume(1e-7)).toBe('0.0000001');
    expect(formatVolume(0.123456789)).toBe('0.12345679');
  });
});

describe('parseOrder', () => {
  it('should map ask orders to sells with a quantity', () => {
    expect(
      parseOrder({
        uuid: 'o-1',
        side: 'ask',
        ord_type: 'market',
        market: 'KRW-XRP',
        state: 'done',
        created_at: '2025-01-15T00:00:00Z',
        volume: '12.5',
      })
    ).toEqual({
      id: 'o-1',
      instrument: 'KRW-XRP',
      side: 'sell',
      quantity: 12.5,
      createdAt: '2025-01-15T00:00:00.000Z',
    });
  });
});
