/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  TradeLoopError,
  DataUnavailableError,
  OrderRejectedError,
  ComputationError,
  CycleError,
  ConfigurationError,
  ExchangeApiError,
  isTradeLoopError,
  isDataUnavailableError,
  isOrderRejectedError,
  isComputationError,
  isCycleError,
  isConfigurationError,
  isExchangeApiError,
  errorMessage,
  errorFields,
} from '../src/errors.js';

describe('TradeLoopError', () => {
  it('should create error with code and message', () => {
    const error = new TradeLoopError('TEST_CODE', 'Test message');

    expect(error.name).toBe('TradeLoopError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new TradeLoopError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new TradeLoopError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new TradeLoopError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json.name).toBe('TradeLoopError');
    expect(json.code).toBe('TEST_CODE');
    expect(json.message).toBe('Test message');
    expect(json.data).toEqual({ key: 'value' });
    expect(json.timestamp).toBe(error.timestamp);
    expect(json.stack).toBeDefined();
  });

  it('should be JSON stringifiable', () => {
    const error = new TradeLoopError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('TradeLoopError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.data.key).toBe('value');
  });
});

describe('DataUnavailableError', () => {
  it('should carry the DATA_UNAVAILABLE code and resource context', () => {
    const error = new DataUnavailableError('No candles', {
      resource: 'bars',
      instrument: 'KRW-BTC',
    });

    expect(error.name).toBe('DataUnavailableError');
    expect(error.code).toBe('DATA_UNAVAILABLE');
    expect(error.data?.resource).toBe('bars');
    expect(error.data?.instrument).toBe('KRW-BTC');
    expect(error).toBeInstanceOf(TradeLoopError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('OrderRejectedError', () => {
  it('should serialize order context', () => {
    const error = new OrderRejectedError('Rejected', {
      instrument: 'KRW-ETH',
      side: 'sell',
      amount: 0.5,
    });

    const parsed = JSON.parse(JSON.stringify(error.toJSON()));

    expect(parsed.code).toBe('ORDER_REJECTED');
    expect(parsed.data.side).toBe('sell');
    expect(parsed.data.amount).toBe(0.5);
  });
});

describe('remaining error codes', () => {
  it('should assign a distinct code to each class', () => {
    expect(new ComputationError('x', { stage: 'indicators' }).code).toBe('COMPUTATION_ERROR');
    expect(new CycleError('x', { phase: 'strategy' }).code).toBe('CYCLE_ERROR');
    expect(new ConfigurationError('x').code).toBe('CONFIGURATION_ERROR');
    expect(new ExchangeApiError('x', { exchange: 'paper', endpoint: '/v1/ticker' }).code).toBe(
      'EXCHANGE_API_ERROR'
    );
  });
});

describe('Type guards', () => {
  it('isTradeLoopError should accept every subclass', () => {
    expect(isTradeLoopError(new TradeLoopError('A', 'a'))).toBe(true);
    expect(isTradeLoopError(new CycleError('b', { phase: 'risk' }))).toBe(true);
    expect(isTradeLoopError(new Error('plain'))).toBe(false);
    expect(isTradeLoopError('string')).toBe(false);
    expect(isTradeLoopError(null)).toBe(false);
  });

  it('specific guards should only accept their own class', () => {
    const dataError = new DataUnavailableError('x', { resource: 'price' });
    const orderError = new OrderRejectedError('x', { instrument: 'KRW-BTC', side: 'buy', amount: 1 });

    expect(isDataUnavailableError(dataError)).toBe(true);
    expect(isDataUnavailableError(orderError)).toBe(false);
    expect(isOrderRejectedError(orderError)).toBe(true);
    expect(isComputationError(new ComputationError('x', { stage: 'fuse' }))).toBe(true);
    expect(isCycleError(dataError)).toBe(false);
    expect(isConfigurationError(new ConfigurationError('x'))).toBe(true);
    expect(isExchangeApiError(new ExchangeApiError('x', { exchange: 'e', endpoint: '/' }))).toBe(
      true
    );
  });
});

describe('errorMessage', () => {
  it('should read Error messages and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('raw')).toBe('raw');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('errorFields', () => {
  it('should flatten code and data for log metadata', () => {
    const error = new OrderRejectedError('Sell rejected', {
      instrument: 'KRW-ETH',
      side: 'sell',
      amount: 0.5,
    });

    expect(errorFields(error)).toEqual({
      code: 'ORDER_REJECTED',
      instrument: 'KRW-ETH',
      side: 'sell',
      amount: 0.5,
    });
  });
});
