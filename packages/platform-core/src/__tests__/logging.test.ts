import { describe, it, expect } from 'vitest';
import { maskSecrets, safeStringify } from '../logging/formatting';
import { serializeError } from '../logging/error-serializer';
import { correlationStorage, enrichCorrelationContext, getCorrelationId } from '../logging/correlation';

describe('maskSecrets', () => {
  it('should redact credential-looking keys at any depth it visits', () => {
    expect(
      maskSecrets({ username: 'ada', password: 'test-password', headers: { Authorization: 'Bearer x', accept: 'json' } })
    ).toEqual({ username: 'ada', password: '[REDACTED]', headers: { Authorization: '[REDACTED]', accept: 'json' } });
  });

  it('should stop descending at the depth limit', () => {
    expect(maskSecrets({ nested: { token: 't' } }, 1)).toEqual({ nested: { token: 't' } });
  });
});

describe('safeStringify', () => {
  it('should mask before serializing', () => {
    expect(safeStringify({ apiKey: 'k', count: 1 })).toBe('{"apiKey":"[REDACTED]","count":1}');
  });

  it('should truncate long output', () => {
    expect(safeStringify({ text: 'abcdefghij' }, 10)).toBe('{"text":"a...[TRUNCATED]');
  });

  it('should survive circular structures', () => {
    const node: Record<string, unknown> = {};
    node.self = node;

    expect(safeStringify(node)).toBe('[CIRCULAR_OR_INVALID_JSON]');
  });
});

describe('serializeError', () => {
  it('should follow the cause chain and keep driver codes', () => {
    const inner = Object.assign(new Error('duplicate key'), { code: '23505' });

    expect(serializeError(new Error('insert failed', { cause: inner }))).toMatchObject({
      message: 'insert failed',
      name: 'Error',
      cause: { message: 'duplicate key', code: '23505' },
    });
  });

  it('should wrap non-errors', () => {
    expect(serializeError('plain')).toEqual({ message: 'plain' });
    expect(serializeError(42)).toEqual({ message: '42' });
  });
});

describe('correlation context', () => {
  it('should carry enriched fields within a request and nothing outside one', () => {
    const seen = correlationStorage.run({ correlationId: 'corr-1' }, () => {
      enrichCorrelationContext({ userId: 7 });
      return { id: getCorrelationId(), store: correlationStorage.getStore() };
    });

    expect(seen).toEqual({ id: 'corr-1', store: { correlationId: 'corr-1', userId: 7 } });
    expect(getCorrelationId()).toBeUndefined();
  });
});
