import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, withCorrelationId, generateCorrelationId, redactObject } from '../logger.js';

describe('createLogger', () => {
  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'info');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should create a logger with a name', () => {
    const testLogger = createLogger({ name: 'triage-engine' });
    expect(testLogger.level).toBe('info');
  });

  it('should use custom log level', () => {
    expect(createLogger({ name: 'queue', level: 'debug' }).level).toBe('debug');
  });

  it('should use LOG_LEVEL environment variable', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    expect(createLogger({ name: 'queue' }).level).toBe('warn');
  });

  it('should bind the correlation ID when given', () => {
    const testLogger = createLogger({ name: 'queue', correlationId: 'corr-1' });
    expect(testLogger.bindings().correlationId).toBe('corr-1');
  });

  it('should omit base bindings without a correlation ID', () => {
    expect(createLogger({ name: 'queue' }).bindings().correlationId).toBeUndefined();
  });
});

describe('withCorrelationId', () => {
  it('should create a child logger with correlation ID', () => {
    const parent = createLogger({ name: 'parent', level: 'debug' });
    const child = withCorrelationId(parent, 'corr-123');

    expect(child.bindings().correlationId).toBe('corr-123');
    expect(child.level).toBe('debug');
  });
});

describe('generateCorrelationId', () => {
  it('should produce distinct ids', () => {
    const first = generateCorrelationId();
    const second = generateCorrelationId();

    expect(first).toMatch(/^\d+-[a-z0-9]+$/);
    expect(first).not.toBe(second);
  });
});

describe('redactObject', () => {
  it('should redact symptom and contact fields by key', () => {
    expect(
      redactObject({
        caseId: 'case-1',
        symptoms: 'bleeding from mouth',
        ownerPhone: '0712 345 678',
        nested: { reason: 'vomiting', priority: 'HIGH' },
      })
    ).toEqual({
      caseId: 'case-1',
      symptoms: '[REDACTED]',
      ownerPhone: '[REDACTED]',
      nested: { reason: '[REDACTED]', priority: 'HIGH' },
    });
  });

  it('should keep queue bookkeeping fields', () => {
    expect(redactObject({ tokenNumber: 4, lastCalledToken: 3, textLength: 42 })).toEqual({
      tokenNumber: 4,
      lastCalledToken: 3,
      textLength: 42,
    });
  });

  it('should scrub emails and phone numbers from free strings', () => {
    expect(redactObject('contact vet@example.com or +40712345678')).toBe(
      'contact [REDACTED] or [REDACTED]'
    );
  });

  it('should pass through primitives', () => {
    expect(redactObject(null)).toBeNull();
    expect(redactObject(12)).toBe(12);
  });
});
