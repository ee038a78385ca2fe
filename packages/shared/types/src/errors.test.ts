import { describe, it, expect } from 'vitest';
import {
  ParleyError,
  ParleyErrorCodes,
  createConfigError,
  createExpiredError,
  createInvalidParametersError,
  createNoAgentError,
  createProviderUnavailableError,
  createToolDisabledError,
  createValidationError,
  errorMessage,
  extractErrorInfo,
  hasErrorCode,
  isParleyError,
  wrapError,
} from './errors.js';

describe('ParleyError', () => {
  it('should create error with all properties', () => {
    const error = new ParleyError({
      code: ParleyErrorCodes.VALIDATION,
      message: 'Invalid input',
      component: 'gateway',
      details: { field: 'text' },
      timestamp: '2024-01-15T10:30:00.000Z',
      correlationId: 'a1b2c3d4',
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ParleyError');
    expect(error.code).toBe('PARLEY_ERR_VALIDATION');
    expect(error.component).toBe('gateway');
    expect(error.details).toEqual({ field: 'text' });
    expect(error.correlationId).toBe('a1b2c3d4');
  });

  it('should preserve cause when provided', () => {
    const cause = new Error('socket hang up');
    const error = new ParleyError({
      code: ParleyErrorCodes.INTERNAL,
      message: 'Wrapped error',
      component: 'llm-proxy',
      timestamp: '2024-01-15T10:30:00.000Z',
      cause,
    });

    expect(error.cause).toBe(cause);
  });

  it('should serialize without the cause', () => {
    const error = new ParleyError({
      code: ParleyErrorCodes.EXPIRED,
      message: 'Session expired',
      component: 'confirmation',
      details: { sessionId: 'abc' },
      timestamp: '2024-01-15T10:30:00.000Z',
      correlationId: 'corr-456',
    });

    expect(error.toJSON()).toEqual({
      code: 'PARLEY_ERR_EXPIRED',
      message: 'Session expired',
      component: 'confirmation',
      details: { sessionId: 'abc' },
      timestamp: '2024-01-15T10:30:00.000Z',
      correlationId: 'corr-456',
    });
    expect(error.toString()).toBe('[PARLEY_ERR_EXPIRED] Session expired (component: confirmation)');
  });
});

describe('Error Factory Functions', () => {
  const options = { component: 'test-component', correlationId: 'trace-1' };

  it.each([
    [createConfigError, ParleyErrorCodes.CONFIG],
    [createToolDisabledError, ParleyErrorCodes.TOOL_DISABLED],
    [createInvalidParametersError, ParleyErrorCodes.INVALID_PARAMETERS],
    [createExpiredError, ParleyErrorCodes.EXPIRED],
    [createProviderUnavailableError, ParleyErrorCodes.PROVIDER_UNAVAILABLE],
    [createNoAgentError, ParleyErrorCodes.NO_AGENT],
  ])('should stamp the matching code (%#)', (factory, code) => {
    const error = factory('boom', options);
    expect(error.code).toBe(code);
    expect(error.message).toBe('boom');
    expect(error.component).toBe('test-component');
    expect(new Date(error.timestamp).toString()).not.toBe('Invalid Date');
  });
});

describe('Error Utilities', () => {
  it('should recognize ParleyError instances only', () => {
    expect(isParleyError(createConfigError('x', { component: 'c' }))).toBe(true);
    expect(isParleyError(new Error('x'))).toBe(false);
    expect(isParleyError({ code: 'PARLEY_ERR_CONFIG' })).toBe(false);
  });

  it('should compare error codes', () => {
    const error = createValidationError('Test', { component: 'test' });
    expect(hasErrorCode(error, ParleyErrorCodes.VALIDATION)).toBe(true);
    expect(hasErrorCode(error, ParleyErrorCodes.CONFIG)).toBe(false);
    expect(hasErrorCode(new Error('x'), ParleyErrorCodes.INTERNAL)).toBe(false);
  });

  it('should return ParleyError as-is when wrapping', () => {
    const original = createConfigError('Original', { component: 'test' });
    expect(wrapError(original, { component: 'wrapper' })).toBe(original);
  });

  it('should wrap plain errors and values as internal errors', () => {
    const original = new Error('Regular error');
    const wrapped = wrapError(original, { component: 'test' });
    expect(wrapped.code).toBe(ParleyErrorCodes.INTERNAL);
    expect(wrapped.cause).toBe(original);
    expect(wrapError(123, { component: 'test' }).message).toBe('123');
  });

  it('should extract loggable info', () => {
    const error = createValidationError('Validation failed', {
      component: 'gateway',
      details: { field: 'sender.id' },
    });

    expect(extractErrorInfo(error)).toEqual({
      code: 'PARLEY_ERR_VALIDATION',
      message: 'Validation failed',
      component: 'gateway',
      details: { field: 'sender.id' },
      timestamp: expect.any(String),
      correlationId: undefined,
    });
    expect(extractErrorInfo('string error')).toEqual({ message: 'string error' });
  });

  it('should produce a short message for any thrown value', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage('plain')).toBe('plain');
  });
});
