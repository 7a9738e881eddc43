/**
 * Unit Tests for error classification and retry
 */

import { classifyError, errorMessage, formatError, retryWithBackoff } from '../error-handler';

describe('classifyError', () => {
  test('should treat connection drops, timeouts and deadlocks as transient', () => {
    expect(classifyError(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }))).toMatchObject({
      isTransient: true,
      category: 'connection',
    });
    expect(classifyError({ code: 'ETIMEOUT', message: 'Request failed' })).toMatchObject({ isTransient: true, category: 'timeout' });
    expect(classifyError({ statusCode: 503, message: 'Server busy' })).toMatchObject({ isTransient: true, category: 'timeout' });
    expect(classifyError({ number: 1205, message: 'Transaction was chosen as victim' })).toMatchObject({
      isTransient: true,
      category: 'deadlock',
    });
  });

  test('should treat auth, missing resources and SQL errors as permanent', () => {
    expect(classifyError({ number: 18456, message: 'Login failed' })).toMatchObject({ isTransient: false, category: 'auth' });
    expect(classifyError({ statusCode: 403, code: 'AuthorizationFailure' }).category).toBe('auth');
    expect(classifyError({ statusCode: 404, code: 'BlobNotFound' }).category).toBe('not_found');
    expect(classifyError(new Error("Invalid object name 'eavs_2024.t'")).category).toBe('syntax');
    expect(classifyError({ number: 2627, message: 'dup' }).category).toBe('constraint');
  });

  test('should keep the message of an unknown error', () => {
    expect(classifyError(new Error('something odd'))).toEqual({
      isTransient: false,
      category: 'unknown',
      message: 'something odd',
      suggestion: 'Review error details and logs',
    });
  });
});

describe('errorMessage', () => {
  test('should read messages from errors, objects and other values', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage({ message: 'b' })).toBe('b');
    expect(errorMessage('c')).toBe('c');
  });
});

describe('formatError', () => {
  test('should include the classification and SQL details', () => {
    const formatted = formatError({ number: 208, message: "Invalid object name 'x'", lineNumber: 3 });
    expect(formatted).toContain('  Category:    syntax\n');
    expect(formatted).toContain('  SQL Number:  208\n');
    expect(formatted).toContain('  Line:        3\n');
  });
});

describe('retryWithBackoff', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should retry a transient failure', async () => {
    const onRetry = jest.fn();
    let calls = 0;
    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls === 1) {
          throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
        }
        return 'ok';
      },
      { baseDelay: 1, onRetry }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  test('should not retry a permanent failure', async () => {
    const fn = jest.fn(async () => {
      throw new Error("Incorrect syntax near 'AS'");
    });
    await expect(retryWithBackoff(fn, { baseDelay: 1 })).rejects.toThrow("Incorrect syntax near 'AS'");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('should give up after maxRetries attempts', async () => {
    const fn = jest.fn(async () => {
      throw Object.assign(new Error('Connection lost'), { code: 'ESOCKET' });
    });
    await expect(retryWithBackoff(fn, { maxRetries: 2, baseDelay: 1 })).rejects.toThrow('Connection lost');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
