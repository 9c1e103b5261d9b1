/**
 * @fileoverview Tests for deadline enforcement
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { withTimeout } from './OperationTimeout';
import { ErrorCode, hasErrorCode } from './error.utils';

describe('withTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve with the value of a prompt operation', async () => {
    await expect(withTimeout(Promise.resolve('ok'), { timeoutMs: 100, operation: 'test' })).resolves.toBe('ok');
  });

  it('should pass through the operation failure', async () => {
    const failure = new Error('boom');
    await expect(withTimeout(Promise.reject(failure), { timeoutMs: 100, operation: 'test' })).rejects.toBe(failure);
  });

  it('should reject with TIMEOUT after running onTimeout', async () => {
    jest.useFakeTimers();
    const onTimeout = jest.fn();

    const result = withTimeout(new Promise<never>(() => undefined), {
      timeoutMs: 250,
      operation: 'exchange',
      onTimeout
    }).catch((error: unknown) => error);

    jest.advanceTimersByTime(249);
    expect(onTimeout).not.toHaveBeenCalled();
    jest.advanceTimersByTime(1);

    const error = await result;
    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(hasErrorCode(error, ErrorCode.TIMEOUT)).toBe(true);
  });

  it('should clear its timer once the operation settles', async () => {
    jest.useFakeTimers();

    await withTimeout(Promise.resolve(1), { timeoutMs: 1000, operation: 'test' });

    expect(jest.getTimerCount()).toBe(0);
  });
});
