import { httpError, timeoutError } from '../../testing/http-fixtures';
import { isTransientHttpError, withRetry } from './resilience';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('rethrows the last error after maxAttempts', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('down'));

    await expect(
      withRetry(fn, { maxAttempts: 3, baseDelayMs: 1 }),
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops immediately when shouldRetry says no', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('fatal'));
    const onRetry = jest.fn();

    await expect(
      withRetry(fn, { baseDelayMs: 1, shouldRetry: () => false, onRetry }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });
});

describe('isTransientHttpError', () => {
  it('treats 429 and 5xx as transient', () => {
    expect(isTransientHttpError(httpError(429))).toBe(true);
    expect(isTransientHttpError(httpError(502))).toBe(true);
  });

  it('treats other statuses as permanent', () => {
    expect(isTransientHttpError(httpError(400))).toBe(false);
    expect(isTransientHttpError(httpError(403))).toBe(false);
  });

  it('treats errors without a response as transient', () => {
    expect(isTransientHttpError(timeoutError())).toBe(true);
  });

  it('ignores non-axios errors', () => {
    expect(isTransientHttpError(new Error('boom'))).toBe(false);
  });
});
