// src/llm/utils/retry-with-backoff.spec.ts

import { backoffDelay, isRetryableError, retryWithBackoff } from './retry-with-backoff';

const networkError = (code: string): Error => Object.assign(new Error('socket hang up'), { code });

describe('retryWithBackoff', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  });

  it('should retry transient failures with exponential delays', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockRejectedValueOnce(networkError('ETIMEDOUT'))
      .mockResolvedValue('ok');

    await expect(retryWithBackoff(fn, { jitter: false, sleep })).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[200], [400]]);
  });

  it('should rethrow errors that are not retryable without waiting', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('Invalid API key'));

    await expect(retryWithBackoff(fn, { sleep })).rejects.toThrow('Invalid API key');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should give up after the maximum number of retries', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(networkError('ECONNREFUSED'));

    await expect(retryWithBackoff(fn, { maxRetries: 2, jitter: false, sleep })).rejects.toThrow('socket hang up');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should cap the delay', () => {
    expect(backoffDelay(0)).toBe(200);
    expect(backoffDelay(3)).toBe(1600);
    expect(backoffDelay(4)).toBe(2000);
    expect(backoffDelay(1, { initialDelayMs: 100, factor: 3 })).toBe(300);
  });

  it('should recognise retryable errors by message or code', () => {
    expect(isRetryableError(new Error('timeout of 60000ms exceeded'))).toBe(true);
    expect(isRetryableError(networkError('EAI_AGAIN'))).toBe(true);
    expect(isRetryableError(new Error('Bad request'))).toBe(false);
    expect(isRetryableError('ENOTFOUND api.example.com')).toBe(true);
  });
});
