/**
 * Unit Tests for withTimeout
 */

import { withTimeout } from './timeout';

describe('withTimeout()', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve with the value of a fast operation', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, () => new Error('timed out'))).resolves.toBe('done');
  });

  it('should pass through the rejection of a fast operation', async () => {
    await expect(
      withTimeout(Promise.reject(new Error('refused')), 1000, () => new Error('timed out'))
    ).rejects.toThrow('refused');
  });

  it('should reject with the timeout error when the deadline passes', async () => {
    jest.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 1000, () => new Error('timed out'));

    jest.advanceTimersByTime(1000);

    await expect(pending).rejects.toThrow('timed out');
  });

  it('should clear its timer once the operation settles', async () => {
    jest.useFakeTimers();

    await withTimeout(Promise.resolve(1), 1000, () => new Error('timed out'));

    expect(jest.getTimerCount()).toBe(0);
  });
});
