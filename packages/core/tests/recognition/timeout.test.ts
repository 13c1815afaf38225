import { afterEach, describe, expect, it, vi } from 'vitest';
import { RecognitionFailureError } from '../../src/exceptions.js';
import { withTimeout } from '../../src/recognition/timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000)).resolves.toBe('ok');
  });

  it('rejects when the promise outlives the timeout', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => {}), 500);
    const assertion = expect(pending).rejects.toThrow('Recognition timed out after 500ms');

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    await expect(pending).rejects.toBeInstanceOf(RecognitionFailureError);
  });

  it('passes the promise through when disabled', async () => {
    const promise = Promise.resolve(1);
    await expect(withTimeout(promise, 0)).resolves.toBe(1);
  });

  it('propagates the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('engine down')), 1000)).rejects.toThrow('engine down');
  });
});
