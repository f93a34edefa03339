import { afterEach, describe, it, expect, vi } from 'vitest';
import { sleep } from '../src/utils/sleep.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(15_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(14_999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const pending = sleep(15_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await pending;

    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });
});
