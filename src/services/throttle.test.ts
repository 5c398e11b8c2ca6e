import { describe, expect, it, vi } from 'vitest';
import { RequestThrottle } from './throttle.js';

function fakeClock() {
  let now = 0;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
    sleep: vi.fn(async (ms: number) => {
      now += ms;
    }),
  };
}

describe('RequestThrottle', () => {
  it('lets the first call through and spaces the next one', async () => {
    const clock = fakeClock();
    const throttle = new RequestThrottle(1000, clock);

    await throttle.wait();
    await throttle.wait();
    clock.advance(1500);
    await throttle.wait();

    expect(clock.sleep.mock.calls).toEqual([[1000]]);
  });

  it('only sleeps for the rest of the interval', async () => {
    const clock = fakeClock();
    const throttle = new RequestThrottle(1000, clock);

    await throttle.wait();
    clock.advance(400);
    await throttle.wait();

    expect(clock.sleep.mock.calls).toEqual([[600]]);
  });

  it('queues concurrent callers', async () => {
    const clock = fakeClock();
    const throttle = new RequestThrottle(1000, clock);

    const results = await Promise.all([
      throttle.run(async () => 'a'),
      throttle.run(async () => 'b'),
      throttle.run(async () => 'c'),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(clock.sleep.mock.calls).toEqual([[1000], [1000]]);
  });
});
