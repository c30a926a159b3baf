import { describe, expect, it } from 'vitest';

import { MonotonicClock, type Clock } from './clock.js';

function frozen(ms: number): Clock {
  return { now: () => new Date(ms) };
}

describe('MonotonicClock', () => {
  it('passes the source time through while it advances', () => {
    let current = 1_000;
    const clock = new MonotonicClock({ now: () => new Date(current) });

    expect(clock.now().getTime()).toBe(1_000);
    current = 5_000;
    expect(clock.now().getTime()).toBe(5_000);
  });

  it('steps one millisecond past a stalled source', () => {
    const clock = new MonotonicClock(frozen(1_000));

    expect([clock.now(), clock.now(), clock.now()].map((date) => date.getTime())).toEqual([
      1_000, 1_001, 1_002,
    ]);
  });

  it('never goes backwards when the source does', () => {
    let current = 2_000;
    const clock = new MonotonicClock({ now: () => new Date(current) });

    clock.now();
    current = 1_500;

    expect(clock.now().getTime()).toBe(2_001);
  });
});
