export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that never returns the same millisecond twice, so records created by
 * one adapter instance have strictly increasing `createdAt`.
 */
export class MonotonicClock implements Clock {
  private last = 0;

  constructor(private readonly source: Clock = systemClock) {}

  now(): Date {
    const current = this.source.now().getTime();
    this.last = current > this.last ? current : this.last + 1;
    return new Date(this.last);
  }
}

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
export const RECENT_WINDOW_MS = 7 * DAY_MS;
