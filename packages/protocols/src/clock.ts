import type { Timestamp } from "@cellar/types";

/**
 * Source of the current time in unix seconds.
 * Share locks and swap deadlines read it; nothing else does.
 */
export interface Clock {
  now(): Timestamp;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: Timestamp;

  constructor(start: Timestamp = 0) {
    this._now = start;
  }

  now(): Timestamp {
    return this._now;
  }

  advance(seconds: number): void {
    this._now += seconds;
  }

  set(timestamp: Timestamp): void {
    this._now = timestamp;
  }
}
