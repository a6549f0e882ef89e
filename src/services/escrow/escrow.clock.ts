import type { Clock } from './escrow.types';

/**
 * Wall-clock seconds that never go backwards, even if the system clock does.
 */
export class SystemClock implements Clock {
  private last = 0;

  now(): number {
    const current = Math.floor(Date.now() / 1000);
    if (current > this.last) {
      this.last = current;
    }
    return this.last;
  }
}
