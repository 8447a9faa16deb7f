import { Clock } from '../interfaces';

/**
 * Wall-clock time
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/**
 * Manually controlled time for tests and replays
 */
export class FixedClock implements Clock {
  private current: number;

  constructor(start: Date | string = new Date(0)) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(date: Date | string): void {
    this.current = new Date(date).getTime();
  }

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }
}
