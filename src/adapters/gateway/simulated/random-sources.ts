import { InvalidArgumentError, RandomSource } from '../../../core';

/**
 * Math.random backed source for normal operation
 */
export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * Deterministic mulberry32 generator - same seed, same sequence
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isFinite(seed)) {
      throw new InvalidArgumentError('Seed must be a finite number', { seed });
    }
    this.state = Math.trunc(seed) | 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Returns a constant, or cycles through a fixed sequence
 */
export class FixedRandomSource implements RandomSource {
  private readonly values: number[];
  private index = 0;

  constructor(values: number | number[]) {
    this.values = Array.isArray(values) ? [...values] : [values];

    if (this.values.length === 0) {
      throw new InvalidArgumentError('At least one value is required');
    }
    for (const value of this.values) {
      if (!(value >= 0 && value < 1)) {
        throw new InvalidArgumentError('Random values must be in [0, 1)', {
          value,
        });
      }
    }
  }

  next(): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value;
  }

  /**
   * Source that makes every probability check pass
   */
  static alwaysSucceed(): FixedRandomSource {
    return new FixedRandomSource(0);
  }

  /**
   * Source that makes every probability check below 1 fail
   */
  static alwaysFail(): FixedRandomSource {
    return new FixedRandomSource(0.999999);
  }
}
