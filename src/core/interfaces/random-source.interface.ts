/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export interface RandomSource {
  next(): number;
}
