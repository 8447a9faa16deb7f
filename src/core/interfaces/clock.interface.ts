/**
 * Injectable "now"
 */
export interface Clock {
  now(): Date;
}
