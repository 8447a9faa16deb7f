export * from './billing-interval.util';
export * from './keyed-mutex';
export * from './promise-batch.util';
