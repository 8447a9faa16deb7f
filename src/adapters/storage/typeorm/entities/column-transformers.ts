import { ValueTransformer } from 'typeorm';

/**
 * Dates kept as epoch milliseconds so every driver stores and orders
 * them the same way, in UTC
 */
export const epochMillisTransformer: ValueTransformer = {
  to: (value: Date | number | null | undefined): number | null => {
    if (value === null || value === undefined) {
      return null;
    }
    return value instanceof Date ? value.getTime() : value;
  },
  from: (value: string | number | null): Date | null =>
    value === null ? null : new Date(Number(value)),
};

/**
 * bigint columns come back as strings from some drivers
 */
export const bigintTransformer: ValueTransformer = {
  to: (value: number): number => value,
  from: (value: string | number): number => Number(value),
};
