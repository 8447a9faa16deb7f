import { BillingInterval } from '../domain/enums';

/**
 * Calendar arithmetic for billing intervals.
 *
 * All computation happens in UTC so daylight-saving shifts never move a
 * due date. Month and year steps keep the day of month and clamp to the
 * last day when the target month is shorter (Jan 31 -> Feb 28/29,
 * Feb 29 -> Feb 28 the following year). The clamped day carries forward.
 */
export function addBillingInterval(date: Date, interval: BillingInterval): Date {
  switch (interval) {
    case BillingInterval.DAILY:
      return addUtcDays(date, 1);
    case BillingInterval.WEEKLY:
      return addUtcDays(date, 7);
    case BillingInterval.MONTHLY:
      return addUtcMonthsClamped(date, 1);
    case BillingInterval.YEARLY:
      return addUtcMonthsClamped(date, 12);
    default:
      return assertNever(interval);
  }
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(
    Date.UTC(
      date.getUTCFullYear(),
      date.getUTCMonth(),
      date.getUTCDate() + days,
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds(),
    ),
  );
}

export function addUtcMonthsClamped(date: Date, months: number): Date {
  const monthIndex = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(monthIndex / 12);
  const month = monthIndex - year * 12;
  // day 0 of the following month is the last day of this one
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  return new Date(
    Date.UTC(
      year,
      month,
      Math.min(date.getUTCDate(), lastDay),
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds(),
    ),
  );
}

function assertNever(value: never): never {
  throw new Error(`Unhandled billing interval: ${String(value)}`);
}
