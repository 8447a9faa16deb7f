import {
  BillingInterval,
  SubscriptionStatus,
  addBillingInterval,
} from '../../src';
import { buildSubscription } from '../support/fixtures';

const at = (iso: string) => new Date(iso);

describe('addBillingInterval', () => {
  it('adds one day, keeping the time of day', () => {
    expect(
      addBillingInterval(at('2025-12-31T10:30:00.000Z'), BillingInterval.DAILY),
    ).toEqual(at('2026-01-01T10:30:00.000Z'));
  });

  it('adds seven days for weekly', () => {
    expect(
      addBillingInterval(at('2025-02-25T08:00:00.000Z'), BillingInterval.WEEKLY),
    ).toEqual(at('2025-03-04T08:00:00.000Z'));
  });

  it('keeps the day of month when the next month has it', () => {
    expect(
      addBillingInterval(at('2025-03-15T09:00:00.000Z'), BillingInterval.MONTHLY),
    ).toEqual(at('2025-04-15T09:00:00.000Z'));
  });

  it('clamps to the last day of a shorter month', () => {
    expect(
      addBillingInterval(at('2025-01-31T12:00:00.000Z'), BillingInterval.MONTHLY),
    ).toEqual(at('2025-02-28T12:00:00.000Z'));
  });

  it('clamps to Feb 29 in a leap year', () => {
    expect(
      addBillingInterval(at('2024-01-31T12:00:00.000Z'), BillingInterval.MONTHLY),
    ).toEqual(at('2024-02-29T12:00:00.000Z'));
  });

  it('rolls the year over in December', () => {
    expect(
      addBillingInterval(at('2025-12-31T00:00:00.000Z'), BillingInterval.MONTHLY),
    ).toEqual(at('2026-01-31T00:00:00.000Z'));
  });

  it('moves a leap day to Feb 28 the following year', () => {
    expect(
      addBillingInterval(at('2024-02-29T00:00:00.000Z'), BillingInterval.YEARLY),
    ).toEqual(at('2025-02-28T00:00:00.000Z'));
  });
});

describe('Subscription schedule', () => {
  it('carries the clamped day forward', () => {
    const subscription = buildSubscription({
      nextPaymentDate: '2025-01-31T12:00:00.000Z',
    });

    subscription.advanceNextPaymentDate();
    expect(subscription.nextPaymentDate).toEqual(at('2025-02-28T12:00:00.000Z'));

    subscription.advanceNextPaymentDate();
    expect(subscription.nextPaymentDate).toEqual(at('2025-03-28T12:00:00.000Z'));
  });

  it('advances from the previous due date, not from now', () => {
    const subscription = buildSubscription({
      interval: BillingInterval.WEEKLY,
      nextPaymentDate: '2025-01-01T00:00:00.000Z',
    });

    subscription.advanceNextPaymentDate(at('2025-01-20T00:00:00.000Z'));

    expect(subscription.nextPaymentDate).toEqual(at('2025-01-08T00:00:00.000Z'));
    expect(subscription.updatedAt).toEqual(at('2025-01-20T00:00:00.000Z'));
  });

  it('is due at exactly its next payment date', () => {
    const subscription = buildSubscription({
      nextPaymentDate: '2025-05-01T00:00:00.000Z',
    });

    expect(subscription.isDue(at('2025-04-30T23:59:59.999Z'))).toBe(false);
    expect(subscription.isDue(at('2025-05-01T00:00:00.000Z'))).toBe(true);
  });

  it('is never due while paused', () => {
    const subscription = buildSubscription({
      status: SubscriptionStatus.PAUSED,
      nextPaymentDate: '2025-05-01T00:00:00.000Z',
    });

    expect(subscription.isDue(at('2026-01-01T00:00:00.000Z'))).toBe(false);
    expect(() => subscription.advanceNextPaymentDate()).toThrow(
      'Subscription sub-1 is paused',
    );
  });
});
