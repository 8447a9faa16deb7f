import { BillingInterval, SubscriptionStatus } from '../enums';
import { Money } from '../value-objects/money.vo';
import { subscriptionStateMachine } from '../../state-machine/state-machine';
import { SubscriptionNotActiveError } from '../../errors';
import { addBillingInterval } from '../../utils/billing-interval.util';

export interface SubscriptionSnapshot {
  id: string;
  amountMinor: number;
  amount: number;
  currency: string;
  customerRef: string;
  interval: BillingInterval;
  status: SubscriptionStatus;
  nextPaymentDate: Date;
  startDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Subscription domain model - a recurring charge and its schedule
 */
export class Subscription {
  constructor(
    public readonly id: string,
    public readonly money: Money,
    public readonly customerRef: string,
    public readonly interval: BillingInterval,
    public status: SubscriptionStatus,
    public nextPaymentDate: Date,
    public readonly startDate: Date = new Date(),
    public readonly createdAt: Date = new Date(),
    public updatedAt: Date = new Date(),
  ) {}

  get amount(): number {
    return this.money.toMajorUnits();
  }

  get currency(): string {
    return this.money.currency;
  }

  isActive(): boolean {
    return this.status === SubscriptionStatus.ACTIVE;
  }

  /**
   * Active and due at or before `now`
   */
  isDue(now: Date): boolean {
    return this.isActive() && this.nextPaymentDate.getTime() <= now.getTime();
  }

  /**
   * Move the due date one interval past the previous due date
   * (never from "now", so late ticks do not accumulate drift)
   */
  advanceNextPaymentDate(at: Date = new Date()): Date {
    if (!this.isActive()) {
      throw new SubscriptionNotActiveError(this.id, this.status);
    }
    this.nextPaymentDate = addBillingInterval(this.nextPaymentDate, this.interval);
    this.updatedAt = at;
    return this.nextPaymentDate;
  }

  pause(at: Date = new Date()): void {
    this.transitionTo(SubscriptionStatus.PAUSED, at);
  }

  resume(at: Date = new Date()): void {
    this.transitionTo(SubscriptionStatus.ACTIVE, at);
  }

  cancel(at: Date = new Date()): void {
    this.transitionTo(SubscriptionStatus.CANCELLED, at);
  }

  private transitionTo(status: SubscriptionStatus, at: Date): void {
    subscriptionStateMachine.assertTransition(this.status, status);
    this.status = status;
    this.updatedAt = at;
  }

  toPlainObject(): SubscriptionSnapshot {
    return {
      id: this.id,
      amountMinor: this.money.amount,
      amount: this.amount,
      currency: this.currency,
      customerRef: this.customerRef,
      interval: this.interval,
      status: this.status,
      nextPaymentDate: this.nextPaymentDate,
      startDate: this.startDate,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  toJSON(): SubscriptionSnapshot {
    return this.toPlainObject();
  }

  static fromPlainObject(data: SubscriptionSnapshot): Subscription {
    return new Subscription(
      data.id,
      new Money(data.amountMinor, data.currency),
      data.customerRef,
      data.interval,
      data.status,
      new Date(data.nextPaymentDate),
      new Date(data.startDate),
      new Date(data.createdAt),
      new Date(data.updatedAt),
    );
  }
}
