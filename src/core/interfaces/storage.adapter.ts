import { Payment, Subscription } from '../domain/models';
import {
  PaymentFilter,
  SubscriptionFilter,
  StorageStatistics,
} from './common.types';

/**
 * Writes that commit or roll back together with a locked subscription
 */
export interface SubscriptionLockContext {
  savePayment(payment: Payment): Promise<Payment>;
}

/**
 * Storage adapter interface - abstracts all persistence
 * Implementations must make withSubscriptionLock exclusive per subscription
 */
export interface StorageAdapter {
  // ==================== Payment Operations ====================

  /**
   * Insert or update a payment
   */
  savePayment(payment: Payment): Promise<Payment>;

  findPayment(id: string): Promise<Payment | null>;

  /**
   * List payments, newest first
   */
  listPayments(filter?: PaymentFilter): Promise<Payment[]>;

  // ==================== Subscription Operations ====================

  /**
   * Insert or update a subscription
   */
  saveSubscription(subscription: Subscription): Promise<Subscription>;

  findSubscription(id: string): Promise<Subscription | null>;

  /**
   * List subscriptions, newest first
   */
  listSubscriptions(filter?: SubscriptionFilter): Promise<Subscription[]>;

  /**
   * Active subscriptions with nextPaymentDate <= threshold,
   * ordered by nextPaymentDate ascending then id
   */
  findDueSubscriptions(threshold: Date, limit?: number): Promise<Subscription[]>;

  /**
   * Exclusive read-modify-write of one subscription.
   *
   * Loads the current record, runs `work`, then persists the record as
   * `work` left it, together with every payment saved through `context`.
   * No other withSubscriptionLock call for the same id observes the record
   * until this one settles. If `work` throws, nothing is written. A
   * rejected `context.savePayment` discards only that payment write.
   * Throws NotFoundError when the subscription does not exist.
   */
  withSubscriptionLock<T>(
    id: string,
    work: (
      subscription: Subscription,
      context: SubscriptionLockContext,
    ) => Promise<T>,
  ): Promise<T>;

  // ==================== Health & Monitoring ====================

  isHealthy(): Promise<boolean>;

  getStatistics(): Promise<StorageStatistics>;
}
