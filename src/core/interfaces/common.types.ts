import {
  BillingInterval,
  PaymentStatus,
  SubscriptionStatus,
} from '../domain/enums';

/**
 * Payment filter options
 */
export interface PaymentFilter {
  status?: PaymentStatus;
  customerRef?: string;
  subscriptionId?: string;
}

/**
 * Subscription filter options
 */
export interface SubscriptionFilter {
  status?: SubscriptionStatus;
  customerRef?: string;
}

/**
 * Input for a one-off charge
 */
export interface ProcessPaymentInput {
  /**
   * Decimal amount in major units (e.g. 99.99)
   */
  amount: number;
  currency: string;
  customerRef: string;
}

export interface CreateSubscriptionInput {
  amount: number;
  currency: string;
  customerRef: string;
  interval: BillingInterval;
  /**
   * First due date, defaults to now
   */
  nextPaymentDate?: Date;
  startDate?: Date;
}

export interface StorageStatistics {
  paymentCount: number;
  subscriptionCount: number;
  paymentsByStatus: Record<PaymentStatus, number>;
  subscriptionsByStatus: Record<SubscriptionStatus, number>;
}
