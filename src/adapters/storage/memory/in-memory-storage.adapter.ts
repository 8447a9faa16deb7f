import {
  KeyedMutex,
  NotFoundError,
  Payment,
  PaymentFilter,
  PaymentSnapshot,
  StorageAdapter,
  StorageStatistics,
  Subscription,
  SubscriptionFilter,
  SubscriptionLockContext,
  SubscriptionSnapshot,
  SubscriptionStatus,
  emptyPaymentStatusCounts,
  emptySubscriptionStatusCounts,
} from '../../../core';

/**
 * In-memory storage adapter
 * Keeps snapshots, so callers never share instances with the store
 */
export class InMemoryStorageAdapter implements StorageAdapter {
  private payments: Map<string, PaymentSnapshot> = new Map();
  private subscriptions: Map<string, SubscriptionSnapshot> = new Map();
  private readonly locks = new KeyedMutex();
  private readonly options: Required<InMemoryStorageOptions>;

  constructor(options: InMemoryStorageOptions = {}) {
    this.options = {
      simulateLatency: options.simulateLatency ?? false,
      latencyMs: options.latencyMs ?? 10,
      failHealthCheck: options.failHealthCheck ?? false,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs > 0) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  // ==================== Payment Operations ====================

  async savePayment(payment: Payment): Promise<Payment> {
    await this.simulateLatency();
    this.payments.set(payment.id, payment.toPlainObject());
    return payment;
  }

  async findPayment(id: string): Promise<Payment | null> {
    await this.simulateLatency();
    const snapshot = this.payments.get(id);
    return snapshot ? Payment.fromPlainObject(snapshot) : null;
  }

  async listPayments(filter: PaymentFilter = {}): Promise<Payment[]> {
    await this.simulateLatency();

    return Array.from(this.payments.values())
      .filter((p) => !filter.status || p.status === filter.status)
      .filter((p) => !filter.customerRef || p.customerRef === filter.customerRef)
      .filter(
        (p) => !filter.subscriptionId || p.subscriptionId === filter.subscriptionId,
      )
      .sort(newestFirst)
      .map((p) => Payment.fromPlainObject(p));
  }

  // ==================== Subscription Operations ====================

  async saveSubscription(subscription: Subscription): Promise<Subscription> {
    await this.simulateLatency();
    this.subscriptions.set(subscription.id, subscription.toPlainObject());
    return subscription;
  }

  async findSubscription(id: string): Promise<Subscription | null> {
    await this.simulateLatency();
    const snapshot = this.subscriptions.get(id);
    return snapshot ? Subscription.fromPlainObject(snapshot) : null;
  }

  async listSubscriptions(
    filter: SubscriptionFilter = {},
  ): Promise<Subscription[]> {
    await this.simulateLatency();

    return Array.from(this.subscriptions.values())
      .filter((s) => !filter.status || s.status === filter.status)
      .filter((s) => !filter.customerRef || s.customerRef === filter.customerRef)
      .sort(newestFirst)
      .map((s) => Subscription.fromPlainObject(s));
  }

  async findDueSubscriptions(
    threshold: Date,
    limit?: number,
  ): Promise<Subscription[]> {
    await this.simulateLatency();

    const due = Array.from(this.subscriptions.values())
      .filter(
        (s) =>
          s.status === SubscriptionStatus.ACTIVE &&
          s.nextPaymentDate.getTime() <= threshold.getTime(),
      )
      .sort(
        (a, b) =>
          a.nextPaymentDate.getTime() - b.nextPaymentDate.getTime() ||
          compareIds(a.id, b.id),
      );

    return (limit !== undefined ? due.slice(0, limit) : due).map((s) =>
      Subscription.fromPlainObject(s),
    );
  }

  async withSubscriptionLock<T>(
    id: string,
    work: (
      subscription: Subscription,
      context: SubscriptionLockContext,
    ) => Promise<T>,
  ): Promise<T> {
    return this.locks.runExclusive(id, async () => {
      await this.simulateLatency();

      const snapshot = this.subscriptions.get(id);
      if (!snapshot) {
        throw new NotFoundError('Subscription', id);
      }

      // Staged until work resolves
      const staged = new Map<string, PaymentSnapshot>();
      const subscription = Subscription.fromPlainObject(snapshot);
      const result = await work(subscription, {
        savePayment: async (payment) => {
          staged.set(payment.id, payment.toPlainObject());
          return payment;
        },
      });

      this.subscriptions.set(id, subscription.toPlainObject());
      for (const [paymentId, payment] of staged) {
        this.payments.set(paymentId, payment);
      }
      return result;
    });
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.failHealthCheck;
  }

  async getStatistics(): Promise<StorageStatistics> {
    await this.simulateLatency();

    const paymentsByStatus = emptyPaymentStatusCounts();
    for (const payment of this.payments.values()) {
      paymentsByStatus[payment.status]++;
    }

    const subscriptionsByStatus = emptySubscriptionStatusCounts();
    for (const subscription of this.subscriptions.values()) {
      subscriptionsByStatus[subscription.status]++;
    }

    return {
      paymentCount: this.payments.size,
      subscriptionCount: this.subscriptions.size,
      paymentsByStatus,
      subscriptionsByStatus,
    };
  }

  // ==================== Testing Utilities ====================

  /**
   * Clear all data
   */
  clear(): void {
    this.payments.clear();
    this.subscriptions.clear();
  }

  isLocked(subscriptionId: string): boolean {
    return this.locks.isLocked(subscriptionId);
  }
}

function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function newestFirst(
  a: { createdAt: Date; id: string },
  b: { createdAt: Date; id: string },
): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || compareIds(a.id, b.id);
}

/**
 * In-memory storage options
 */
export interface InMemoryStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  /**
   * Make isHealthy report false
   */
  failHealthCheck?: boolean;
}
