import {
  BillingInterval,
  ChargeRequest,
  GatewayChargeResult,
  GatewayRefundResult,
  GatewayTransaction,
  InMemoryStorageAdapter,
  Money,
  Payment,
  PaymentGatewayAdapter,
  Subscription,
  SubscriptionLockContext,
  SubscriptionStatus,
} from '../../src';

export interface SubscriptionFixture {
  id?: string;
  amount?: number;
  currency?: string;
  customerRef?: string;
  interval?: BillingInterval;
  status?: SubscriptionStatus;
  nextPaymentDate?: string;
}

export function buildSubscription(fixture: SubscriptionFixture = {}): Subscription {
  const nextPaymentDate = new Date(
    fixture.nextPaymentDate ?? '2025-01-31T12:00:00.000Z',
  );
  return new Subscription(
    fixture.id ?? 'sub-1',
    Money.fromMajorUnits(fixture.amount ?? 25, fixture.currency ?? 'USD'),
    fixture.customerRef ?? 'cust_sub',
    fixture.interval ?? BillingInterval.MONTHLY,
    fixture.status ?? SubscriptionStatus.ACTIVE,
    nextPaymentDate,
    nextPaymentDate,
    new Date('2025-01-01T00:00:00.000Z'),
    new Date('2025-01-01T00:00:00.000Z'),
  );
}

/**
 * Sequential ids: pay-1, pay-2, ...
 */
export function sequentialIds(prefix = 'pay'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * Run fn and hand back whatever it threw
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Wraps a gateway and throws for selected customers, like a dropped connection
 */
export class FlakyGateway implements PaymentGatewayAdapter {
  readonly gatewayName: string;

  constructor(
    private readonly inner: PaymentGatewayAdapter,
    private readonly brokenCustomers: string[],
    private readonly failure = 'connection reset',
  ) {
    this.gatewayName = inner.gatewayName;
  }

  async charge(request: ChargeRequest): Promise<GatewayChargeResult> {
    if (this.brokenCustomers.includes(request.customerRef)) {
      throw new Error(this.failure);
    }
    return this.inner.charge(request);
  }

  async refund(transactionRef: string): Promise<GatewayRefundResult> {
    return this.inner.refund(transactionRef);
  }

  async verifyTransaction(
    transactionRef: string,
  ): Promise<GatewayTransaction | null> {
    return this.inner.verifyTransaction(transactionRef);
  }
}

/**
 * In-memory storage whose payment writes fail a set number of times,
 * under the subscription lock and outside it
 */
export class FailingPaymentWrites extends InMemoryStorageAdapter {
  constructor(
    private lockedFailures: number,
    private directFailures = 0,
  ) {
    super();
  }

  async savePayment(payment: Payment): Promise<Payment> {
    if (this.directFailures > 0) {
      this.directFailures -= 1;
      throw new Error('payment write failed');
    }
    return super.savePayment(payment);
  }

  async withSubscriptionLock<T>(
    id: string,
    work: (
      subscription: Subscription,
      context: SubscriptionLockContext,
    ) => Promise<T>,
  ): Promise<T> {
    return super.withSubscriptionLock(id, (subscription, context) =>
      work(subscription, {
        savePayment: async (payment) => {
          if (this.lockedFailures > 0) {
            this.lockedFailures -= 1;
            throw new Error('payment write failed');
          }
          return context.savePayment(payment);
        },
      }),
    );
  }
}
