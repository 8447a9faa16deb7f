import { DataSource } from 'typeorm';
import {
  BillingInterval,
  CHARGEFLOW_ENTITIES,
  FixedClock,
  FixedRandomSource,
  Money,
  NotFoundError,
  Payment,
  PaymentService,
  PaymentStatus,
  SimulatedGatewayAdapter,
  SubscriptionStatus,
  TypeORMStorageAdapter,
} from '../../src';
import { buildSubscription } from '../support/fixtures';

describe('TypeORM Storage Adapter Integration Tests', () => {
  let dataSource: DataSource;
  let adapter: TypeORMStorageAdapter;

  beforeAll(async () => {
    // In-process SQLite, schema built from the entities
    dataSource = new DataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      entities: CHARGEFLOW_ENTITIES,
      synchronize: true,
      logging: false,
    });

    await dataSource.initialize();
    adapter = new TypeORMStorageAdapter(dataSource);
  });

  afterAll(async () => {
    await dataSource.destroy();
  });

  beforeEach(async () => {
    await dataSource.query('DELETE FROM payments');
    await dataSource.query('DELETE FROM subscriptions');
  });

  describe('Payment Operations', () => {
    it('round-trips a payment', async () => {
      const payment = new Payment(
        '00000000-0000-4000-8000-000000000001',
        Money.fromMajorUnits(99.99, 'USD'),
        'cust_1',
        PaymentStatus.PENDING,
        null,
        null,
        new Date('2025-01-01T00:00:00.000Z'),
        new Date('2025-01-01T00:00:00.000Z'),
      );
      payment.markCompleted('txn_abc', new Date('2025-01-01T00:00:01.000Z'));

      await adapter.savePayment(payment);
      const loaded = await adapter.findPayment(payment.id);

      expect(loaded?.toPlainObject()).toEqual(payment.toPlainObject());
    });

    it('updates an existing row', async () => {
      const payment = new Payment('p-1', new Money(500, 'EUR'), 'cust_1');
      await adapter.savePayment(payment);

      payment.markFailed(new Date('2025-01-02T00:00:00.000Z'));
      await adapter.savePayment(payment);

      const all = await adapter.listPayments();
      expect(all).toHaveLength(1);
      expect(all[0].status).toBe(PaymentStatus.FAILED);
    });

    it('lists newest first with filters', async () => {
      const at = (id: string, iso: string, customerRef: string) =>
        new Payment(
          id,
          new Money(100, 'USD'),
          customerRef,
          PaymentStatus.PENDING,
          null,
          null,
          new Date(iso),
          new Date(iso),
        );
      await adapter.savePayment(at('p-1', '2025-01-01T00:00:00.000Z', 'cust_1'));
      await adapter.savePayment(at('p-2', '2025-02-01T00:00:00.000Z', 'cust_1'));
      await adapter.savePayment(at('p-3', '2025-03-01T00:00:00.000Z', 'cust_2'));

      expect((await adapter.listPayments()).map((p) => p.id)).toEqual([
        'p-3',
        'p-2',
        'p-1',
      ]);
      expect(
        (await adapter.listPayments({ customerRef: 'cust_1' })).map((p) => p.id),
      ).toEqual(['p-2', 'p-1']);
    });
  });

  describe('Subscription Operations', () => {
    it('round-trips a subscription', async () => {
      const subscription = buildSubscription({ id: 's-1', amount: 12.34 });

      await adapter.saveSubscription(subscription);
      const loaded = await adapter.findSubscription('s-1');

      expect(loaded?.toPlainObject()).toEqual(subscription.toPlainObject());
    });

    it('finds due active subscriptions ordered by date then id', async () => {
      await adapter.saveSubscription(
        buildSubscription({ id: 's-c', nextPaymentDate: '2025-03-02T00:00:00.000Z' }),
      );
      await adapter.saveSubscription(
        buildSubscription({ id: 's-b', nextPaymentDate: '2025-03-01T00:00:00.000Z' }),
      );
      await adapter.saveSubscription(
        buildSubscription({ id: 's-a', nextPaymentDate: '2025-03-02T00:00:00.000Z' }),
      );
      await adapter.saveSubscription(
        buildSubscription({
          id: 's-paused',
          status: SubscriptionStatus.PAUSED,
          nextPaymentDate: '2025-01-01T00:00:00.000Z',
        }),
      );
      await adapter.saveSubscription(
        buildSubscription({ id: 's-future', nextPaymentDate: '2025-04-01T00:00:00.000Z' }),
      );

      const threshold = new Date('2025-03-02T00:00:00.000Z');

      expect(
        (await adapter.findDueSubscriptions(threshold)).map((s) => s.id),
      ).toEqual(['s-b', 's-a', 's-c']);
      expect(
        (await adapter.findDueSubscriptions(threshold, 2)).map((s) => s.id),
      ).toEqual(['s-b', 's-a']);
    });
  });

  describe('Locking', () => {
    it('persists changes made under the lock', async () => {
      await adapter.saveSubscription(buildSubscription({ id: 's-1' }));

      await adapter.withSubscriptionLock('s-1', async (subscription) => {
        subscription.advanceNextPaymentDate(new Date('2025-01-31T12:00:00.000Z'));
      });

      expect((await adapter.findSubscription('s-1'))?.nextPaymentDate).toEqual(
        new Date('2025-02-28T12:00:00.000Z'),
      );
    });

    it('rolls back when the work throws', async () => {
      await adapter.saveSubscription(buildSubscription({ id: 's-1' }));

      await expect(
        adapter.withSubscriptionLock('s-1', async (subscription) => {
          subscription.cancel();
          throw new Error('abandon');
        }),
      ).rejects.toThrow('abandon');

      expect((await adapter.findSubscription('s-1'))?.status).toBe(
        SubscriptionStatus.ACTIVE,
      );
    });

    it('serializes concurrent updates', async () => {
      await adapter.saveSubscription(buildSubscription({ id: 's-1' }));

      await Promise.all([
        adapter.withSubscriptionLock('s-1', async (s) => {
          s.advanceNextPaymentDate();
        }),
        adapter.withSubscriptionLock('s-1', async (s) => {
          s.advanceNextPaymentDate();
        }),
      ]);

      expect((await adapter.findSubscription('s-1'))?.nextPaymentDate).toEqual(
        new Date('2025-03-28T12:00:00.000Z'),
      );
    });

    it('saves payments in the same transaction as the subscription', async () => {
      await adapter.saveSubscription(buildSubscription({ id: 's-1' }));
      const charged = new Payment('p-1', new Money(2500, 'USD'), 'cust_sub');

      await adapter.withSubscriptionLock('s-1', async (subscription, context) => {
        await context.savePayment(charged);
        subscription.advanceNextPaymentDate();
      });

      expect((await adapter.findPayment('p-1'))?.customerRef).toBe('cust_sub');
      expect((await adapter.findSubscription('s-1'))?.nextPaymentDate).toEqual(
        new Date('2025-02-28T12:00:00.000Z'),
      );
    });

    it('rolls back payments saved under the lock when the work throws', async () => {
      await adapter.saveSubscription(buildSubscription({ id: 's-1' }));

      await expect(
        adapter.withSubscriptionLock('s-1', async (_subscription, context) => {
          await context.savePayment(new Payment('p-1', new Money(2500, 'USD'), 'cust_sub'));
          throw new Error('abandon');
        }),
      ).rejects.toThrow('abandon');

      expect(await adapter.findPayment('p-1')).toBeNull();
    });

    it('rejects unknown subscriptions', async () => {
      await expect(
        adapter.withSubscriptionLock('missing', async () => undefined),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('With PaymentService', () => {
    it('charges, bills and refunds end to end', async () => {
      const clock = new FixedClock('2025-03-01T00:00:00.000Z');
      const gateway = new SimulatedGatewayAdapter(
        {},
        FixedRandomSource.alwaysSucceed(),
        clock,
      );
      const service = new PaymentService(adapter, gateway, { clock });

      const subscription = await service.createSubscription({
        amount: 9.99,
        currency: 'USD',
        customerRef: 'cust_1',
        interval: BillingInterval.MONTHLY,
      });
      const { payments } = await service.triggerRecurringScan();
      const refund = await service.refundPayment(payments[0].id);

      expect(refund.success).toBe(true);
      expect((await adapter.findPayment(payments[0].id))?.status).toBe(
        PaymentStatus.REFUNDED,
      );
      expect((await adapter.findSubscription(subscription.id))?.nextPaymentDate).toEqual(
        new Date('2025-04-01T00:00:00.000Z'),
      );
    });
  });

  describe('Health Check', () => {
    it('reports healthy and counts rows', async () => {
      await adapter.saveSubscription(buildSubscription({ id: 's-1' }));

      expect(await adapter.isHealthy()).toBe(true);
      const stats = await adapter.getStatistics();
      expect(stats.subscriptionCount).toBe(1);
      expect(stats.subscriptionsByStatus).toEqual({ active: 1, paused: 0, cancelled: 0 });
      expect(stats.paymentCount).toBe(0);
    });
  });
});
