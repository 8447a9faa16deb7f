import { HttpStatus, INestApplicationContext, HttpException } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  BillingInterval,
  ChargeFlowModule,
  ChargeFlowModuleConfig,
  FixedClock,
  FixedRandomSource,
  HealthController,
  InMemoryStorageAdapter,
  PAYMENT_GATEWAY,
  PaymentController,
  PaymentService,
  PaymentStatus,
  RecurringBillingProcessor,
  STORAGE_ADAPTER,
  SimulatedGatewayAdapter,
  SubscriptionController,
} from '../../src';

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

describe('ChargeFlowModule', () => {
  let app: INestApplicationContext;

  const boot = async (config: Partial<ChargeFlowModuleConfig> = {}) => {
    app = await NestFactory.createApplicationContext(
      ChargeFlowModule.forRoot({
        storage: { type: 'memory' },
        gateway: { random: FixedRandomSource.alwaysSucceed() },
        clock: new FixedClock('2025-07-01T00:00:00.000Z'),
        ...config,
      }),
      { logger: false },
    );
  };

  afterEach(async () => {
    await app.close();
  });

  it('wires storage, gateway and the payment service', async () => {
    await boot();

    expect(app.get(STORAGE_ADAPTER)).toBeInstanceOf(InMemoryStorageAdapter);
    expect(app.get(PAYMENT_GATEWAY)).toBeInstanceOf(SimulatedGatewayAdapter);

    const result = await app.get(PaymentService).executeProcessPayment({
      amount: 99.99,
      currency: 'USD',
      customerRef: 'cust_1',
    });
    expect(result.success).toBe(true);
  });

  it('leaves the billing timer off unless enabled', async () => {
    await boot();

    expect(app.get(RecurringBillingProcessor).isRunning()).toBe(false);
  });

  it('starts and stops the billing timer with the application', async () => {
    await boot({ scheduler: { enabled: true, tickIntervalMs: 60_000 } });
    const processor = app.get(RecurringBillingProcessor);

    expect(processor.isRunning()).toBe(true);

    await processor.stopProcessing();
    expect(processor.isRunning()).toBe(false);
  });

  it('runs a tick on demand through the processor', async () => {
    await boot();
    await app.get(PaymentService).createSubscription({
      amount: 5,
      currency: 'USD',
      customerRef: 'cust_1',
      interval: BillingInterval.DAILY,
    });

    const report = await app.get(RecurringBillingProcessor).triggerProcessing();

    expect(report?.payments).toHaveLength(1);
    expect(app.get(RecurringBillingProcessor).getLastReport()).toBe(report);
  });

  describe('controllers', () => {
    it('charges and refunds over the payment controller', async () => {
      await boot();
      const controller = app.get(PaymentController);

      const payment = await controller.processPayment({
        amount: 42,
        currency: 'USD',
        customerRef: 'cust_1',
      });
      const refunded = await controller.refundPayment(payment.id);

      expect(refunded.status).toBe(PaymentStatus.REFUNDED);
      await expect(controller.refundPayment(payment.id)).rejects.toMatchObject({
        response: { code: 'NO_COMMAND_TO_UNDO' },
      });
    });

    it('answers 402 for a declined charge', async () => {
      await boot({ gateway: { random: FixedRandomSource.alwaysFail() } });

      const error = await app
        .get(PaymentController)
        .processPayment({ amount: 42, currency: 'USD', customerRef: 'cust_1' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpException);
      if (error instanceof HttpException) {
        expect(error.getStatus()).toBe(HttpStatus.PAYMENT_REQUIRED);
      }
    });

    it('answers 404 for an unknown payment', async () => {
      await boot();

      const error = await app
        .get(PaymentController)
        .refundPayment(UNKNOWN_ID)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpException);
      if (error instanceof HttpException) {
        expect(error.getStatus()).toBe(HttpStatus.NOT_FOUND);
      }
    });

    it('manages subscriptions', async () => {
      await boot();
      const controller = app.get(SubscriptionController);

      const created = await controller.createSubscription({
        amount: 10,
        currency: 'USD',
        customerRef: 'cust_1',
        interval: BillingInterval.WEEKLY,
      });
      const paused = await controller.pauseSubscription(created.id);

      expect(paused.status).toBe('paused');
      expect((await controller.listSubscriptions({})).map((s) => s.id)).toEqual([
        created.id,
      ]);
    });

    it('reports readiness', async () => {
      await boot();

      const ready = await app.get(HealthController).readiness();

      expect(ready.status).toBe('ready');
    });
  });
});
