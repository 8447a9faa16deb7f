import { Logger, LoggerService } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  BillingInterval,
  PaymentStatus,
  SubscriptionStatus,
} from '../domain/enums';
import { Payment, Subscription } from '../domain/models';
import { Money } from '../domain/value-objects/money.vo';
import {
  InvalidArgumentError,
  NotFoundError,
  toEngineError,
} from '../errors';
import {
  Clock,
  CreateSubscriptionInput,
  PaymentFilter,
  PaymentGatewayAdapter,
  ProcessPaymentInput,
  StorageAdapter,
  StorageStatistics,
  SubscriptionFilter,
} from '../interfaces';
import { SystemClock } from '../clock';
import {
  CommandInvoker,
  PaymentOperationResult,
  ProcessPaymentCommand,
  failure,
} from '../commands';
import {
  InFlightRegistry,
  RecurringPaymentScheduler,
  SubscriptionFailure,
  TickReport,
} from '../scheduler';

export interface PaymentServiceOptions {
  clock?: Clock;
  logger?: LoggerService;
  inFlight?: InFlightRegistry;
  concurrency?: number;
  batchSize?: number;
  /**
   * Invokers kept for later refunds; the oldest is dropped past this size
   * @default 10000
   */
  maxTrackedInvokers?: number;
}

export interface RecurringScanResult {
  payments: Payment[];
  errors: SubscriptionFailure[];
  report: TickReport;
}

/**
 * Entry point for charging, refunding and subscription management.
 *
 * Every one-off charge runs through its own CommandInvoker, kept by payment
 * id so a later refund undoes exactly that command.
 */
export class PaymentService {
  private readonly clock: Clock;
  private readonly logger: LoggerService;
  private readonly scheduler: RecurringPaymentScheduler;
  private readonly maxTrackedInvokers: number;
  private readonly invokers = new Map<string, CommandInvoker>();

  constructor(
    private readonly storage: StorageAdapter,
    private readonly gateway: PaymentGatewayAdapter,
    options: PaymentServiceOptions = {},
  ) {
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? new Logger(PaymentService.name);
    this.maxTrackedInvokers = Math.max(1, options.maxTrackedInvokers ?? 10000);
    this.scheduler = new RecurringPaymentScheduler(storage, gateway, {
      clock: this.clock,
      inFlight: options.inFlight,
      concurrency: options.concurrency,
      batchSize: options.batchSize,
      onPaymentExecuted: (payment, invoker) => this.track(payment.id, invoker),
    });
  }

  getScheduler(): RecurringPaymentScheduler {
    return this.scheduler;
  }

  // ==================== Commands ====================

  async executeProcessPayment(
    input: ProcessPaymentInput,
  ): Promise<PaymentOperationResult> {
    const invoker = new CommandInvoker({ clock: this.clock });
    const command = new ProcessPaymentCommand(
      {
        amount: input.amount,
        currency: input.currency,
        customerRef: input.customerRef,
      },
      { gateway: this.gateway, clock: this.clock },
    );

    const result = await invoker.execute(command);

    if (result.payment) {
      try {
        await this.storage.savePayment(result.payment);
      } catch (error) {
        const engineError = toEngineError(error);
        this.logger.error(
          `Failed to record payment ${result.payment.id}: ${engineError.message}`,
        );
        return failure(engineError, result.payment);
      }
      this.track(result.payment.id, invoker);
    }

    return result;
  }

  /**
   * Refund a payment by undoing the command that produced it
   */
  async refundPayment(paymentId: string): Promise<PaymentOperationResult> {
    let invoker = this.invokers.get(paymentId);

    if (!invoker) {
      let payment: Payment | null;
      try {
        payment = await this.storage.findPayment(paymentId);
      } catch (error) {
        return failure(toEngineError(error));
      }
      if (!payment) {
        return failure(new NotFoundError('Payment', paymentId));
      }

      // another refund may have rebuilt it while we were loading
      invoker = this.invokers.get(paymentId) ?? this.rebuildInvoker(payment);
      this.track(paymentId, invoker);
    }

    const result = await invoker.undoLast();

    if (result.success) {
      this.invokers.delete(paymentId);
      try {
        await this.storage.savePayment(result.payment);
      } catch (error) {
        const engineError = toEngineError(error);
        this.logger.error(
          `Payment ${paymentId} was refunded but could not be recorded: ${engineError.message}`,
        );
        return failure(engineError, result.payment);
      }
    }

    return result;
  }

  /**
   * Run one scheduler tick on demand
   */
  async triggerRecurringScan(
    now: Date = this.clock.now(),
  ): Promise<RecurringScanResult> {
    const report = await this.scheduler.runTick(now);
    return { payments: report.payments, errors: report.errors, report };
  }

  async processSubscription(
    subscriptionId: string,
    now: Date = this.clock.now(),
  ): Promise<PaymentOperationResult> {
    return this.scheduler.processSubscription(subscriptionId, now);
  }

  // ==================== Payments ====================

  async listPayments(filter: PaymentFilter = {}): Promise<Payment[]> {
    return this.storage.listPayments(filter);
  }

  async getPayment(id: string): Promise<Payment> {
    const payment = await this.storage.findPayment(id);
    if (!payment) {
      throw new NotFoundError('Payment', id);
    }
    return payment;
  }

  // ==================== Subscriptions ====================

  async createSubscription(input: CreateSubscriptionInput): Promise<Subscription> {
    const money = Money.fromMajorUnits(input.amount, input.currency);

    const customerRef = (input.customerRef ?? '').trim();
    if (!customerRef) {
      throw new InvalidArgumentError('Customer reference is required');
    }

    if (!Object.values(BillingInterval).includes(input.interval)) {
      throw new InvalidArgumentError(`Unsupported billing interval: ${input.interval}`, {
        interval: input.interval,
      });
    }

    const now = this.clock.now();
    const nextPaymentDate = this.validDate(input.nextPaymentDate ?? now, 'nextPaymentDate');
    const startDate = this.validDate(input.startDate ?? nextPaymentDate, 'startDate');

    const subscription = new Subscription(
      uuidv4(),
      money,
      customerRef,
      input.interval,
      SubscriptionStatus.ACTIVE,
      nextPaymentDate,
      startDate,
      now,
      now,
    );

    await this.storage.saveSubscription(subscription);
    this.logger.log(
      `Subscription ${subscription.id} created: ${money.toString()} ${subscription.interval}, first due ${nextPaymentDate.toISOString()}`,
    );
    return subscription;
  }

  async listSubscriptions(filter: SubscriptionFilter = {}): Promise<Subscription[]> {
    return this.storage.listSubscriptions(filter);
  }

  async getSubscription(id: string): Promise<Subscription> {
    const subscription = await this.storage.findSubscription(id);
    if (!subscription) {
      throw new NotFoundError('Subscription', id);
    }
    return subscription;
  }

  async pauseSubscription(id: string): Promise<Subscription> {
    return this.storage.withSubscriptionLock(id, async (subscription) => {
      subscription.pause(this.clock.now());
      this.logger.log(`Subscription ${id} paused`);
      return subscription;
    });
  }

  async resumeSubscription(id: string): Promise<Subscription> {
    return this.storage.withSubscriptionLock(id, async (subscription) => {
      subscription.resume(this.clock.now());
      this.logger.log(`Subscription ${id} resumed`);
      return subscription;
    });
  }

  async cancelSubscription(id: string): Promise<Subscription> {
    return this.storage.withSubscriptionLock(id, async (subscription) => {
      subscription.cancel(this.clock.now());
      this.logger.log(`Subscription ${id} cancelled`);
      return subscription;
    });
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    return this.storage.isHealthy();
  }

  async getStatistics(): Promise<StorageStatistics> {
    return this.storage.getStatistics();
  }

  /**
   * Number of payments that currently have a live invoker
   */
  get trackedInvokerCount(): number {
    return this.invokers.size;
  }

  // ==================== Private Helpers ====================

  private track(paymentId: string, invoker: CommandInvoker): void {
    this.invokers.delete(paymentId);
    this.invokers.set(paymentId, invoker);

    while (this.invokers.size > this.maxTrackedInvokers) {
      const oldest = this.invokers.keys().next();
      if (oldest.done) {
        break;
      }
      this.invokers.delete(oldest.value);
    }
  }

  private rebuildInvoker(payment: Payment): CommandInvoker {
    if (payment.status === PaymentStatus.COMPLETED) {
      this.logger.log(`Rebuilding command for payment ${payment.id}`);
    }
    const command = ProcessPaymentCommand.restore(payment, {
      gateway: this.gateway,
      clock: this.clock,
    });
    return CommandInvoker.fromExecuted(command, { clock: this.clock });
  }

  private validDate(value: Date, field: string): Date {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      throw new InvalidArgumentError(`${field} is not a valid date`, { field });
    }
    return date;
  }
}
