import { Logger, LoggerService } from '@nestjs/common';
import { Payment, Subscription } from '../domain/models';
import {
  InternalError,
  NotDueError,
  PaymentEngineError,
  SubscriptionNotActiveError,
  toEngineError,
} from '../errors';
import {
  Clock,
  PaymentGatewayAdapter,
  StorageAdapter,
  SubscriptionLockContext,
} from '../interfaces';
import { SystemClock } from '../clock';
import {
  CommandInvoker,
  PaymentOperationResult,
  RecurringPaymentCommand,
  failure,
} from '../commands';
import { processInBatches } from '../utils';
import { InFlightRegistry } from './in-flight-registry';

export interface SubscriptionFailure {
  /**
   * null when the failure happened before any subscription was selected
   */
  subscriptionId: string | null;
  error: PaymentEngineError;
  payment: Payment | null;
}

export interface TickReport {
  now: Date;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  /**
   * Due subscriptions claimed by this tick, in processing order
   */
  selected: string[];
  /**
   * Due subscriptions left alone (in flight elsewhere, or no longer due once locked)
   */
  skipped: string[];
  /**
   * Every payment recorded by this tick, completed or failed
   */
  payments: Payment[];
  errors: SubscriptionFailure[];
  aborted: boolean;
}

export interface RecurringPaymentSchedulerOptions {
  clock?: Clock;
  logger?: LoggerService;
  inFlight?: InFlightRegistry;
  /**
   * Subscriptions charged at the same time
   * @default 1
   */
  concurrency?: number;
  /**
   * Maximum due subscriptions picked up per tick
   * @default 100
   */
  batchSize?: number;
  /**
   * Called for each recorded payment with the invoker that produced it
   */
  onPaymentExecuted?: (payment: Payment, invoker: CommandInvoker) => void;
}

export interface RunTickOptions {
  /**
   * Once aborted no further subscription starts; started ones finish
   */
  signal?: AbortSignal;
}

/**
 * A charge made under the lock. `unrecorded` holds the payment when the
 * gateway answered but the locked write of the payment failed.
 */
interface ChargeOutcome {
  result: PaymentOperationResult;
  unrecorded: Payment | null;
}

type ItemOutcome =
  | { kind: 'executed'; result: PaymentOperationResult }
  | { kind: 'skipped' };

/**
 * Charges every due subscription once per tick.
 *
 * Selection order is nextPaymentDate then id. Each subscription is claimed
 * in the in-flight registry before the first await, charged inside the
 * storage lock through its own invoker, and released when done. A failure
 * on one subscription never stops the others.
 */
export class RecurringPaymentScheduler {
  private readonly clock: Clock;
  private readonly logger: LoggerService;
  private readonly inFlight: InFlightRegistry;
  private readonly concurrency: number;
  private readonly batchSize: number;
  private readonly onPaymentExecuted?: (
    payment: Payment,
    invoker: CommandInvoker,
  ) => void;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly gateway: PaymentGatewayAdapter,
    options: RecurringPaymentSchedulerOptions = {},
  ) {
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? new Logger(RecurringPaymentScheduler.name);
    this.inFlight = options.inFlight ?? new InFlightRegistry();
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.onPaymentExecuted = options.onPaymentExecuted;
  }

  getInFlightRegistry(): InFlightRegistry {
    return this.inFlight;
  }

  async runTick(
    now: Date = this.clock.now(),
    options: RunTickOptions = {},
  ): Promise<TickReport> {
    const started = Date.now();
    const report: TickReport = {
      now,
      startedAt: this.clock.now(),
      finishedAt: this.clock.now(),
      durationMs: 0,
      selected: [],
      skipped: [],
      payments: [],
      errors: [],
      aborted: false,
    };

    let due: Subscription[];
    try {
      due = await this.storage.findDueSubscriptions(now, this.batchSize);
    } catch (error) {
      const engineError = toEngineError(error);
      this.logger.error(`Failed to load due subscriptions: ${engineError.message}`);
      report.errors.push({ subscriptionId: null, error: engineError, payment: null });
      return this.finish(report, started);
    }

    for (const subscription of due) {
      if (this.inFlight.tryClaim(subscription.id)) {
        report.selected.push(subscription.id);
      } else {
        report.skipped.push(subscription.id);
        this.logger.debug?.(
          `Subscription ${subscription.id} is already being processed, skipping`,
        );
      }
    }

    const begun = new Set<string>();
    try {
      const outcomes = await processInBatches(
        report.selected,
        async (id) => {
          begun.add(id);
          try {
            return await this.processDue(id, now);
          } finally {
            this.inFlight.release(id);
          }
        },
        {
          concurrencyLimit: this.concurrency,
          shouldContinue: () => !options.signal?.aborted,
        },
      );

      for (const outcome of outcomes) {
        if (!outcome.success) {
          const engineError = toEngineError(outcome.error);
          this.logger.error(
            `Subscription ${outcome.item} processing error: ${engineError.message}`,
          );
          report.errors.push({
            subscriptionId: outcome.item,
            error: engineError,
            payment: null,
          });
          continue;
        }

        const value = outcome.value;
        if (value.kind === 'skipped') {
          report.skipped.push(outcome.item);
          continue;
        }

        const { result } = value;
        if (result.payment) {
          report.payments.push(result.payment);
        }
        if (!result.success) {
          report.errors.push({
            subscriptionId: outcome.item,
            error: result.error,
            payment: result.payment,
          });
        }
      }
    } finally {
      for (const id of report.selected) {
        if (!begun.has(id)) {
          this.inFlight.release(id);
        }
      }
    }

    report.aborted = options.signal?.aborted ?? false;
    return this.finish(report, started);
  }

  /**
   * Charge one subscription now, outside the tick loop.
   * Fails with SUBSCRIPTION_NOT_ACTIVE or NOT_DUE instead of skipping.
   */
  async processSubscription(
    id: string,
    now: Date = this.clock.now(),
  ): Promise<PaymentOperationResult> {
    try {
      const charged = await this.storage.withSubscriptionLock(
        id,
        async (subscription, context): Promise<ChargeOutcome> => {
          if (!subscription.isActive()) {
            return {
              result: failure(
                new SubscriptionNotActiveError(subscription.id, subscription.status),
              ),
              unrecorded: null,
            };
          }
          if (!subscription.isDue(now)) {
            return {
              result: failure(
                new NotDueError(subscription.id, subscription.nextPaymentDate),
              ),
              unrecorded: null,
            };
          }
          return this.charge(subscription, context);
        },
      );
      return await this.recordAfterLock(charged);
    } catch (error) {
      return failure(toEngineError(error));
    }
  }

  private async processDue(id: string, now: Date): Promise<ItemOutcome> {
    const charged = await this.storage.withSubscriptionLock(
      id,
      async (subscription, context): Promise<ChargeOutcome | null> => {
        // paused, cancelled or advanced since it was listed
        if (!subscription.isDue(now)) {
          return null;
        }
        return this.charge(subscription, context);
      },
    );

    if (!charged) {
      return { kind: 'skipped' };
    }
    return { kind: 'executed', result: await this.recordAfterLock(charged) };
  }

  /**
   * Charges and records the payment in the same unit of work as the
   * advanced subscription. A failed payment write does not undo the
   * advance: the cycle was charged.
   */
  private async charge(
    subscription: Subscription,
    context: SubscriptionLockContext,
  ): Promise<ChargeOutcome> {
    const invoker = new CommandInvoker({ clock: this.clock });
    const command = new RecurringPaymentCommand(subscription, {
      gateway: this.gateway,
      clock: this.clock,
    });

    const result = await invoker.execute(command);
    if (!result.payment) {
      return { result, unrecorded: null };
    }

    this.onPaymentExecuted?.(result.payment, invoker);

    try {
      await context.savePayment(result.payment);
      return { result, unrecorded: null };
    } catch (error) {
      this.logger.warn(
        `Payment ${result.payment.id} for subscription ${subscription.id} not recorded with the subscription: ${toEngineError(error).message}`,
      );
      return { result, unrecorded: result.payment };
    }
  }

  /**
   * Second attempt at a payment write that failed under the lock
   */
  private async recordAfterLock(
    charged: ChargeOutcome,
  ): Promise<PaymentOperationResult> {
    const { result, unrecorded } = charged;
    if (!unrecorded) {
      return result;
    }

    try {
      await this.storage.savePayment(unrecorded);
      this.logger.log(`Payment ${unrecorded.id} recorded after the subscription lock`);
      return result;
    } catch (error) {
      this.logger.error(
        `Payment ${unrecorded.id} was charged but could not be recorded: ${toEngineError(error).message}`,
      );
      return failure(
        new InternalError(`Payment ${unrecorded.id} was charged but not recorded`, error),
        unrecorded,
      );
    }
  }

  private finish(report: TickReport, started: number): TickReport {
    report.finishedAt = this.clock.now();
    report.durationMs = Date.now() - started;

    const summary = `Tick at ${report.now.toISOString()}: ${report.selected.length} selected, ${report.payments.length} payments, ${report.errors.length} errors, ${report.skipped.length} skipped${report.aborted ? ' (aborted)' : ''}`;
    if (report.selected.length > 0 || report.errors.length > 0) {
      this.logger.log(summary);
    } else {
      this.logger.debug?.(summary);
    }

    return report;
  }
}
