import { Logger, LoggerService } from '@nestjs/common';
import { CommandKind } from '../domain/enums';
import { Payment, Subscription } from '../domain/models';
import { ErrorCode, SubscriptionNotActiveError, UndoError } from '../errors';
import { Clock } from '../interfaces';
import { SystemClock } from '../clock';
import { ProcessPaymentCommand } from './process-payment.command';
import {
  CommandDependencies,
  PaymentOperationResult,
  failure,
} from './command.types';

/**
 * Charges one billing cycle of a subscription.
 *
 * Every execution builds a fresh ProcessPaymentCommand, so each cycle
 * produces its own payment. The due date moves one interval forward
 * whenever the gateway answered (charged or declined); it stays put when
 * the attempt never reached a gateway decision so the next tick retries.
 * Undo refunds the latest cycle's payment and leaves the schedule alone.
 */
export class RecurringPaymentCommand {
  readonly kind = CommandKind.RECURRING_PAYMENT;

  private readonly clock: Clock;
  private readonly logger: LoggerService;
  private current: ProcessPaymentCommand | null = null;

  constructor(
    readonly subscription: Subscription,
    private readonly dependencies: CommandDependencies,
  ) {
    this.clock = dependencies.clock ?? new SystemClock();
    this.logger =
      dependencies.logger ?? new Logger(RecurringPaymentCommand.name);
  }

  getPayment(): Payment | null {
    return this.current?.getPayment() ?? null;
  }

  async execute(): Promise<PaymentOperationResult> {
    const subscription = this.subscription;

    if (!subscription.isActive()) {
      return failure(
        new SubscriptionNotActiveError(subscription.id, subscription.status),
      );
    }

    const charge = new ProcessPaymentCommand(
      {
        amount: subscription.amount,
        currency: subscription.currency,
        customerRef: subscription.customerRef,
        subscriptionId: subscription.id,
      },
      this.dependencies,
    );
    this.current = charge;

    const result = await charge.execute();

    if (result.success || result.error.code === ErrorCode.GATEWAY_DECLINED) {
      const previous = subscription.nextPaymentDate;
      const next = subscription.advanceNextPaymentDate(this.clock.now());
      this.logger.log(
        `Subscription ${subscription.id} advanced from ${previous.toISOString()} to ${next.toISOString()}`,
      );
    } else {
      this.logger.warn(
        `Subscription ${subscription.id} left due at ${subscription.nextPaymentDate.toISOString()}: ${result.error.message}`,
      );
    }

    return result;
  }

  async undo(): Promise<PaymentOperationResult> {
    if (!this.current) {
      return failure(UndoError.notExecuted(this.describe()));
    }
    return this.current.undo();
  }

  isUndoable(): boolean {
    return this.current !== null && this.current.isUndoable();
  }

  describe(): string {
    return `RecurringPaymentCommand(subscription=${this.subscription.id}, amount=${this.subscription.amount}, currency=${this.subscription.currency}, interval=${this.subscription.interval})`;
  }
}
