import { Logger, LoggerService } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CommandKind, PaymentStatus } from '../domain/enums';
import { Payment } from '../domain/models';
import { Money } from '../domain/value-objects/money.vo';
import {
  InternalError,
  InvalidArgumentError,
  UndoError,
  toEngineError,
} from '../errors';
import { Clock, PaymentGatewayAdapter } from '../interfaces';
import { SystemClock } from '../clock';
import {
  CommandDependencies,
  PaymentOperationResult,
  failure,
} from './command.types';

export interface ProcessPaymentParams {
  /**
   * Decimal amount in major units
   */
  amount: number;
  currency: string;
  customerRef: string;
  subscriptionId?: string | null;
}

/**
 * Charges a customer once through the gateway.
 *
 * Creates the payment record, resolves it to completed or failed, and
 * refunds it on undo. Each instance executes at most once.
 */
export class ProcessPaymentCommand {
  readonly kind = CommandKind.PROCESS_PAYMENT;

  private readonly gateway: PaymentGatewayAdapter;
  private readonly clock: Clock;
  private readonly logger: LoggerService;
  private readonly generateId: () => string;
  private payment: Payment | null = null;

  constructor(
    readonly params: ProcessPaymentParams,
    dependencies: CommandDependencies,
  ) {
    this.gateway = dependencies.gateway;
    this.clock = dependencies.clock ?? new SystemClock();
    this.logger =
      dependencies.logger ?? new Logger(ProcessPaymentCommand.name);
    this.generateId = dependencies.generateId ?? uuidv4;
  }

  /**
   * Rebuild a command around a payment it produced earlier
   * (e.g. after a restart), so the payment can be undone
   */
  static restore(
    payment: Payment,
    dependencies: CommandDependencies,
  ): ProcessPaymentCommand {
    const command = new ProcessPaymentCommand(
      {
        amount: payment.amount,
        currency: payment.currency,
        customerRef: payment.customerRef,
        subscriptionId: payment.subscriptionId,
      },
      dependencies,
    );
    command.payment = payment;
    return command;
  }

  getPayment(): Payment | null {
    return this.payment;
  }

  async execute(): Promise<PaymentOperationResult> {
    if (this.payment) {
      return failure(
        new InternalError(`Command already executed: ${this.describe()}`),
        this.payment,
      );
    }

    let money: Money;
    try {
      money = Money.fromMajorUnits(this.params.amount, this.params.currency);
    } catch (error) {
      return failure(toEngineError(error));
    }

    const customerRef = (this.params.customerRef ?? '').trim();
    if (!customerRef) {
      return failure(new InvalidArgumentError('Customer reference is required'));
    }

    const createdAt = this.clock.now();
    const payment = new Payment(
      this.generateId(),
      money,
      customerRef,
      PaymentStatus.PENDING,
      null,
      this.params.subscriptionId ?? null,
      createdAt,
      createdAt,
    );
    this.payment = payment;

    try {
      const charge = await this.gateway.charge({
        money,
        customerRef,
        paymentId: payment.id,
      });

      if (charge.success) {
        payment.markCompleted(charge.transactionRef, this.clock.now());
        this.logger.log(
          `Payment ${payment.id} completed (${money.toString()}), transaction ${charge.transactionRef}`,
        );
        return { success: true, payment };
      }

      payment.markFailed(this.clock.now());
      this.logger.warn(`Payment ${payment.id} failed: ${charge.error.message}`);
      return failure(charge.error, payment);
    } catch (error) {
      if (payment.status === PaymentStatus.PENDING) {
        payment.markFailed(this.clock.now());
      }
      const engineError = toEngineError(error);
      this.logger.error(
        `Payment ${payment.id} processing error: ${engineError.message}`,
      );
      return failure(engineError, payment);
    }
  }

  /**
   * Refund the payment produced by execute
   */
  async undo(): Promise<PaymentOperationResult> {
    const payment = this.payment;
    if (!payment) {
      return failure(UndoError.notExecuted(this.describe()));
    }

    if (payment.status !== PaymentStatus.COMPLETED || !payment.transactionRef) {
      return failure(
        UndoError.notSuccessful(
          `payment ${payment.id} is ${payment.status}, only completed payments can be refunded`,
        ),
        payment,
      );
    }

    this.logger.log(`Refunding payment ${payment.id}`);

    try {
      const refund = await this.gateway.refund(payment.transactionRef);

      if (!refund.success) {
        this.logger.warn(
          `Refund for payment ${payment.id} failed: ${refund.error.message}`,
        );
        return failure(refund.error, payment);
      }

      payment.markRefunded(refund.refundRef, this.clock.now());
      this.logger.log(
        `Payment ${payment.id} refunded, refund ${refund.refundRef}`,
      );
      return { success: true, payment };
    } catch (error) {
      const engineError = toEngineError(error);
      this.logger.error(
        `Refund processing error for payment ${payment.id}: ${engineError.message}`,
      );
      return failure(engineError, payment);
    }
  }

  isUndoable(): boolean {
    return this.payment !== null && this.payment.isCompleted();
  }

  describe(): string {
    return `ProcessPaymentCommand(amount=${this.params.amount}, currency=${this.params.currency}, customer=${this.params.customerRef})`;
  }
}
