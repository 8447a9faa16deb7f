import { PaymentStatus, isTerminalPaymentStatus } from '../enums';
import { Money } from '../value-objects/money.vo';
import { paymentStateMachine } from '../../state-machine/state-machine';

/**
 * Plain representation used for storage and serialization
 */
export interface PaymentSnapshot {
  id: string;
  amountMinor: number;
  amount: number;
  currency: string;
  status: PaymentStatus;
  transactionRef: string | null;
  refundRef: string | null;
  customerRef: string;
  subscriptionId: string | null;
  createdAt: Date;
  updatedAt: Date;
  paidAt: Date | null;
}

/**
 * Payment domain model - one charge attempt and its outcome
 * Status only moves along the payment state machine
 */
export class Payment {
  constructor(
    public readonly id: string,
    public readonly money: Money,
    public readonly customerRef: string,
    public status: PaymentStatus = PaymentStatus.PENDING,
    public transactionRef: string | null = null,
    public readonly subscriptionId: string | null = null,
    public readonly createdAt: Date = new Date(),
    public updatedAt: Date = new Date(),
    public paidAt: Date | null = null,
    public refundRef: string | null = null,
  ) {}

  /**
   * Amount in major currency units (e.g. 99.99)
   */
  get amount(): number {
    return this.money.toMajorUnits();
  }

  get currency(): string {
    return this.money.currency;
  }

  isCompleted(): boolean {
    return this.status === PaymentStatus.COMPLETED;
  }

  isTerminal(): boolean {
    return isTerminalPaymentStatus(this.status);
  }

  /**
   * Record a successful charge
   */
  markCompleted(transactionRef: string, at: Date = new Date()): void {
    if (!transactionRef) {
      throw new Error('Transaction reference is required to complete a payment');
    }
    this.transitionTo(PaymentStatus.COMPLETED, at);
    this.transactionRef = transactionRef;
    this.paidAt = at;
  }

  markFailed(at: Date = new Date()): void {
    this.transitionTo(PaymentStatus.FAILED, at);
  }

  markRefunded(refundRef: string | null, at: Date = new Date()): void {
    this.transitionTo(PaymentStatus.REFUNDED, at);
    this.refundRef = refundRef;
  }

  private transitionTo(status: PaymentStatus, at: Date): void {
    paymentStateMachine.assertTransition(this.status, status);
    this.status = status;
    this.updatedAt = at;
  }

  toPlainObject(): PaymentSnapshot {
    return {
      id: this.id,
      amountMinor: this.money.amount,
      amount: this.amount,
      currency: this.currency,
      status: this.status,
      transactionRef: this.transactionRef,
      refundRef: this.refundRef,
      customerRef: this.customerRef,
      subscriptionId: this.subscriptionId,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      paidAt: this.paidAt,
    };
  }

  toJSON(): PaymentSnapshot {
    return this.toPlainObject();
  }

  /**
   * Create from plain object (for hydration from storage)
   */
  static fromPlainObject(data: PaymentSnapshot): Payment {
    return new Payment(
      data.id,
      new Money(data.amountMinor, data.currency),
      data.customerRef,
      data.status,
      data.transactionRef,
      data.subscriptionId,
      new Date(data.createdAt),
      new Date(data.updatedAt),
      data.paidAt ? new Date(data.paidAt) : null,
      data.refundRef,
    );
  }
}
