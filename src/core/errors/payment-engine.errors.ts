import { ErrorCode } from './error-codes';

/**
 * Base error for every failure the engine reports as a value
 */
export class PaymentEngineError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'PaymentEngineError';
  }

  toJSON(): { code: ErrorCode; message: string; details: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Bad amount or currency - user-correctable
 */
export class InvalidArgumentError extends PaymentEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_ARGUMENT, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Failures reported by the payment gateway
 */
export class GatewayError extends PaymentEngineError {
  constructor(
    message: string,
    code:
      | ErrorCode.GATEWAY_DECLINED
      | ErrorCode.INVALID_REFERENCE
      | ErrorCode.GATEWAY_REFUND_FAILED,
    public readonly gatewayName: string,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details);
    this.name = 'GatewayError';
  }

  static declined(gatewayName: string, reason: string): GatewayError {
    return new GatewayError(
      `Charge declined: ${reason}`,
      ErrorCode.GATEWAY_DECLINED,
      gatewayName,
      { reason },
    );
  }

  static invalidReference(
    gatewayName: string,
    transactionRef: string,
  ): GatewayError {
    return new GatewayError(
      `Unknown or already refunded transaction: ${transactionRef}`,
      ErrorCode.INVALID_REFERENCE,
      gatewayName,
      { transactionRef },
    );
  }

  static refundFailed(gatewayName: string, transactionRef: string): GatewayError {
    return new GatewayError(
      `Refund failed for transaction: ${transactionRef}`,
      ErrorCode.GATEWAY_REFUND_FAILED,
      gatewayName,
      { transactionRef },
    );
  }
}

/**
 * Recurring charge attempted on a paused or cancelled subscription
 */
export class SubscriptionNotActiveError extends PaymentEngineError {
  constructor(subscriptionId: string, status: string) {
    super(
      `Subscription ${subscriptionId} is ${status}`,
      ErrorCode.SUBSCRIPTION_NOT_ACTIVE,
      { subscriptionId, status },
    );
    this.name = 'SubscriptionNotActiveError';
  }
}

export class NotDueError extends PaymentEngineError {
  constructor(subscriptionId: string, nextPaymentDate: Date) {
    super(
      `Subscription ${subscriptionId} is not due until ${nextPaymentDate.toISOString()}`,
      ErrorCode.NOT_DUE,
      { subscriptionId, nextPaymentDate: nextPaymentDate.toISOString() },
    );
    this.name = 'NotDueError';
  }
}

/**
 * Undo misuse - nothing executed, already undone, or last execution failed
 */
export class UndoError extends PaymentEngineError {
  constructor(
    message: string,
    code: ErrorCode.NO_COMMAND_TO_UNDO | ErrorCode.COMMAND_NOT_SUCCESSFUL,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details);
    this.name = 'UndoError';
  }

  static nothingToUndo(): UndoError {
    return new UndoError('No command to undo', ErrorCode.NO_COMMAND_TO_UNDO);
  }

  static notExecuted(description: string): UndoError {
    return new UndoError(
      `Command has not been executed: ${description}`,
      ErrorCode.NO_COMMAND_TO_UNDO,
      { command: description },
    );
  }

  static notSuccessful(description: string): UndoError {
    return new UndoError(
      `Last command did not succeed: ${description}`,
      ErrorCode.COMMAND_NOT_SUCCESSFUL,
      { command: description },
    );
  }
}

export class NotFoundError extends PaymentEngineError {
  constructor(
    entity: 'Payment' | 'Subscription',
    id: string,
  ) {
    super(
      `${entity} not found: ${id}`,
      entity === 'Payment'
        ? ErrorCode.PAYMENT_NOT_FOUND
        : ErrorCode.SUBSCRIPTION_NOT_FOUND,
      { id },
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Unexpected failure - fatal to one operation, never to the scheduler loop
 */
export class InternalError extends PaymentEngineError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message, ErrorCode.INTERNAL);
    this.name = 'InternalError';
  }
}

/**
 * Normalize anything thrown into an engine error
 */
export function toEngineError(error: unknown): PaymentEngineError {
  if (error instanceof PaymentEngineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, error);
}
