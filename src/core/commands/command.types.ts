import { LoggerService } from '@nestjs/common';
import { Payment } from '../domain/models';
import { PaymentEngineError } from '../errors';
import { Clock, PaymentGatewayAdapter } from '../interfaces';

/**
 * Outcome of executing or undoing a command.
 * A failure may still carry a payment (a declined charge is recorded).
 */
export type PaymentOperationResult =
  | {
      success: true;
      payment: Payment;
    }
  | {
      success: false;
      error: PaymentEngineError;
      payment: Payment | null;
    };

/**
 * Collaborators shared by every command
 */
export interface CommandDependencies {
  gateway: PaymentGatewayAdapter;
  clock?: Clock;
  logger?: LoggerService;
  generateId?: () => string;
}

export function failure(
  error: PaymentEngineError,
  payment: Payment | null = null,
): PaymentOperationResult {
  return { success: false, error, payment };
}
