import { ProcessPaymentCommand } from './process-payment.command';
import { RecurringPaymentCommand } from './recurring-payment.command';

/**
 * Every command the invoker can run
 */
export type PaymentCommand = ProcessPaymentCommand | RecurringPaymentCommand;

export function describeCommand(command: PaymentCommand): string {
  return `[${command.kind}] ${command.describe()}`;
}
