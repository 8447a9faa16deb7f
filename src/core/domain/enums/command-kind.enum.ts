/**
 * Discriminator for the closed set of payment commands
 */
export enum CommandKind {
  PROCESS_PAYMENT = 'process_payment',
  RECURRING_PAYMENT = 'recurring_payment',
}
