/**
 * Stable error codes surfaced by the engine.
 * Callers branch on these, never on messages.
 */
export enum ErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  GATEWAY_DECLINED = 'GATEWAY_DECLINED',
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  GATEWAY_REFUND_FAILED = 'GATEWAY_REFUND_FAILED',
  SUBSCRIPTION_NOT_ACTIVE = 'SUBSCRIPTION_NOT_ACTIVE',
  NOT_DUE = 'NOT_DUE',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  NO_COMMAND_TO_UNDO = 'NO_COMMAND_TO_UNDO',
  COMMAND_NOT_SUCCESSFUL = 'COMMAND_NOT_SUCCESSFUL',
  PAYMENT_NOT_FOUND = 'PAYMENT_NOT_FOUND',
  SUBSCRIPTION_NOT_FOUND = 'SUBSCRIPTION_NOT_FOUND',
  INTERNAL = 'INTERNAL',
}
