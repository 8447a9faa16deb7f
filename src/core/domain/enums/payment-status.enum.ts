/**
 * Payment lifecycle states
 * Transitions are enforced by the payment state machine
 */
export enum PaymentStatus {
  /**
   * Payment created, gateway charge not yet resolved
   */
  PENDING = 'pending',

  /**
   * Gateway accepted the charge
   */
  COMPLETED = 'completed',

  /**
   * Gateway declined the charge (terminal state)
   */
  FAILED = 'failed',

  /**
   * Charge refunded through undo (terminal state)
   */
  REFUNDED = 'refunded',
}

/**
 * Helper to determine if a payment status is terminal
 */
export function isTerminalPaymentStatus(status: PaymentStatus): boolean {
  return [PaymentStatus.FAILED, PaymentStatus.REFUNDED].includes(status);
}

/**
 * Zeroed counter per payment status
 */
export function emptyPaymentStatusCounts(): Record<PaymentStatus, number> {
  return {
    [PaymentStatus.PENDING]: 0,
    [PaymentStatus.COMPLETED]: 0,
    [PaymentStatus.FAILED]: 0,
    [PaymentStatus.REFUNDED]: 0,
  };
}
