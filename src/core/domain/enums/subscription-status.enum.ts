/**
 * Subscription lifecycle states
 */
export enum SubscriptionStatus {
  /**
   * Eligible for recurring charges
   */
  ACTIVE = 'active',

  /**
   * Temporarily excluded from scheduling
   */
  PAUSED = 'paused',

  /**
   * Permanently stopped (terminal state)
   */
  CANCELLED = 'cancelled',
}

export function isTerminalSubscriptionStatus(
  status: SubscriptionStatus,
): boolean {
  return status === SubscriptionStatus.CANCELLED;
}

export function emptySubscriptionStatusCounts(): Record<SubscriptionStatus, number> {
  return {
    [SubscriptionStatus.ACTIVE]: 0,
    [SubscriptionStatus.PAUSED]: 0,
    [SubscriptionStatus.CANCELLED]: 0,
  };
}
