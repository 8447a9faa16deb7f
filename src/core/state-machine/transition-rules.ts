import { PaymentStatus, SubscriptionStatus } from '../domain/enums';
import { StateMachineConfig } from './types';

/**
 * Payment transition rules
 *
 * - A charge resolves exactly once (completed or failed)
 * - Failed is terminal (no retry path on the same record)
 * - Refund is one-way and terminal
 */
export const PAYMENT_STATE_MACHINE_CONFIG: StateMachineConfig<PaymentStatus> = {
  name: 'payment',
  states: Object.values(PaymentStatus),
  initialState: PaymentStatus.PENDING,
  terminalStates: [PaymentStatus.FAILED, PaymentStatus.REFUNDED],
  transitions: [
    {
      from: PaymentStatus.PENDING,
      to: PaymentStatus.COMPLETED,
      metadata: {
        description: 'Gateway accepted the charge',
        requiresTransactionRef: true,
      },
    },
    {
      from: PaymentStatus.PENDING,
      to: PaymentStatus.FAILED,
      metadata: { description: 'Gateway declined the charge' },
    },
    {
      from: PaymentStatus.COMPLETED,
      to: PaymentStatus.REFUNDED,
      metadata: { description: 'Charge refunded by undo' },
    },
  ],
};

/**
 * Subscription transition rules
 *
 * Pausing and cancelling are explicit external actions; a declined
 * charge never moves a subscription.
 */
export const SUBSCRIPTION_STATE_MACHINE_CONFIG: StateMachineConfig<SubscriptionStatus> =
  {
    name: 'subscription',
    states: Object.values(SubscriptionStatus),
    initialState: SubscriptionStatus.ACTIVE,
    terminalStates: [SubscriptionStatus.CANCELLED],
    transitions: [
      {
        from: SubscriptionStatus.ACTIVE,
        to: SubscriptionStatus.PAUSED,
        metadata: { description: 'Subscription paused' },
      },
      {
        from: SubscriptionStatus.PAUSED,
        to: SubscriptionStatus.ACTIVE,
        metadata: { description: 'Subscription resumed' },
      },
      {
        from: SubscriptionStatus.ACTIVE,
        to: SubscriptionStatus.CANCELLED,
        metadata: { description: 'Subscription cancelled' },
      },
      {
        from: SubscriptionStatus.PAUSED,
        to: SubscriptionStatus.CANCELLED,
        metadata: { description: 'Paused subscription cancelled' },
      },
    ],
  };
