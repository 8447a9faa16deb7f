import {
  ErrorCode,
  InvalidStateTransitionError,
  Money,
  Payment,
  PaymentStatus,
  SubscriptionStatus,
  paymentStateMachine,
  subscriptionStateMachine,
} from '../../src';
import { buildSubscription, thrownBy } from '../support/fixtures';

describe('Payment state machine', () => {
  it('allows the charge and refund path', () => {
    expect(
      paymentStateMachine.canTransition(PaymentStatus.PENDING, PaymentStatus.COMPLETED),
    ).toBe(true);
    expect(
      paymentStateMachine.canTransition(PaymentStatus.PENDING, PaymentStatus.FAILED),
    ).toBe(true);
    expect(
      paymentStateMachine.canTransition(PaymentStatus.COMPLETED, PaymentStatus.REFUNDED),
    ).toBe(true);
  });

  it('rejects transitions out of terminal states', () => {
    const result = paymentStateMachine.validateTransition(
      PaymentStatus.FAILED,
      PaymentStatus.COMPLETED,
    );

    expect(result).toEqual({
      success: false,
      fromStatus: PaymentStatus.FAILED,
      toStatus: PaymentStatus.COMPLETED,
      reason: 'Cannot transition from terminal state: failed',
    });
  });

  it('rejects undefined edges', () => {
    expect(
      paymentStateMachine.validateTransition(
        PaymentStatus.PENDING,
        PaymentStatus.REFUNDED,
      ).reason,
    ).toBe('Transition from pending to refunded is not defined');
  });

  it('lists next states', () => {
    expect(paymentStateMachine.getNextStates(PaymentStatus.PENDING)).toEqual([
      PaymentStatus.COMPLETED,
      PaymentStatus.FAILED,
    ]);
    expect(paymentStateMachine.getNextStates(PaymentStatus.REFUNDED)).toEqual([]);
  });

  it('guards the payment model', () => {
    const payment = new Payment('pay-1', new Money(1000, 'USD'), 'cust_1');

    payment.markCompleted('txn_1', new Date('2025-01-01T00:00:00.000Z'));
    payment.markRefunded('rfnd_1', new Date('2025-01-02T00:00:00.000Z'));

    const error = thrownBy(() => payment.markCompleted('txn_2'));
    expect(error).toBeInstanceOf(InvalidStateTransitionError);
    expect(error).toMatchObject({
      code: ErrorCode.INVALID_STATE_TRANSITION,
      fromStatus: PaymentStatus.REFUNDED,
      toStatus: PaymentStatus.COMPLETED,
    });
    expect(payment.status).toBe(PaymentStatus.REFUNDED);
    expect(payment.refundRef).toBe('rfnd_1');
  });

  it('requires a transaction reference to complete', () => {
    const payment = new Payment('pay-1', new Money(1000, 'USD'), 'cust_1');

    expect(() => payment.markCompleted('')).toThrow(
      'Transaction reference is required to complete a payment',
    );
    expect(payment.status).toBe(PaymentStatus.PENDING);
  });
});

describe('Subscription state machine', () => {
  it('pauses, resumes and cancels', () => {
    const subscription = buildSubscription();

    subscription.pause();
    expect(subscription.status).toBe(SubscriptionStatus.PAUSED);

    subscription.resume();
    expect(subscription.status).toBe(SubscriptionStatus.ACTIVE);

    subscription.cancel();
    expect(subscription.status).toBe(SubscriptionStatus.CANCELLED);
  });

  it('cannot resume a cancelled subscription', () => {
    const subscription = buildSubscription({ status: SubscriptionStatus.CANCELLED });

    expect(() => subscription.resume()).toThrow(
      'Invalid subscription transition: Cannot transition from terminal state: cancelled',
    );
  });

  it('cannot pause a paused subscription', () => {
    expect(
      subscriptionStateMachine.canTransition(
        SubscriptionStatus.PAUSED,
        SubscriptionStatus.PAUSED,
      ),
    ).toBe(false);
  });

  it('renders a mermaid diagram', () => {
    const diagram = subscriptionStateMachine.toMermaidDiagram();

    expect(diagram.split('\n')[0]).toBe('stateDiagram-v2');
    expect(diagram).toContain('    cancelled : cancelled [Terminal]');
    expect(diagram).toContain('    paused --> active');
  });
});
