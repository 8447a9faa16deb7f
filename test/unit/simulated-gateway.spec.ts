import {
  ErrorCode,
  FixedClock,
  FixedRandomSource,
  InvalidArgumentError,
  Money,
  SeededRandomSource,
  SimulatedGatewayAdapter,
} from '../../src';

describe('SimulatedGatewayAdapter', () => {
  const clock = new FixedClock('2025-06-01T10:00:00.000Z');
  const charge = (gateway: SimulatedGatewayAdapter, amount = 99.99) =>
    gateway.charge({
      money: Money.fromMajorUnits(amount, 'USD'),
      customerRef: 'cust_1',
    });

  describe('charge', () => {
    it('approves when the draw is below the success rate', async () => {
      const gateway = new SimulatedGatewayAdapter(
        {},
        FixedRandomSource.alwaysSucceed(),
        clock,
      );

      const result = await charge(gateway);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.transactionRef).toMatch(/^txn_[0-9a-f]{16}$/);
      expect(result.processedAt).toEqual(new Date('2025-06-01T10:00:00.000Z'));

      const transaction = await gateway.verifyTransaction(result.transactionRef);
      expect(transaction).toEqual({
        transactionRef: result.transactionRef,
        amount: 9999,
        currency: 'USD',
        customerRef: 'cust_1',
        status: 'charged',
        chargedAt: new Date('2025-06-01T10:00:00.000Z'),
      });
    });

    it('declines when the draw reaches the success rate', async () => {
      const gateway = new SimulatedGatewayAdapter(
        { successRate: 0.5 },
        new FixedRandomSource(0.5),
        clock,
      );

      const result = await charge(gateway);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.GATEWAY_DECLINED);
      expect(result.error.message).toBe(
        'Charge declined: insufficient funds or card declined',
      );
      expect(gateway.chargeCount).toBe(1);
    });

    it('always approves at a success rate of 1', async () => {
      const gateway = new SimulatedGatewayAdapter(
        { successRate: 1 },
        FixedRandomSource.alwaysFail(),
        clock,
      );

      expect((await charge(gateway)).success).toBe(true);
    });

    it('always declines at a success rate of 0', async () => {
      const gateway = new SimulatedGatewayAdapter(
        { successRate: 0 },
        FixedRandomSource.alwaysSucceed(),
        clock,
      );

      expect((await charge(gateway)).success).toBe(false);
    });
  });

  describe('refund', () => {
    it('refunds a charged transaction once', async () => {
      const gateway = new SimulatedGatewayAdapter(
        {},
        FixedRandomSource.alwaysSucceed(),
        clock,
      );
      const charged = await charge(gateway);
      if (!charged.success) throw new Error('charge should succeed');

      const first = await gateway.refund(charged.transactionRef);
      const second = await gateway.refund(charged.transactionRef);

      expect(first.success).toBe(true);
      if (first.success) {
        expect(first.refundRef).toMatch(/^rfnd_[0-9a-f]{16}$/);
        expect(first.transactionRef).toBe(charged.transactionRef);
      }
      expect(second.success).toBe(false);
      if (!second.success) {
        expect(second.error.code).toBe(ErrorCode.INVALID_REFERENCE);
      }
      expect(gateway.refundCount).toBe(2);
      expect(gateway.refundRequests).toEqual([
        charged.transactionRef,
        charged.transactionRef,
      ]);

      const transaction = await gateway.verifyTransaction(charged.transactionRef);
      expect(transaction?.status).toBe('refunded');
    });

    it('rejects unknown references', async () => {
      const gateway = new SimulatedGatewayAdapter(
        {},
        FixedRandomSource.alwaysSucceed(),
        clock,
      );

      const result = await gateway.refund('txn_missing');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.INVALID_REFERENCE);
        expect(result.error.message).toBe(
          'Unknown or already refunded transaction: txn_missing',
        );
      }
    });

    it('can fail and leave the transaction charged', async () => {
      // charge draws 0, refund draws 0.95 against a 0.9 refund rate
      const gateway = new SimulatedGatewayAdapter(
        {},
        new FixedRandomSource([0, 0.95]),
        clock,
      );
      const charged = await charge(gateway);
      if (!charged.success) throw new Error('charge should succeed');

      const result = await gateway.refund(charged.transactionRef);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.GATEWAY_REFUND_FAILED);
      }
      const transaction = await gateway.verifyTransaction(charged.transactionRef);
      expect(transaction?.status).toBe('charged');
    });
  });

  it('validates its configuration', () => {
    expect(() => new SimulatedGatewayAdapter({ successRate: 1.5 })).toThrow(
      'successRate must be between 0 and 1',
    );
    expect(() => new SimulatedGatewayAdapter({ refundSuccessRate: -0.1 })).toThrow(
      InvalidArgumentError,
    );
    expect(() => new SimulatedGatewayAdapter({ latencyMs: -1 })).toThrow(
      'latencyMs must be zero or positive',
    );
  });

  it('keeps defaults for options left undefined', () => {
    const gateway = new SimulatedGatewayAdapter({ successRate: undefined });

    expect(gateway.config).toEqual({
      successRate: 0.9,
      refundSuccessRate: 0.9,
      latencyMs: 0,
    });
  });

  it('forgets everything on reset', async () => {
    const gateway = new SimulatedGatewayAdapter(
      {},
      FixedRandomSource.alwaysSucceed(),
      clock,
    );
    const charged = await charge(gateway);
    if (!charged.success) throw new Error('charge should succeed');

    gateway.reset();

    expect(gateway.chargeCount).toBe(0);
    expect(await gateway.verifyTransaction(charged.transactionRef)).toBeNull();
  });
});

describe('random sources', () => {
  it('repeats a seeded sequence', () => {
    const a = new SeededRandomSource(42);
    const b = new SeededRandomSource(42);
    const first = [a.next(), a.next(), a.next()];

    expect([b.next(), b.next(), b.next()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(new SeededRandomSource(1).next()).not.toBe(
      new SeededRandomSource(2).next(),
    );
  });

  it('cycles through fixed values', () => {
    const source = new FixedRandomSource([0.1, 0.2]);

    expect([source.next(), source.next(), source.next()]).toEqual([0.1, 0.2, 0.1]);
  });

  it('rejects values outside [0, 1)', () => {
    expect(() => new FixedRandomSource(1)).toThrow('Random values must be in [0, 1)');
    expect(() => new FixedRandomSource([])).toThrow('At least one value is required');
  });
});
