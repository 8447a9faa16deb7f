import { v4 as uuidv4 } from 'uuid';
import {
  ChargeRequest,
  Clock,
  GatewayChargeResult,
  GatewayError,
  GatewayRefundResult,
  GatewayTransaction,
  InvalidArgumentError,
  PaymentGatewayAdapter,
  RandomSource,
  SystemClock,
} from '../../../core';
import { MathRandomSource } from './random-sources';

export interface SimulatedGatewayConfig {
  /**
   * Probability in [0, 1] that a charge goes through
   */
  successRate: number;
  /**
   * Probability in [0, 1] that a refund goes through
   */
  refundSuccessRate: number;
  /**
   * Artificial delay per call, 0 disables it
   */
  latencyMs: number;
}

export const DEFAULT_SIMULATED_GATEWAY_CONFIG: SimulatedGatewayConfig = {
  successRate: 0.9,
  refundSuccessRate: 0.9,
  latencyMs: 0,
};

const DECLINE_REASON = 'insufficient funds or card declined';

/**
 * In-process payment gateway.
 * Outcomes are drawn from the injected RandomSource so tests can pin them.
 */
export class SimulatedGatewayAdapter implements PaymentGatewayAdapter {
  readonly gatewayName = 'simulated';
  readonly config: SimulatedGatewayConfig;

  private transactions: Map<string, GatewayTransaction> = new Map();
  private refundLog: string[] = [];
  private charges = 0;
  private refunds = 0;

  constructor(
    config: Partial<SimulatedGatewayConfig> = {},
    private readonly random: RandomSource = new MathRandomSource(),
    private readonly clock: Clock = new SystemClock(),
  ) {
    this.config = {
      successRate:
        config.successRate ?? DEFAULT_SIMULATED_GATEWAY_CONFIG.successRate,
      refundSuccessRate:
        config.refundSuccessRate ??
        DEFAULT_SIMULATED_GATEWAY_CONFIG.refundSuccessRate,
      latencyMs: config.latencyMs ?? DEFAULT_SIMULATED_GATEWAY_CONFIG.latencyMs,
    };
    this.assertRate('successRate', this.config.successRate);
    this.assertRate('refundSuccessRate', this.config.refundSuccessRate);
    if (!(this.config.latencyMs >= 0)) {
      throw new InvalidArgumentError('latencyMs must be zero or positive', {
        latencyMs: this.config.latencyMs,
      });
    }
  }

  async charge(request: ChargeRequest): Promise<GatewayChargeResult> {
    await this.simulateLatency();
    this.charges++;

    if (this.random.next() >= this.config.successRate) {
      return {
        success: false,
        error: GatewayError.declined(this.gatewayName, DECLINE_REASON),
      };
    }

    const transactionRef = this.generateReference('txn', this.transactions);
    const processedAt = this.clock.now();

    this.transactions.set(transactionRef, {
      transactionRef,
      amount: request.money.amount,
      currency: request.money.currency,
      customerRef: request.customerRef,
      status: 'charged',
      chargedAt: processedAt,
    });

    return { success: true, transactionRef, processedAt };
  }

  async refund(transactionRef: string): Promise<GatewayRefundResult> {
    await this.simulateLatency();
    this.refunds++;
    this.refundLog.push(transactionRef);

    const transaction = this.transactions.get(transactionRef);
    if (!transaction || transaction.status === 'refunded') {
      return {
        success: false,
        error: GatewayError.invalidReference(this.gatewayName, transactionRef),
      };
    }

    if (this.random.next() >= this.config.refundSuccessRate) {
      return {
        success: false,
        error: GatewayError.refundFailed(this.gatewayName, transactionRef),
      };
    }

    const refundRef = this.generateReference('rfnd');
    const processedAt = this.clock.now();

    this.transactions.set(transactionRef, {
      ...transaction,
      status: 'refunded',
      refundRef,
      refundedAt: processedAt,
    });

    return { success: true, refundRef, transactionRef, processedAt };
  }

  async verifyTransaction(
    transactionRef: string,
  ): Promise<GatewayTransaction | null> {
    await this.simulateLatency();
    const transaction = this.transactions.get(transactionRef);
    return transaction ? { ...transaction } : null;
  }

  // ==================== Simulator Introspection ====================

  get chargeCount(): number {
    return this.charges;
  }

  get refundCount(): number {
    return this.refunds;
  }

  /**
   * Transaction references passed to refund, in call order
   */
  get refundRequests(): readonly string[] {
    return [...this.refundLog];
  }

  /**
   * Forget every transaction and reset counters
   */
  reset(): void {
    this.transactions.clear();
    this.refundLog = [];
    this.charges = 0;
    this.refunds = 0;
  }

  // ==================== Private Helpers ====================

  private generateReference(
    prefix: 'txn' | 'rfnd',
    taken?: Map<string, unknown>,
  ): string {
    let reference: string;
    do {
      reference = `${prefix}_${uuidv4().replace(/-/g, '').substring(0, 16)}`;
    } while (taken?.has(reference));
    return reference;
  }

  private assertRate(name: string, value: number): void {
    if (!(value >= 0 && value <= 1)) {
      throw new InvalidArgumentError(`${name} must be between 0 and 1`, {
        [name]: value,
      });
    }
  }

  private async simulateLatency(): Promise<void> {
    if (this.config.latencyMs <= 0) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, this.config.latencyMs));
  }
}
