import { Money } from '../domain/value-objects/money.vo';
import { GatewayError } from '../errors';

/**
 * Charge request sent to a gateway
 */
export interface ChargeRequest {
  money: Money;
  customerRef: string;
  /**
   * Engine-side payment id, echoed back in gateway records
   */
  paymentId?: string;
}

export type GatewayChargeResult =
  | {
      success: true;
      transactionRef: string;
      processedAt: Date;
    }
  | {
      success: false;
      error: GatewayError;
    };

export type GatewayRefundResult =
  | {
      success: true;
      refundRef: string;
      transactionRef: string;
      processedAt: Date;
    }
  | {
      success: false;
      error: GatewayError;
    };

/**
 * Gateway-side view of a charge
 */
export interface GatewayTransaction {
  transactionRef: string;
  amount: number;
  currency: string;
  customerRef: string;
  status: 'charged' | 'refunded';
  chargedAt: Date;
  refundedAt?: Date;
  refundRef?: string;
}

/**
 * Payment gateway contract
 *
 * Declines and refund failures are returned as values; a throw from an
 * implementation means something unexpected happened.
 */
export interface PaymentGatewayAdapter {
  readonly gatewayName: string;

  charge(request: ChargeRequest): Promise<GatewayChargeResult>;

  /**
   * Refund a previous charge in full. Unknown or already refunded
   * references fail with INVALID_REFERENCE.
   */
  refund(transactionRef: string): Promise<GatewayRefundResult>;

  verifyTransaction(transactionRef: string): Promise<GatewayTransaction | null>;
}
