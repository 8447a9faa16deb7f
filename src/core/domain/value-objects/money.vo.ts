import { InvalidArgumentError } from '../../errors';
import { currencyExponent, isSupportedCurrency } from './currencies';

/**
 * Money value object - immutable representation of monetary values
 * Stores amounts in smallest currency unit (e.g., cents, kobo)
 */
export class Money {
  private readonly _amount: number;
  private readonly _currency: string;

  constructor(amount: number, currency: string) {
    const code = (currency || '').toUpperCase();
    if (!isSupportedCurrency(code)) {
      throw new InvalidArgumentError(`Unrecognized currency: ${currency}`, {
        currency,
      });
    }
    if (!Number.isInteger(amount)) {
      throw new InvalidArgumentError(
        'Amount must be an integer (smallest currency unit)',
        { amount },
      );
    }
    if (amount <= 0) {
      throw new InvalidArgumentError('Amount must be greater than zero', {
        amount,
      });
    }

    this._amount = amount;
    this._currency = code;
  }

  /**
   * Amount in minor units
   */
  get amount(): number {
    return this._amount;
  }

  get currency(): string {
    return this._currency;
  }

  equals(other: Money): boolean {
    return this._amount === other._amount && this._currency === other._currency;
  }

  /**
   * Convert to major currency units (e.g., dollars from cents)
   */
  toMajorUnits(): number {
    return this._amount / Math.pow(10, currencyExponent(this._currency));
  }

  /**
   * Create from major currency units (e.g., 99.99 USD -> 9999)
   * Rejects amounts finer than the currency's minor unit
   */
  static fromMajorUnits(amount: number, currency: string): Money {
    const code = (currency || '').toUpperCase();
    if (!isSupportedCurrency(code)) {
      throw new InvalidArgumentError(`Unrecognized currency: ${currency}`, {
        currency,
      });
    }
    if (typeof amount !== 'number' || !Number.isFinite(amount)) {
      throw new InvalidArgumentError('Amount must be a finite number', {
        amount,
      });
    }
    if (amount <= 0) {
      throw new InvalidArgumentError('Amount must be greater than zero', {
        amount,
      });
    }

    const scale = Math.pow(10, currencyExponent(code));
    const minorUnits = Math.round(amount * scale);
    if (Math.abs(minorUnits - amount * scale) > 1e-6) {
      throw new InvalidArgumentError(
        `Amount has more decimal places than ${code} allows`,
        { amount, currency: code },
      );
    }
    return new Money(minorUnits, code);
  }

  toString(): string {
    return `${this._currency} ${this.toMajorUnits()}`;
  }

  toJSON() {
    return {
      amount: this.toMajorUnits(),
      currency: this._currency,
    };
  }
}
