/**
 * ISO 4217 currencies accepted by the engine, with their minor-unit exponent
 */
export const SUPPORTED_CURRENCIES: Readonly<Record<string, number>> = {
  AUD: 2,
  BRL: 2,
  CAD: 2,
  CHF: 2,
  CNY: 2,
  DKK: 2,
  EUR: 2,
  GBP: 2,
  GHS: 2,
  HKD: 2,
  INR: 2,
  JPY: 0,
  KES: 2,
  KRW: 0,
  MXN: 2,
  NGN: 2,
  NOK: 2,
  NZD: 2,
  SEK: 2,
  SGD: 2,
  USD: 2,
  ZAR: 2,
};

export function isSupportedCurrency(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_CURRENCIES, code);
}

/**
 * Number of decimal places in the currency's minor unit
 */
export function currencyExponent(code: string): number {
  const exponent = SUPPORTED_CURRENCIES[code];
  if (exponent === undefined) {
    throw new Error(`Unsupported currency: ${code}`);
  }
  return exponent;
}
