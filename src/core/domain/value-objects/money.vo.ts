/**
 * Money value object - immutable representation of monetary values
 * Stores amounts in smallest currency unit (e.g., cents)
 */
export class Money {
  private readonly _amount: number;
  private readonly _currency: string;

  constructor(amount: number, currency: string) {
    if (!Number.isInteger(amount)) {
      throw new Error('Amount must be an integer (smallest currency unit)');
    }
    if (amount < 0) {
      throw new Error('Amount cannot be negative');
    }
    if (!currency || currency.length !== 3) {
      throw new Error('Currency must be a 3-letter ISO 4217 code');
    }

    this._amount = amount;
    this._currency = currency.toUpperCase();
  }

  get amount(): number {
    return this._amount;
  }

  get currency(): string {
    return this._currency;
  }

  /**
   * Check if two Money objects are equal
   */
  equals(other: Money): boolean {
    return this._amount === other._amount && this._currency === other._currency;
  }

  /**
   * Number of distinct values in a list of amounts.
   * Amounts in different currencies are always distinct.
   */
  static distinctCount(values: Money[]): number {
    return new Set(values.map((value) => value.toString())).size;
  }

  /**
   * Digits after the decimal point in the currency's minor unit
   * (JPY 0, USD 2, KWD 3). Codes Intl does not know get 2.
   */
  static minorUnitDigits(currency: string): number {
    if (!/^[A-Za-z]{3}$/.test(currency)) {
      return 2;
    }
    const options = new Intl.NumberFormat('en', {
      style: 'currency',
      currency: currency.toUpperCase(),
    }).resolvedOptions();
    return options.maximumFractionDigits ?? 2;
  }

  /**
   * Convert to major currency units (e.g., dollars from cents)
   */
  toMajorUnits(decimalPlaces = Money.minorUnitDigits(this._currency)): number {
    return this._amount / Math.pow(10, decimalPlaces);
  }

  /**
   * Create from major currency units (e.g., "10.50" dollars to 1050 cents)
   */
  static fromMajorUnits(
    amount: number | string,
    currency: string,
    decimalPlaces = Money.minorUnitDigits(currency),
  ): Money {
    const major =
      typeof amount === 'string' && amount.trim() !== ''
        ? Number(amount.trim())
        : amount;
    if (typeof major !== 'number' || !Number.isFinite(major)) {
      throw new Error(`Invalid amount: ${amount}`);
    }
    const minorUnits = Math.round(major * Math.pow(10, decimalPlaces));
    return new Money(minorUnits, currency);
  }

  toString(): string {
    return `${this._currency} ${this._amount}`;
  }

  toJSON() {
    return {
      amount: this._amount,
      currency: this._currency,
    };
  }
}
