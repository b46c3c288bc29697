import { CheckoutState, isFinalState } from '../enums';

/**
 * Persisted checkout state change, as returned by a successful
 * compare-and-set write
 */
export interface CheckoutStateChange {
  checkoutId: string;
  previousState: CheckoutState;
  state: CheckoutState;
}

/**
 * Checkout domain model - local mirror of a gateway transaction
 * Pure TypeScript class with no framework dependencies
 */
export class Checkout {
  constructor(
    public readonly id: string,
    public state: CheckoutState,
    public transactionId: string | null = null,
    public readonly paypalEmail: string | null = null,
    public readonly cardType: string = '',
    public readonly lastDigits: string | null = null,
    public readonly createdAt: Date = new Date(),
    public updatedAt: Date = new Date(),
  ) {}

  /**
   * Terminal checkouts are excluded from every scan
   */
  isFinal(): boolean {
    return isFinalState(this.state);
  }

  isSettled(): boolean {
    return this.state === CheckoutState.SETTLED;
  }

  isPaypal(): boolean {
    return this.paypalEmail !== null && this.paypalEmail !== '';
  }

  /**
   * Link the gateway transaction once it exists
   */
  linkTransaction(transactionId: string): void {
    if (this.transactionId) {
      throw new Error('Gateway transaction already linked');
    }
    this.transactionId = transactionId;
    this.updatedAt = new Date();
  }

  toPlainObject() {
    return {
      id: this.id,
      state: this.state,
      transactionId: this.transactionId,
      paypalEmail: this.paypalEmail,
      cardType: this.cardType,
      lastDigits: this.lastDigits,
      final: this.isFinal(),
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }
}
