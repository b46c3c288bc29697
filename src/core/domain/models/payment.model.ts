import { PaymentAction, PaymentState } from '../enums';
import { Money } from '../value-objects/money.vo';
import { targetStateFor } from '../../state-machine/payment-transitions';

/**
 * Payment domain model
 * Owned by the order subsystem; funded by at most one checkout (sourceId)
 */
export class Payment {
  constructor(
    public readonly id: string,
    public readonly orderId: string,
    public readonly sourceId: string | null,
    public state: PaymentState,
    public readonly amount: Money,
    public readonly createdAt: Date = new Date(),
    public updatedAt: Date = new Date(),
  ) {}

  isFailed(): boolean {
    return this.state === PaymentState.FAILED;
  }

  /**
   * Apply a lifecycle action. Returns false and leaves the payment
   * untouched when the action is not allowed from the current state.
   */
  apply(action: PaymentAction): boolean {
    const target = targetStateFor(this.state, action);
    if (target === null) {
      return false;
    }
    this.transitionTo(target);
    return true;
  }

  /**
   * Set the state directly, bypassing the action table
   * (used by order recovery)
   */
  transitionTo(state: PaymentState): void {
    this.state = state;
    this.updatedAt = new Date();
  }

  toPlainObject() {
    return {
      id: this.id,
      orderId: this.orderId,
      sourceId: this.sourceId,
      state: this.state,
      amount: this.amount.amount,
      currency: this.amount.currency,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }
}
