import { Logger } from '@nestjs/common';
import {
  PaymentMethodRegistry,
  StorageAdapter,
  VaultedPaymentMethod,
} from '../interfaces';
import { Checkout } from '../domain/models';
import { CheckoutAction } from '../domain/enums';
import { mapCardType } from '../mapping';
import { availableActions } from '../state-machine';

/**
 * Card details tokenized in the browser and posted with the order
 */
export interface CheckoutParams {
  paypalEmail?: string | null;
  cardType?: string | null;
  lastTwo?: string | null;
}

/**
 * Checkout Service
 *
 * Creates checkouts and answers operator queries about them.
 * State changes only ever come from reconciliation.
 */
export class CheckoutService {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly paymentMethods: PaymentMethodRegistry,
  ) {}

  /**
   * Create from inline card-tokenization parameters
   */
  async createFromParams(params: CheckoutParams): Promise<Checkout> {
    return this.storageAdapter.createCheckout({
      paypalEmail: params.paypalEmail ?? null,
      lastDigits: params.lastTwo ?? null,
      cardType: mapCardType(params.cardType),
    });
  }

  /**
   * Create from a vaulted payment method token
   */
  async createFromToken(
    token: string,
    paymentMethodId: string,
  ): Promise<Checkout> {
    const gateway = this.paymentMethods.resolve(paymentMethodId);
    const vaulted: VaultedPaymentMethod | null =
      await gateway.vaultedPaymentMethod(token);

    if (!vaulted) {
      this.logger.warn(
        `No vaulted payment method for token on ${gateway.gatewayName}; creating checkout without card details`,
      );
    }

    return this.storageAdapter.createCheckout({
      paypalEmail: vaulted?.email ?? null,
      lastDigits: vaulted?.last4 ?? null,
      cardType: mapCardType(vaulted?.cardType),
    });
  }

  async getCheckout(id: string): Promise<Checkout | null> {
    return this.storageAdapter.findCheckout(id);
  }

  async linkTransaction(id: string, transactionId: string): Promise<Checkout> {
    return this.storageAdapter.linkCheckoutTransaction(id, transactionId);
  }

  /**
   * Operator actions currently eligible for the checkout
   */
  actionsFor(checkout: Checkout): CheckoutAction[] {
    return availableActions(checkout.state);
  }
}
