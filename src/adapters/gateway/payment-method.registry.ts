import {
  GatewayError,
  GatewayStatusClient,
  PaymentMethodRegistry,
} from '../../core';

/**
 * Payment method ids bound to the gateway client that serves them
 */
export class StaticPaymentMethodRegistry implements PaymentMethodRegistry {
  private readonly clients: Map<string, GatewayStatusClient>;

  constructor(
    bindings: Record<string, GatewayStatusClient> = {},
  ) {
    this.clients = new Map(Object.entries(bindings));
  }

  register(paymentMethodId: string, client: GatewayStatusClient): this {
    this.clients.set(paymentMethodId, client);
    return this;
  }

  resolve(paymentMethodId: string): GatewayStatusClient {
    const client = this.clients.get(paymentMethodId);
    if (!client) {
      throw new GatewayError(
        `Unknown payment method: ${paymentMethodId}`,
        'UNKNOWN_PAYMENT_METHOD',
        'registry',
        { paymentMethodId },
      );
    }
    return client;
  }
}
