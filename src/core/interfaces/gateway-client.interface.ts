import { GatewayTransaction, VaultedPaymentMethod } from './common.types';

/**
 * Read-only client for the payment gateway.
 * Implementations must never change anything on the gateway side.
 */
export interface GatewayStatusClient {
  /**
   * Unique identifier for this gateway (e.g., 'braintree')
   */
  readonly gatewayName: string;

  /**
   * Current status and amount of a gateway transaction
   * @throws GatewayError when the gateway cannot answer
   */
  findTransaction(transactionId: string): Promise<GatewayTransaction>;

  /**
   * Details of a vaulted payment method, or null when the token is unknown
   */
  vaultedPaymentMethod(token: string): Promise<VaultedPaymentMethod | null>;
}

/**
 * Resolves a payment method id to the gateway client serving it
 */
export interface PaymentMethodRegistry {
  resolve(paymentMethodId: string): GatewayStatusClient;
}

export type GatewayErrorCode =
  | 'GATEWAY_UNAVAILABLE'
  | 'TRANSACTION_NOT_FOUND'
  | 'GATEWAY_REJECTED_REQUEST'
  | 'UNKNOWN_PAYMENT_METHOD';

/**
 * Standardized gateway error
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: GatewayErrorCode,
    public readonly gatewayName: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  /**
   * Transient failures are retried by the next scan
   */
  get isTransient(): boolean {
    return this.code === 'GATEWAY_UNAVAILABLE';
  }
}
