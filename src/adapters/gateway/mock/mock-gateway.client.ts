import {
  GatewayError,
  GatewayErrorCode,
  GatewayStatusClient,
  GatewayTransaction,
  Money,
  VaultedPaymentMethod,
} from '../../../core';

interface MockTransaction {
  status: string;
  amount: Money;
}

/**
 * Mock gateway client for testing
 * Deterministic in-memory answers; every lookup is recorded
 */
export class MockGatewayClient implements GatewayStatusClient {
  private transactions: Map<string, MockTransaction> = new Map();
  private failures: Map<string, GatewayErrorCode> = new Map();
  private paymentMethods: Map<string, VaultedPaymentMethod> = new Map();

  readonly lookups: string[] = [];

  constructor(readonly gatewayName: string = 'mock') {}

  async findTransaction(transactionId: string): Promise<GatewayTransaction> {
    this.lookups.push(transactionId);

    const failure = this.failures.get(transactionId);
    if (failure) {
      throw new GatewayError(
        `Simulated ${failure} for ${transactionId}`,
        failure,
        this.gatewayName,
      );
    }

    const transaction = this.transactions.get(transactionId);
    if (!transaction) {
      throw new GatewayError(
        `Transaction not found: ${transactionId}`,
        'TRANSACTION_NOT_FOUND',
        this.gatewayName,
      );
    }

    return { id: transactionId, ...transaction };
  }

  async vaultedPaymentMethod(
    token: string,
  ): Promise<VaultedPaymentMethod | null> {
    return this.paymentMethods.get(token) ?? null;
  }

  // ==================== Test Helpers ====================

  setTransaction(transactionId: string, status: string, amount: Money): void {
    this.transactions.set(transactionId, { status, amount });
    this.failures.delete(transactionId);
  }

  failTransaction(
    transactionId: string,
    code: GatewayErrorCode = 'GATEWAY_UNAVAILABLE',
  ): void {
    this.failures.set(transactionId, code);
  }

  setPaymentMethod(token: string, method: VaultedPaymentMethod): void {
    this.paymentMethods.set(token, method);
  }

  reset(): void {
    this.transactions.clear();
    this.failures.clear();
    this.paymentMethods.clear();
    this.lookups.length = 0;
  }
}
