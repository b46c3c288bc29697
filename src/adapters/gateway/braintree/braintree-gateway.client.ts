import { Logger } from '@nestjs/common';
import {
  GatewayError,
  GatewayStatusClient,
  GatewayTransaction,
  Money,
  VaultedPaymentMethod,
} from '../../../core';

export interface BraintreeCredentials {
  publicKey: string;
  privateKey: string;
}

export interface BraintreeClientOptions {
  apiBaseUrl?: string;
  apiVersion?: string;
  timeout?: number;
}

const TRANSACTION_QUERY = `
  query FindTransaction($id: ID!) {
    node(id: $id) {
      ... on Transaction {
        id
        status
        amount { value currencyCode }
      }
    }
  }
`;

const PAYMENT_METHOD_QUERY = `
  query FindPaymentMethod($id: ID!) {
    node(id: $id) {
      ... on PaymentMethod {
        details {
          __typename
          ... on CreditCardDetails { brandCode last4 }
          ... on PayPalAccountDetails { payer { email } }
        }
      }
    }
  }
`;

/**
 * Legacy card labels for GraphQL brand codes that do not title-case cleanly
 */
const BRAND_LABELS: Record<string, string> = {
  AMERICAN_EXPRESS: 'AmericanExpress',
  MASTERCARD: 'MasterCard',
  DINERS: 'Diners Club',
  JCB: 'JCB',
  UK_MAESTRO: 'UK Maestro',
  UNION_PAY: 'UnionPay',
};

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

function stringField(value: unknown, key: string): string | null {
  const raw = field(value, key);
  return typeof raw === 'string' ? raw : null;
}

/**
 * Braintree read-only client over the GraphQL API
 *
 * Authentication: HTTP Basic with the API key pair.
 * Statuses come back as GraphQL enum names and are lower-cased so they
 * line up with checkout states.
 *
 * @see https://graphql.braintreepayments.com/
 */
export class BraintreeGatewayClient implements GatewayStatusClient {
  readonly gatewayName = 'braintree';

  private readonly logger = new Logger(BraintreeGatewayClient.name);
  private readonly apiBaseUrl: string;
  private readonly apiVersion: string;
  private readonly timeout: number;
  private readonly authorization: string;

  constructor(
    credentials: BraintreeCredentials,
    options: BraintreeClientOptions = {},
  ) {
    this.apiBaseUrl =
      options.apiBaseUrl || 'https://payments.braintree-api.com/graphql';
    this.apiVersion = options.apiVersion || '2019-01-01';
    this.timeout = options.timeout || 30000;
    this.authorization = `Basic ${Buffer.from(
      `${credentials.publicKey}:${credentials.privateKey}`,
    ).toString('base64')}`;
  }

  async findTransaction(transactionId: string): Promise<GatewayTransaction> {
    const data = await this.query(TRANSACTION_QUERY, { id: transactionId });
    const node = field(data, 'node');

    const status = stringField(node, 'status');
    if (!isObject(node) || status === null) {
      throw new GatewayError(
        `Transaction not found: ${transactionId}`,
        'TRANSACTION_NOT_FOUND',
        this.gatewayName,
        { transactionId },
      );
    }

    const amount = field(node, 'amount');
    const value = stringField(amount, 'value');
    const currency = stringField(amount, 'currencyCode');
    if (value === null || currency === null) {
      throw new GatewayError(
        `Transaction ${transactionId} has no amount`,
        'GATEWAY_REJECTED_REQUEST',
        this.gatewayName,
        { transactionId },
      );
    }

    return {
      id: stringField(node, 'id') ?? transactionId,
      status: status.toLowerCase(),
      amount: Money.fromMajorUnits(value, currency),
    };
  }

  async vaultedPaymentMethod(
    token: string,
  ): Promise<VaultedPaymentMethod | null> {
    let data: unknown;
    try {
      data = await this.query(PAYMENT_METHOD_QUERY, { id: token });
    } catch (error) {
      if (error instanceof GatewayError && error.code === 'TRANSACTION_NOT_FOUND') {
        return null;
      }
      throw error;
    }

    const details = field(field(data, 'node'), 'details');
    if (!isObject(details)) {
      return null;
    }

    const typename = stringField(details, '__typename');
    if (typename === 'PayPalAccountDetails') {
      return { email: stringField(field(details, 'payer'), 'email') };
    }

    const brandCode = stringField(details, 'brandCode');
    return {
      cardType: brandCode === null ? null : brandLabel(brandCode),
      last4: stringField(details, 'last4'),
    };
  }

  /**
   * POST a GraphQL document and return its `data` member
   */
  private async query(
    document: string,
    variables: Record<string, unknown>,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    // The timeout covers the body read as well as the request
    let response: Response;
    let body: unknown = null;
    try {
      response = await fetch(this.apiBaseUrl, {
        method: 'POST',
        headers: {
          Authorization: this.authorization,
          'Braintree-Version': this.apiVersion,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ query: document, variables }),
        signal: controller.signal,
      });
      if (response.ok) {
        body = await response.json();
      }
    } catch (error) {
      throw new GatewayError(
        `Braintree request failed: ${error instanceof Error ? error.message : String(error)}`,
        'GATEWAY_UNAVAILABLE',
        this.gatewayName,
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      this.logger.error(
        `Braintree API error: ${response.status} ${response.statusText}`,
      );
      const transient = response.status >= 500 || response.status === 429;
      throw new GatewayError(
        `Braintree API error: ${response.status} ${response.statusText}`,
        transient ? 'GATEWAY_UNAVAILABLE' : 'GATEWAY_REJECTED_REQUEST',
        this.gatewayName,
        { status: response.status },
      );
    }

    const errors = field(body, 'errors');
    if (Array.isArray(errors) && errors.length > 0) {
      const messages = errors
        .map((error) => stringField(error, 'message') ?? 'unknown error')
        .join('; ');
      const notFound = errors.some(
        (error) => stringField(field(error, 'extensions'), 'errorClass') === 'NOT_FOUND',
      );
      throw new GatewayError(
        `Braintree GraphQL error: ${messages}`,
        notFound ? 'TRANSACTION_NOT_FOUND' : 'GATEWAY_REJECTED_REQUEST',
        this.gatewayName,
        { variables },
      );
    }

    return field(body, 'data');
  }
}

/**
 * Legacy card type label for a GraphQL brand code, e.g. VISA -> Visa
 */
export function brandLabel(brandCode: string): string {
  if (Object.prototype.hasOwnProperty.call(BRAND_LABELS, brandCode)) {
    return BRAND_LABELS[brandCode];
  }
  return brandCode
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0) + part.slice(1).toLowerCase())
    .join(' ');
}
