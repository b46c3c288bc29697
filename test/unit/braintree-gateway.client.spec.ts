import {
  BraintreeGatewayClient,
  GatewayError,
  brandLabel,
} from '../../src';

const API_URL = 'https://payments.sandbox.braintree-api.com/graphql';

async function gatewayErrorFrom(
  promise: Promise<unknown>,
): Promise<GatewayError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GatewayError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to fail');
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('BraintreeGatewayClient', () => {
  let client: BraintreeGatewayClient;
  let fetchSpy: jest.SpyInstance<
    ReturnType<typeof fetch>,
    Parameters<typeof fetch>
  >;

  beforeEach(() => {
    client = new BraintreeGatewayClient(
      { publicKey: 'test-public', privateKey: 'test-secret' },
      { apiBaseUrl: API_URL, timeout: 5000 },
    );
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe('findTransaction', () => {
    it('should return the lower-cased status and the amount in minor units', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          data: {
            node: {
              id: 'txn_1',
              status: 'SUBMITTED_FOR_SETTLEMENT',
              amount: { value: '100.00', currencyCode: 'USD' },
            },
          },
        }),
      );

      const transaction = await client.findTransaction('txn_1');

      expect(transaction.id).toBe('txn_1');
      expect(transaction.status).toBe('submitted_for_settlement');
      expect(transaction.amount.amount).toBe(10000);
      expect(transaction.amount.currency).toBe('USD');
    });

    it('should POST the query with basic auth', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          data: {
            node: {
              id: 'txn_1',
              status: 'SETTLED',
              amount: { value: '1.00', currencyCode: 'USD' },
            },
          },
        }),
      );

      await client.findTransaction('txn_1');

      expect(fetchSpy).toHaveBeenCalledTimes(1);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe(API_URL);
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        Authorization: `Basic ${Buffer.from('test-public:test-secret').toString('base64')}`,
        'Braintree-Version': '2019-01-01',
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(String(init?.body)).variables).toEqual({ id: 'txn_1' });
    });

    it('should report a missing node as not found', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({ data: { node: null } }));

      await expect(client.findTransaction('txn_missing')).rejects.toMatchObject({
        name: 'GatewayError',
        code: 'TRANSACTION_NOT_FOUND',
        gatewayName: 'braintree',
      });
    });

    it('should report a NOT_FOUND GraphQL error as not found', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          data: { node: null },
          errors: [
            {
              message: 'An object with this ID was not found.',
              extensions: { errorClass: 'NOT_FOUND' },
            },
          ],
        }),
      );

      await expect(client.findTransaction('txn_gone')).rejects.toMatchObject({
        code: 'TRANSACTION_NOT_FOUND',
        message:
          'Braintree GraphQL error: An object with this ID was not found.',
      });
    });

    it('should report other GraphQL errors as rejected requests', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          errors: [
            {
              message: 'Variable id is invalid',
              extensions: { errorClass: 'VALIDATION' },
            },
          ],
        }),
      );

      await expect(client.findTransaction('bad')).rejects.toMatchObject({
        code: 'GATEWAY_REJECTED_REQUEST',
      });
    });

    it('should treat server errors and throttling as transient', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({}, 503));
      const unavailable = await gatewayErrorFrom(client.findTransaction('txn_1'));
      expect(unavailable.code).toBe('GATEWAY_UNAVAILABLE');
      expect(unavailable.isTransient).toBe(true);

      fetchSpy.mockImplementation(async () => jsonResponse({}, 429));
      await expect(client.findTransaction('txn_1')).rejects.toMatchObject({
        code: 'GATEWAY_UNAVAILABLE',
      });
    });

    it('should treat client errors as rejected requests', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({}, 401));

      const error = await gatewayErrorFrom(client.findTransaction('txn_1'));
      expect(error.code).toBe('GATEWAY_REJECTED_REQUEST');
      expect(error.isTransient).toBe(false);
      expect(error.details).toEqual({ status: 401 });
    });

    it('should treat network failures as transient', async () => {
      fetchSpy.mockRejectedValue(new Error('socket hang up'));

      await expect(client.findTransaction('txn_1')).rejects.toMatchObject({
        code: 'GATEWAY_UNAVAILABLE',
        message: 'Braintree request failed: socket hang up',
      });
    });

    it('should treat an unreadable body as transient', async () => {
      fetchSpy.mockImplementation(
        async () =>
          new Response('{"data": {"node"', {
            status: 200,
            headers: { 'Content-Type': 'application/json' },
          }),
      );

      const error = await gatewayErrorFrom(client.findTransaction('txn_1'));
      expect(error.code).toBe('GATEWAY_UNAVAILABLE');
      expect(error.message.startsWith('Braintree request failed: ')).toBe(true);
    });

    it('should keep zero-decimal currencies in whole units', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          data: {
            node: {
              id: 'txn_jpy',
              status: 'SETTLED',
              amount: { value: '1500', currencyCode: 'JPY' },
            },
          },
        }),
      );

      const transaction = await client.findTransaction('txn_jpy');

      expect(transaction.amount.amount).toBe(1500);
      expect(transaction.amount.currency).toBe('JPY');
    });
  });

  describe('vaultedPaymentMethod', () => {
    it('should return card details with the legacy brand label', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          data: {
            node: {
              details: {
                __typename: 'CreditCardDetails',
                brandCode: 'MASTERCARD',
                last4: '4444',
              },
            },
          },
        }),
      );

      await expect(client.vaultedPaymentMethod('pm_card')).resolves.toEqual({
        cardType: 'MasterCard',
        last4: '4444',
      });
    });

    it('should return the payer email for PayPal accounts', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          data: {
            node: {
              details: {
                __typename: 'PayPalAccountDetails',
                payer: { email: 'buyer@example.com' },
              },
            },
          },
        }),
      );

      await expect(client.vaultedPaymentMethod('pm_paypal')).resolves.toEqual({
        email: 'buyer@example.com',
      });
    });

    it('should return null for an unknown token', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({ data: { node: null } }));

      await expect(client.vaultedPaymentMethod('pm_unknown')).resolves.toBeNull();
    });

    it('should propagate gateway outages', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({}, 500));

      await expect(client.vaultedPaymentMethod('pm_card')).rejects.toMatchObject({
        code: 'GATEWAY_UNAVAILABLE',
      });
    });
  });

  describe('brandLabel', () => {
    it('should use the legacy label table', () => {
      expect(brandLabel('AMERICAN_EXPRESS')).toBe('AmericanExpress');
      expect(brandLabel('DINERS')).toBe('Diners Club');
      expect(brandLabel('MASTERCARD')).toBe('MasterCard');
    });

    it('should title-case other brand codes', () => {
      expect(brandLabel('VISA')).toBe('Visa');
      expect(brandLabel('DISCOVER')).toBe('Discover');
      expect(brandLabel('SOLO_CARD')).toBe('Solo Card');
    });
  });
});
