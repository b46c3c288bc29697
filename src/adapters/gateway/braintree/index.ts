export * from './braintree-gateway.client';
