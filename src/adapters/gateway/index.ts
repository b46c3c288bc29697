export * from './braintree';
export * from './mock';
export * from './payment-method.registry';
