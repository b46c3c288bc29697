export * from './payment-transitions';
export * from './action-guards';
export * from './checkout-transitions';
