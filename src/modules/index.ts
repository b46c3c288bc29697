export * from './checkout-sync';
