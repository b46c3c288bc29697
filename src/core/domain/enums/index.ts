export * from './checkout-state.enum';
export * from './payment-state.enum';
export * from './payment-action.enum';
export * from './checkout-action.enum';
export * from './reconciliation-event-type.enum';
