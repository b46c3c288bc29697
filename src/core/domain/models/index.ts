export * from './checkout.model';
export * from './payment.model';
export * from './order.model';
