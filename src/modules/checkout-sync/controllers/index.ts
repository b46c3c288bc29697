export { CheckoutController } from './checkout.controller';
export { ReconciliationController } from './reconciliation.controller';
export { HealthController } from './health.controller';
