/**
 * Swagger decorators shared by the controllers
 */

export * from './checkout.decorators';
export * from './reconciliation.decorators';
export * from './health.decorators';
