/**
 * Injection tokens for the checkout sync module
 */

export const CHECKOUT_SYNC_CONFIG = Symbol('CHECKOUT_SYNC_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const GATEWAY_CLIENT = Symbol('GATEWAY_CLIENT');
export const PAYMENT_METHOD_REGISTRY = Symbol('PAYMENT_METHOD_REGISTRY');
export const SHIPMENT_SYNC = Symbol('SHIPMENT_SYNC');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
