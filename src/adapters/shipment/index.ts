export * from './http-shipment-sync';
export * from './logging-shipment-sync';
export * from './mock-shipment-sync';
