// Interface and type exports
export * from './common.types';
export * from './storage.adapter';
export * from './gateway-client.interface';
export * from './shipment-sync.interface';
export * from './event-dispatcher.interface';
