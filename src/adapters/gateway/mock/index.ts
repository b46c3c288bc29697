export * from './mock-gateway.client';
