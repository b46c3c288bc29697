export * from './mock-storage.adapter';
