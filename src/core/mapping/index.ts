export * from './state-mapper';
