/**
 * Reconciliation core - domain logic with no framework wiring
 * Storage and gateway agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects/money.vo';

// Interfaces and contracts
export * from './interfaces';

// State mapping and transition rules
export * from './mapping';
export * from './state-machine';

// Core services
export * from './services';

// Event system
export * from './events';
