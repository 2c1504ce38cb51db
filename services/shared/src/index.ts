// Domain
export * from './domain/items';

// Services
export * from './services/inventory-aggregator';
export * from './services/buildability-service';
export * from './services/order-costing';
export * from './services/wanted-list';
export * from './services/reporting';
export * from './services/reconciliation-service';

// Clients
export * from './clients/reconciliation-sources';

// Types
export * from './types/inventory.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
