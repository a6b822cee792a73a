// Store
export * from './db/stock-store';
export * from './db/seed';

// Messaging
export * from './messaging/client';

// Services
export * from './services/inventory-ledger';
export * from './services/inventory-agent';
export * from './services/checkout-saga';
export * from './services/task-router';

// Clients
export * from './clients/payment-gateway';
export * from './clients/fulfillment-service';
export * from './clients/loyalty-service';
export * from './clients/recommendation-service';
export * from './clients/post-purchase-service';

// Types
export * from './types/task.types';
export * from './types/inventory.types';
export * from './types/checkout.types';

// Utils
export * from './utils/config';
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/task-result';
