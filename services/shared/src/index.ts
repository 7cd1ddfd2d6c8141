// Configuration
export * from './config/config';

// Database
export * from './db/client';

// Messaging
export * from './messaging/client';
export * from './messaging/decision-notifier';

// Domain
export * from './domain/inventory-snapshot';
export * from './events';
export * from './events/event-metrics';
export * from './repositories';

// Simulation, detection and publishing
export * from './simulation/jobs';
export * from './simulation/job-state-store';
export * from './simulation/simulation-scheduler';
export * from './analysis/shrink-detector';
export * from './decision/policy-engine';
export * from './integration/enricher';
export * from './integration/flagged-store';
export * from './integration/integration-scheduler';

// Services
export * from './services/recall-service';
export * from './runtime';

// Clients
export * from './clients/sales-history-client';

// Types
export * from './types/inventory.types';

// Utils
export * from './utils/clock';
export * from './utils/logger';
export * from './utils/errors';
