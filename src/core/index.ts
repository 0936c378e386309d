/**
 * Core module exports
 */

// Types
export * from './types.js';
export * from './errors.js';
export * from './config.js';

// Identity
export * from './fingerprint.js';

// Storage
export * from './knowledge-repository.js';
export * from './sqlite-knowledge-store.js';

// Classification & Routing
export * from './classifier.js';
export * from './router.js';

// Consolidation & Review
export * from './consolidation-job.js';
export * from './consolidation-scheduler.js';
export * from './approval-queue.js';
