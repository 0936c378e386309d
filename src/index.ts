/**
 * Public entry point
 */

export * from './core/index.js';
export { KnowledgeService, createKnowledgeService } from './services/knowledge-service.js';
export type { ClassifyOutcome, KnowledgeServiceOptions } from './services/knowledge-service.js';
export { createApp, startServer, stopServer } from './server/index.js';
