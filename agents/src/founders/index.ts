/**
 * Founder research — search, infer and collect founders per company
 */

export * from './types.js';
export * from './web-search-client.js';
export * from './founder-inference.js';
export * from './founder-research-agent.js';
export * from './founder-pipeline.js';
