export * from './types.js';
export * from './agent-logs.js';
export * from './base-agent.js';
