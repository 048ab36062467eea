/**
 * @founder-finder/agents - Agent implementations
 *
 * - founders/ : Founder research agent, search/inference boundaries and the batch pipeline
 * - shared/   : Base agent and log buffer
 */

export * from './shared/index.js';
export * from './founders/index.js';
