/**
 * gke-rollout - staged rollout and teardown of n8n on GKE
 */

export * from './core.js';
export * from './factories/index.js';
export * from './utils/index.js';
