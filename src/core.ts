/**
 * Rollout Core - Consolidated exports
 *
 * Single entry point for the resolver, preflight validator, stage executor
 * and teardown guard, independent of the n8n catalog.
 */

// =============================================================================
// Configuration
// =============================================================================
export * from './core/config/index.js';
// =============================================================================
// Dependency Resolution
// =============================================================================
export * from './core/dependencies/index.js';
// =============================================================================
// Deployment (executor, teardown, runs)
// =============================================================================
export * from './core/deployment/index.js';
// =============================================================================
// Errors
// =============================================================================
export * from './core/errors.js';
// =============================================================================
// Kubernetes Clients
// =============================================================================
export * from './core/kubernetes/index.js';
// =============================================================================
// Logging
// =============================================================================
export * from './core/logging/index.js';
// =============================================================================
// Orchestration
// =============================================================================
export { Orchestrator, type OrchestratorOptions, type OrchestratorRuntime } from './core/orchestrator.js';
// =============================================================================
// Readiness
// =============================================================================
export * from './core/readiness/index.js';
// =============================================================================
// Registry
// =============================================================================
export { ResourceRegistry } from './core/registry/index.js';
// =============================================================================
// Types
// =============================================================================
export * from './core/types/index.js';
// =============================================================================
// Validation
// =============================================================================
export { PreflightValidator } from './core/validation/index.js';
