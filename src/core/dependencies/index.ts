/**
 * Dependencies module exports
 */

export type { DependencyNode } from '../types/dependencies.js';
export { DependencyGraph } from './graph.js';
export {
  type DestroyBlock,
  type DestroyPlan,
  DependencyResolver,
  type ExecutionPlan,
} from './resolver.js';
