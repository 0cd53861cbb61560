/**
 * Resource node types
 */

import type { RolloutConfig } from '../config/schema.js';
import type { RolloutLogger } from '../logging/index.js';

export type StageName = 'infra' | 'app';

export type StageTarget = StageName | 'all';

/**
 * Stages in apply order; destroy walks them backwards
 */
export const STAGES: readonly StageName[] = ['infra', 'app'];

export type NodeState = 'absent' | 'creating' | 'ready' | 'degraded' | 'deleting' | 'deleted';

export const RESOURCE_KINDS = [
  'network',
  'subnetwork',
  'firewall-rule',
  'router',
  'cluster',
  'node-pool',
  'global-address',
  'managed-certificate',
  'namespace',
  'secret',
  'persistent-volume-claim',
  'stateful-set',
  'deployment',
  'service',
  'ingress',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Foundational nodes fail the run when they do not converge; best-effort
 * nodes only produce a warning.
 */
export type ConvergenceClass = 'foundational' | 'best-effort';

/**
 * Static description of one infrastructure or application unit
 */
export interface ResourceNodeDefinition {
  id: string;
  stage: StageName;
  kind: ResourceKind;
  description: string;
  dependsOn: readonly string[];
  convergence: ConvergenceClass;
  /** Destroying the node loses data; teardown asks for confirmation first */
  stateBearing?: boolean;
  /** The node can carry a deletion-protection flag */
  deletionProtected?: boolean;
  name: (config: RolloutConfig) => string;
}

export type ReadinessSeverity = 'info' | 'warning' | 'error';

export interface ReadinessResult {
  ready: boolean;
  /** Stop polling: the resource reached a state it will not recover from on its own */
  terminal?: boolean;
  severity?: ReadinessSeverity;
  reason?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type NodeObservation =
  | { exists: false }
  | {
      exists: true;
      readiness: ReadinessResult;
      deletionProtected?: boolean;
      attributes?: Record<string, unknown>;
    };

/**
 * Everything a handler needs to act on one node
 */
export interface NodeContext {
  node: ResourceNodeDefinition;
  name: string;
  config: RolloutConfig;
  logger: RolloutLogger;
}

export type RemediationAction = 'create' | 'delete' | 'clear-protection';

/**
 * Adapter between a resource node and the API that owns it.
 *
 * `observe` never mutates. `delete` treats an already-absent resource as done.
 */
export interface ResourceHandler {
  observe(ctx: NodeContext): Promise<NodeObservation>;
  create(ctx: NodeContext): Promise<void>;
  update?(ctx: NodeContext): Promise<void>;
  delete(ctx: NodeContext): Promise<void>;
  clearDeletionProtection?(ctx: NodeContext): Promise<void>;
  /** Manual command an operator can run when the automated call fails */
  remediation?(ctx: NodeContext, action: RemediationAction): string;
}

export type ResourceHandlerMap = Record<string, ResourceHandler>;
