/**
 * Deployment run types
 */

import type { OrchestratorError } from '../errors.js';
import type { ResourceKind, StageName, StageTarget } from './resources.js';

export type RunAction = 'plan' | 'apply' | 'destroy' | 'status';

export type RunOutcome = 'success' | 'validation-failed' | 'apply-failed' | 'partial' | 'cancelled';

export type DeployAction = 'plan-infra' | 'apply-infra' | 'plan-app' | 'apply-app' | 'plan' | 'apply';

export const DEPLOY_ACTIONS: readonly DeployAction[] = [
  'plan-infra',
  'apply-infra',
  'plan-app',
  'apply-app',
  'plan',
  'apply',
];

/**
 * create: absent, will be created
 * update: present, will be patched
 * wait: present but not ready yet
 * none: present and ready
 * verify: belongs to another stage, checked but never mutated
 */
export type PlannedActionType = 'create' | 'update' | 'wait' | 'none' | 'verify';

export interface PlannedAction {
  id: string;
  stage: StageName;
  kind: ResourceKind;
  name: string;
  action: PlannedActionType;
  dependsOn: string[];
}

export interface DeploymentPlan {
  environment: string;
  stage: StageName;
  createdAt: string;
  actions: PlannedAction[];
}

export type NodeResultStatus =
  | 'ready'
  | 'degraded'
  | 'failed'
  | 'blocked'
  | 'skipped'
  | 'deleted'
  | 'absent';

export interface NodeResult {
  id: string;
  stage: StageName;
  status: NodeResultStatus;
  action?: PlannedActionType | 'delete';
  message?: string;
  error?: OrchestratorError;
  blockedBy?: string[];
  durationMs?: number;
}

/**
 * Readiness polling configuration for one node
 */
export interface ReadinessConfig {
  timeout: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  errorRetryDelay: number;
  progressInterval: number;
}

export interface DeploymentEvent {
  type: 'started' | 'progress' | 'resource-ready' | 'resource-warning' | 'failed' | 'completed';
  resourceId?: string;
  message: string;
  timestamp: Date;
  error?: Error;
}

export type StageExecutionStatus = 'success' | 'partial' | 'failed';

export interface StageExecutionResult {
  stage: StageName;
  status: StageExecutionStatus;
  results: NodeResult[];
  warnings: string[];
  errors: OrchestratorError[];
}

export type TeardownStatus = 'success' | 'partial' | 'failed' | 'cancelled';

export interface TeardownResult {
  target: StageTarget;
  status: TeardownStatus;
  deleted: string[];
  results: NodeResult[];
  errors: OrchestratorError[];
}
