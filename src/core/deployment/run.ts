/**
 * Deployment Run
 *
 * The explicit record of one invocation. Components receive it instead of
 * sharing process-wide state.
 */

import { randomUUID } from 'node:crypto';
import type { RolloutConfig } from '../config/schema.js';
import type { OrchestratorError } from '../errors.js';
import { getDeploymentLogger, type RolloutLogger } from '../logging/index.js';
import type {
  DeploymentPlan,
  NodeResult,
  RunAction,
  RunOutcome,
  StageExecutionStatus,
  TeardownStatus,
} from '../types/deployment.js';
import type { NodeState, StageName, StageTarget } from '../types/resources.js';
import type { StageValidation, ValidationResult } from '../types/validation.js';

export interface DeploymentRunInit {
  environment: string;
  action: RunAction;
  target: StageTarget;
  config: RolloutConfig;
  id?: string;
  logger?: RolloutLogger;
}

const EXIT_CODES: Record<RunOutcome, number> = {
  success: 0,
  cancelled: 0,
  'validation-failed': 1,
  'apply-failed': 1,
  partial: 2,
};

export class DeploymentRun {
  readonly id: string;
  readonly environment: string;
  readonly action: RunAction;
  readonly target: StageTarget;
  readonly config: RolloutConfig;
  readonly logger: RolloutLogger;
  readonly startedAt = new Date();
  finishedAt?: Date;

  readonly nodeStates = new Map<string, NodeState>();
  readonly touched: string[] = [];
  readonly nodeResults: NodeResult[] = [];
  readonly validations: StageValidation[] = [];
  readonly plans: DeploymentPlan[] = [];
  readonly warnings: string[] = [];
  readonly errors: OrchestratorError[] = [];

  private currentOutcome: RunOutcome | undefined;

  constructor(init: DeploymentRunInit) {
    this.id = init.id ?? randomUUID().slice(0, 8);
    this.environment = init.environment;
    this.action = init.action;
    this.target = init.target;
    this.config = init.config;
    this.logger =
      init.logger ?? getDeploymentLogger(this.id, init.environment, { action: init.action });
  }

  get outcome(): RunOutcome | undefined {
    return this.currentOutcome;
  }

  setState(id: string, state: NodeState): void {
    this.nodeStates.set(id, state);
  }

  touch(id: string): void {
    if (!this.touched.includes(id)) {
      this.touched.push(id);
    }
  }

  recordResult(result: NodeResult): void {
    this.touch(result.id);
    this.nodeResults.push(result);
    if (result.error) {
      this.errors.push(result.error);
    }
  }

  recordValidation(stage: StageName, result: ValidationResult): void {
    this.validations.push({ stage, result });
    for (const warning of result.warnings) {
      this.warn(`[${stage} ${result.phase}] ${warning.check}: ${warning.reason}`);
    }
  }

  recordPlan(plan: DeploymentPlan): void {
    this.plans.push(plan);
  }

  warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(message);
  }

  fail(error: OrchestratorError): void {
    this.errors.push(error);
    this.logger.error(error.message, error, { code: error.code });
  }

  /**
   * Set the outcome; the run keeps the latest value until finalized
   */
  setOutcome(outcome: RunOutcome): void {
    this.currentOutcome = outcome;
  }

  finalize(outcome?: RunOutcome): RunOutcome {
    const final = outcome ?? this.currentOutcome ?? 'success';
    this.currentOutcome = final;
    this.finishedAt = new Date();
    this.logger.info('Run finished', {
      outcome: final,
      touched: this.touched.length,
      warnings: this.warnings.length,
      errors: this.errors.length,
      durationMs: this.finishedAt.getTime() - this.startedAt.getTime(),
    });
    return final;
  }

  exitCode(): number {
    return EXIT_CODES[this.currentOutcome ?? 'success'];
  }
}

export function outcomeForStage(status: StageExecutionStatus): RunOutcome {
  switch (status) {
    case 'success':
      return 'success';
    case 'partial':
      return 'partial';
    case 'failed':
      return 'apply-failed';
  }
}

export function outcomeForTeardown(status: TeardownStatus): RunOutcome {
  switch (status) {
    case 'success':
      return 'success';
    case 'cancelled':
      return 'cancelled';
    case 'partial':
      return 'partial';
    case 'failed':
      return 'apply-failed';
  }
}

/**
 * Most severe of two outcomes
 */
export function worstOutcome(a: RunOutcome, b: RunOutcome): RunOutcome {
  const rank: Record<RunOutcome, number> = {
    success: 0,
    cancelled: 1,
    partial: 2,
    'validation-failed': 3,
    'apply-failed': 4,
  };
  return rank[a] >= rank[b] ? a : b;
}
