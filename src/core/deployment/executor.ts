/**
 * Stage Executor
 *
 * Applies the nodes of a stage in dependency order. Each node is observed
 * fresh, created or updated, then polled until it converges or its budget
 * runs out. A failed or degraded node blocks its dependents; independent
 * branches keep going.
 */

import pLimit from 'p-limit';
import {
  ApplyFailure,
  ConvergenceTimeoutError,
  type OrchestratorError,
  PlanArtifactError,
  toError,
} from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { readinessConfigFor } from '../readiness/budgets.js';
import { type PollOutcome, ReadinessPoller } from '../readiness/poller.js';
import type { ResourceRegistry } from '../registry/index.js';
import type {
  DeploymentEvent,
  DeploymentPlan,
  NodeResult,
  PlannedAction,
  PlannedActionType,
  ReadinessConfig,
  StageExecutionResult,
  StageExecutionStatus,
} from '../types/deployment.js';
import type {
  NodeContext,
  NodeObservation,
  ReadinessResult,
  ResourceNodeDefinition,
  StageName,
} from '../types/resources.js';
import type { DeploymentRun } from './run.js';

export interface ExecutorOptions {
  /** Applied on top of every per-kind readiness budget */
  readiness?: Partial<ReadinessConfig>;
  /** Nodes of one dependency level dispatched at once (default: 1, sequential) */
  concurrency?: number;
  poller?: ReadinessPoller;
  emitEvent?: (event: DeploymentEvent) => void;
  signal?: AbortSignal;
}

export interface PlanOptions {
  /** Plan as if no node of the stage existed yet (used when an earlier stage is still pending) */
  assumeAbsent?: boolean;
}

export class StageExecutor {
  private logger = getComponentLogger('stage-executor');
  private readonly poller: ReadinessPoller;

  constructor(
    private readonly registry: ResourceRegistry,
    private readonly options: ExecutorOptions = {}
  ) {
    this.poller = options.poller ?? new ReadinessPoller();
  }

  /**
   * Ordering and intended action of every node, without mutating anything
   */
  async planOnly(
    stage: StageName,
    run: DeploymentRun,
    planOptions: PlanOptions = {}
  ): Promise<DeploymentPlan> {
    const order = this.registry.resolver.orderForApply(stage);
    const actions: PlannedAction[] = [];

    for (const node of order) {
      let action: PlannedActionType;
      if (node.stage !== stage) {
        action = 'verify';
      } else if (planOptions.assumeAbsent) {
        action = 'create';
      } else {
        const observation = await this.observe(node, run);
        action = this.intendedAction(node, observation);
      }

      actions.push({
        id: node.id,
        stage: node.stage,
        kind: node.kind,
        name: this.registry.nameOf(node.id),
        action,
        dependsOn: [...node.dependsOn],
      });
    }

    const plan: DeploymentPlan = {
      environment: run.environment,
      stage,
      createdAt: new Date().toISOString(),
      actions,
    };
    run.recordPlan(plan);
    this.logger.debug('Computed plan', {
      stage,
      actions: actions.map((a) => `${a.id}:${a.action}`),
    });
    return plan;
  }

  private intendedAction(node: ResourceNodeDefinition, observation: NodeObservation): PlannedActionType {
    if (!observation.exists) {
      return 'create';
    }
    if (this.registry.handler(node.id).update) {
      return 'update';
    }
    return observation.readiness.ready ? 'none' : 'wait';
  }

  /**
   * Apply a stage. When a plan is given it must describe the same stage and
   * order the resolver computes now.
   */
  async apply(
    stage: StageName,
    run: DeploymentRun,
    plan?: DeploymentPlan
  ): Promise<StageExecutionResult> {
    const order = this.registry.resolver.orderForApply(stage);
    if (plan) {
      this.assertPlanMatches(stage, order, plan);
    }

    const failed = new Set<string>();
    const results = new Map<string, NodeResult>();
    const warnings: string[] = [];
    const errors: OrchestratorError[] = [];

    this.emit({
      type: 'started',
      message: `Applying ${stage} stage (${order.length} nodes)`,
      timestamp: new Date(),
    });

    const runNode = async (node: ResourceNodeDefinition): Promise<void> => {
      const result = await this.applyNode(node, stage, run, failed);
      if (result.status === 'failed' || result.status === 'blocked' || result.status === 'degraded') {
        failed.add(node.id);
      }
      if (result.error) {
        errors.push(result.error);
      }
      if (result.status === 'degraded' && result.message) {
        warnings.push(result.message);
        run.warn(result.message);
      }
      results.set(node.id, result);
      run.recordResult(result);
    };

    const concurrency = this.options.concurrency ?? 1;
    if (concurrency <= 1) {
      for (const node of order) {
        await runNode(node);
      }
    } else {
      const limit = pLimit(concurrency);
      const { levels } = this.registry.resolver.analyzeExecutionLevels(order.map((n) => n.id));
      for (const level of levels) {
        await Promise.all(
          level.map((id) => limit(() => runNode(this.registry.definition(id))))
        );
      }
    }

    const ordered = order.flatMap((node) => {
      const result = results.get(node.id);
      return result ? [result] : [];
    });
    const status = this.stageStatus(ordered, errors);

    this.emit({
      type: status === 'failed' ? 'failed' : 'completed',
      message: `${stage} stage ${status}: ${ordered.filter((r) => r.status === 'ready').length}/${ordered.length} nodes ready`,
      timestamp: new Date(),
    });

    return { stage, status, results: ordered, warnings, errors };
  }

  private assertPlanMatches(
    stage: StageName,
    order: ResourceNodeDefinition[],
    plan: DeploymentPlan
  ): void {
    const expected = order.map((node) => node.id).join(',');
    const actual = plan.actions.map((action) => action.id).join(',');
    if (plan.stage !== stage || expected !== actual) {
      throw new PlanArtifactError(
        `Plan for stage '${plan.stage}' does not match the current ${stage} order; re-run the plan`,
        `${plan.environment}/${plan.stage}`
      );
    }
  }

  private async applyNode(
    node: ResourceNodeDefinition,
    stage: StageName,
    run: DeploymentRun,
    failed: ReadonlySet<string>
  ): Promise<NodeResult> {
    const startTime = Date.now();
    const elapsed = () => Date.now() - startTime;

    if (this.options.signal?.aborted) {
      return { id: node.id, stage: node.stage, status: 'skipped', message: 'Run cancelled' };
    }

    const blockedBy = node.dependsOn.filter((dep) => failed.has(dep));
    if (blockedBy.length > 0) {
      return {
        id: node.id,
        stage: node.stage,
        status: 'blocked',
        blockedBy,
        message: `Skipped: depends on ${blockedBy.join(', ')} which did not become ready`,
      };
    }

    const ctx = this.context(node, run);
    const handler = this.registry.handler(node.id);

    let observation: NodeObservation;
    try {
      observation = await handler.observe(ctx);
    } catch (error) {
      return this.failure(node, 'observe', error, elapsed());
    }

    if (node.stage !== stage) {
      return this.verifyPrerequisite(node, observation, run, elapsed());
    }

    let action: PlannedActionType;
    if (!observation.exists) {
      action = 'create';
      run.setState(node.id, 'creating');
      ctx.logger.info('Creating resource', { kind: node.kind });
      try {
        await handler.create(ctx);
      } catch (error) {
        run.setState(node.id, 'degraded');
        return this.failure(node, 'create', error, elapsed(), handler.remediation?.(ctx, 'create'));
      }
    } else if (handler.update) {
      action = 'update';
      ctx.logger.debug('Updating existing resource', { kind: node.kind });
      try {
        await handler.update(ctx);
      } catch (error) {
        run.setState(node.id, 'degraded');
        return this.failure(node, 'update', error, elapsed());
      }
    } else {
      action = observation.readiness.ready ? 'none' : 'wait';
      ctx.logger.debug('Adopting existing resource', { kind: node.kind, ready: observation.readiness.ready });
    }

    const outcome = await this.waitForReady(node, ctx);
    return this.convergenceResult(node, action, outcome, run, elapsed());
  }

  private verifyPrerequisite(
    node: ResourceNodeDefinition,
    observation: NodeObservation,
    run: DeploymentRun,
    durationMs: number
  ): NodeResult {
    if (observation.exists && observation.readiness.ready) {
      run.setState(node.id, 'ready');
      return { id: node.id, stage: node.stage, status: 'ready', action: 'verify', durationMs };
    }

    const reason = observation.exists
      ? (observation.readiness.reason ?? 'not ready')
      : 'does not exist';
    run.setState(node.id, observation.exists ? 'degraded' : 'absent');
    const error = new ApplyFailure(
      `Prerequisite '${node.id}' (${node.stage} stage) ${reason}`,
      node.id,
      'observe',
      undefined,
      `Run 'deploy ${run.environment} apply-${node.stage}' first`
    );
    return {
      id: node.id,
      stage: node.stage,
      status: 'failed',
      action: 'verify',
      message: error.message,
      error,
      durationMs,
    };
  }

  private async waitForReady(node: ResourceNodeDefinition, ctx: NodeContext): Promise<PollOutcome> {
    const handler = this.registry.handler(node.id);
    const read = async (): Promise<ReadinessResult> => {
      const observation = await handler.observe(ctx);
      return observation.exists
        ? observation.readiness
        : { ready: false, reason: 'not visible yet' };
    };

    return this.poller.waitFor(read, {
      resourceId: node.id,
      config: readinessConfigFor(node.kind, this.registry.config, this.options.readiness),
      ...(this.options.emitEvent ? { emitEvent: this.options.emitEvent } : {}),
      ...(this.options.signal ? { signal: this.options.signal } : {}),
    });
  }

  private convergenceResult(
    node: ResourceNodeDefinition,
    action: PlannedActionType,
    outcome: PollOutcome,
    run: DeploymentRun,
    durationMs: number
  ): NodeResult {
    const base = { id: node.id, stage: node.stage, action, durationMs };

    if (outcome.status === 'ready') {
      run.setState(node.id, 'ready');
      return { ...base, status: 'ready', ...messageOf(outcome.readiness) };
    }

    if (outcome.status === 'cancelled') {
      return { ...base, status: 'skipped', message: 'Run cancelled while waiting for readiness' };
    }

    run.setState(node.id, 'degraded');
    const lastReason = outcome.readiness?.reason ?? outcome.lastError?.message;

    if (node.convergence === 'best-effort') {
      const detail = lastReason ? `: ${lastReason}` : '';
      return {
        ...base,
        status: 'degraded',
        message:
          outcome.status === 'timeout'
            ? `${node.id} did not converge within its budget${detail}; re-check with 'status ${run.environment} --${node.stage}'`
            : `${node.id} is degraded${detail}`,
      };
    }

    const error =
      outcome.status === 'timeout'
        ? new ConvergenceTimeoutError(
            node.id,
            readinessConfigFor(node.kind, this.registry.config, this.options.readiness).timeout,
            lastReason
          )
        : new ApplyFailure(
            `'${node.id}' reached a terminal state: ${lastReason ?? 'unknown'}`,
            node.id,
            action === 'update' ? 'update' : 'create'
          );
    return { ...base, status: 'failed', message: error.message, error };
  }

  private failure(
    node: ResourceNodeDefinition,
    operation: 'create' | 'update' | 'observe',
    cause: unknown,
    durationMs: number,
    remediation?: string
  ): NodeResult {
    if (this.options.signal?.aborted) {
      return { id: node.id, stage: node.stage, status: 'skipped', message: `Run cancelled during ${operation}` };
    }
    const error = toError(cause);
    const failure = new ApplyFailure(
      `Failed to ${operation} '${node.id}': ${error.message}`,
      node.id,
      operation,
      error,
      remediation
    );
    this.logger.error('Node failed', error, { resourceId: node.id, operation });
    this.emit({
      type: 'failed',
      resourceId: node.id,
      message: failure.message,
      timestamp: new Date(),
      error: failure,
    });
    return {
      id: node.id,
      stage: node.stage,
      status: 'failed',
      action: operation === 'observe' ? 'verify' : operation,
      message: failure.message,
      error: failure,
      durationMs,
    };
  }

  private stageStatus(results: NodeResult[], errors: OrchestratorError[]): StageExecutionStatus {
    if (errors.length === 0 && results.every((r) => r.status !== 'blocked' && r.status !== 'skipped')) {
      return 'success';
    }
    return results.some((r) => r.status === 'ready' && r.action !== 'verify') ? 'partial' : 'failed';
  }

  private async observe(node: ResourceNodeDefinition, run: DeploymentRun): Promise<NodeObservation> {
    try {
      return await this.registry.handler(node.id).observe(this.context(node, run));
    } catch (error) {
      const cause = toError(error);
      throw new ApplyFailure(`Failed to observe '${node.id}': ${cause.message}`, node.id, 'observe', cause);
    }
  }

  private context(node: ResourceNodeDefinition, run: DeploymentRun): NodeContext {
    return this.registry.context(node.id, run.logger);
  }

  private emit(event: DeploymentEvent): void {
    this.options.emitEvent?.(event);
  }
}

function messageOf(readiness: ReadinessResult | undefined): { message?: string } {
  return readiness?.message ? { message: readiness.message } : {};
}
