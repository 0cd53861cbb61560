/**
 * Teardown Guard
 *
 * Destroys stages dependents first. Nodes still needed by live nodes outside
 * the destroyed stages are refused per branch, state-bearing nodes need an
 * explicit confirmation, and deletion-protected nodes get their flag cleared
 * and exactly one retry.
 */

import {
  ApplyFailure,
  BlockingDependencyFailure,
  type OrchestratorError,
  ProtectedResourceFailure,
  toError,
} from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { readinessConfigFor } from '../readiness/budgets.js';
import { ReadinessPoller } from '../readiness/poller.js';
import type { ResourceRegistry } from '../registry/index.js';
import type {
  DeploymentEvent,
  NodeResult,
  ReadinessConfig,
  TeardownResult,
  TeardownStatus,
} from '../types/deployment.js';
import type {
  NodeContext,
  NodeObservation,
  ResourceNodeDefinition,
  StageName,
  StageTarget,
} from '../types/resources.js';
import type { ConfirmationGate } from './confirmation.js';
import type { DeploymentRun } from './run.js';

interface LiveNode {
  live: boolean;
  protected: boolean;
  /** Why the node could not be observed */
  unobservable?: string;
}

export interface TeardownOptions {
  confirmation: ConfirmationGate;
  readiness?: Partial<ReadinessConfig>;
  poller?: ReadinessPoller;
  emitEvent?: (event: DeploymentEvent) => void;
  signal?: AbortSignal;
}

/**
 * Stages a target destroys, in destroy order
 */
export function destroyStages(target: StageTarget): StageName[] {
  return target === 'all' ? ['app', 'infra'] : [target];
}

export class TeardownGuard {
  private logger = getComponentLogger('teardown-guard');
  private readonly poller: ReadinessPoller;

  constructor(
    private readonly registry: ResourceRegistry,
    private readonly options: TeardownOptions
  ) {
    this.poller = options.poller ?? new ReadinessPoller();
  }

  async destroy(target: StageTarget, run: DeploymentRun): Promise<TeardownResult> {
    const stages = destroyStages(target);
    const live = await this.observeAll(run);
    const results: NodeResult[] = [];
    const errors: OrchestratorError[] = [];
    const deleted: string[] = [];

    const targetNodes = this.registry.definitions().filter((node) => stages.includes(node.stage));
    for (const node of targetNodes) {
      if (node.deletionProtected && live.get(node.id)?.protected) {
        run.warn(`${node.id} has deletion protection enabled; it will be cleared before deletion`);
      }
    }

    const stateBearing = targetNodes.filter((node) => node.stateBearing && live.get(node.id)?.live);
    if (stateBearing.length > 0) {
      const approved = await this.options.confirmation.confirm({
        message: `Destroying ${target} in '${run.environment}' permanently deletes stored data:`,
        items: stateBearing.map((node) => `${node.id} (${this.registry.nameOf(node.id)})`),
        requiredPhrase: 'yes',
      });
      if (!approved) {
        this.logger.info('Teardown declined at the data confirmation gate', { target });
        return { target, status: 'cancelled', deleted, results, errors };
      }
    }

    this.emit({
      type: 'started',
      message: `Destroying ${stages.join(' then ')} in '${run.environment}'`,
      timestamp: new Date(),
    });

    const failed = new Set<string>();
    for (const stage of stages) {
      const plan = this.registry.resolver.orderForDestroy(
        stage,
        (id) => live.get(id)?.live ?? false
      );

      for (const block of plan.blocked) {
        const node = this.registry.definition(block.id);
        if (!live.get(node.id)?.live) {
          results.push(this.record(run, { id: node.id, stage: node.stage, status: 'absent' }));
          continue;
        }
        const error = this.blockingFailure(node.id, block.blockedBy, live, run, target);
        failed.add(node.id);
        errors.push(error);
        results.push(
          this.record(run, {
            id: node.id,
            stage: node.stage,
            status: 'blocked',
            blockedBy: block.blockedBy,
            message: error.message,
            error,
          })
        );
      }

      for (const node of plan.order) {
        const result = await this.destroyNode(node, run, live, failed);
        if (result.status === 'deleted') {
          deleted.push(node.id);
        }
        if (result.status === 'deleted' || result.status === 'absent') {
          live.set(node.id, { live: false, protected: false });
        } else {
          failed.add(node.id);
        }
        if (result.error) {
          errors.push(result.error);
        }
        results.push(this.record(run, result));
      }
    }

    const status = this.teardownStatus(results, errors, deleted);
    this.emit({
      type: status === 'failed' ? 'failed' : 'completed',
      message: `Teardown ${status}: ${deleted.length} deleted, ${errors.length} failed`,
      timestamp: new Date(),
    });

    return { target, status, deleted, results, errors };
  }

  /**
   * Observe every node once. A node that cannot be observed is absent when
   * one of its dependencies was observed absent, and live otherwise.
   */
  private async observeAll(run: DeploymentRun): Promise<Map<string, LiveNode>> {
    const live = new Map<string, LiveNode>();
    const unobserved = new Map<string, Error>();

    for (const node of this.registry.definitions()) {
      try {
        const observation = await this.registry.handler(node.id).observe(this.context(node, run));
        live.set(node.id, {
          live: observation.exists,
          protected: observation.exists && observation.deletionProtected === true,
        });
        run.setState(node.id, observation.exists ? (observation.readiness.ready ? 'ready' : 'degraded') : 'absent');
      } catch (error) {
        unobserved.set(node.id, toError(error));
      }
    }

    const graph = this.registry.resolver.getGraph();
    for (const [id, error] of unobserved) {
      const gone = Array.from(graph.getTransitiveDependencies([id])).find((dep) => live.get(dep)?.live === false);
      if (gone) {
        this.logger.debug('Could not observe node; treating it as absent', {
          resourceId: id,
          absentDependency: gone,
          error: error.message,
        });
        live.set(id, { live: false, protected: false });
        run.setState(id, 'absent');
      } else {
        this.logger.warn('Could not observe node; treating it as live', { resourceId: id, error: error.message });
        live.set(id, { live: true, protected: false, unobservable: error.message });
      }
    }
    return live;
  }

  /**
   * Dependents that could not be observed are named apart from live ones
   */
  private blockingFailure(
    id: string,
    blockedBy: string[],
    live: ReadonlyMap<string, LiveNode>,
    run: DeploymentRun,
    target: StageTarget
  ): BlockingDependencyFailure {
    const unknown = blockedBy.filter((dependent) => live.get(dependent)?.unobservable !== undefined);
    const known = blockedBy.filter((dependent) => !unknown.includes(dependent));
    const reasons = [
      ...(known.length > 0 ? [`still required by live ${known.join(', ')}`] : []),
      ...(unknown.length > 0 ? [`dependents ${unknown.join(', ')} could not be observed`] : []),
    ];
    return new BlockingDependencyFailure(
      `Refusing to delete '${id}': ${reasons.join('; ')}`,
      id,
      blockedBy,
      unknown.length > 0
        ? `Restore access to ${unknown.join(', ')} and re-run 'destroy ${run.environment} ${target}'`
        : undefined
    );
  }

  private async destroyNode(
    node: ResourceNodeDefinition,
    run: DeploymentRun,
    live: Map<string, LiveNode>,
    failed: ReadonlySet<string>
  ): Promise<NodeResult> {
    const base = { id: node.id, stage: node.stage, action: 'delete' as const };
    const startTime = Date.now();

    if (this.options.signal?.aborted) {
      return { ...base, status: 'skipped', message: 'Run cancelled' };
    }

    if (!live.get(node.id)?.live) {
      run.setState(node.id, 'absent');
      return { ...base, status: 'absent', message: 'Already absent' };
    }

    const blockedBy = this.registry
      .getDependentsOf(node.id)
      .filter((dependent) => failed.has(dependent));
    if (blockedBy.length > 0) {
      const error = new BlockingDependencyFailure(
        `Refusing to delete '${node.id}': dependents ${blockedBy.join(', ')} were not deleted`,
        node.id,
        blockedBy
      );
      return { ...base, status: 'blocked', blockedBy, message: error.message, error };
    }

    const ctx = this.context(node, run);
    run.setState(node.id, 'deleting');
    ctx.logger.info('Deleting resource', { kind: node.kind });

    try {
      await this.deleteWithProtection(ctx);
    } catch (error) {
      if (this.options.signal?.aborted) {
        return { ...base, status: 'skipped', message: 'Run cancelled during delete' };
      }
      run.setState(node.id, 'degraded');
      const failure =
        error instanceof ProtectedResourceFailure || error instanceof ApplyFailure
          ? error
          : new ApplyFailure(
              `Failed to delete '${node.id}': ${toError(error).message}`,
              node.id,
              'delete',
              toError(error),
              this.registry.handler(node.id).remediation?.(ctx, 'delete')
            );
      this.emit({
        type: 'failed',
        resourceId: node.id,
        message: failure.message,
        timestamp: new Date(),
        error: failure,
      });
      return { ...base, status: 'failed', message: failure.message, error: failure };
    }

    const outcome = await this.poller.waitFor(
      async () => {
        const observation = await this.registry.handler(node.id).observe(ctx);
        return observation.exists
          ? { ready: false, reason: 'still present' }
          : { ready: true };
      },
      {
        resourceId: node.id,
        config: readinessConfigFor(node.kind, this.registry.config, this.options.readiness),
        ...(this.options.emitEvent ? { emitEvent: this.options.emitEvent } : {}),
        ...(this.options.signal ? { signal: this.options.signal } : {}),
      }
    );

    if (outcome.status === 'cancelled') {
      return { ...base, status: 'skipped', message: 'Run cancelled while waiting for deletion' };
    }
    if (outcome.status !== 'ready') {
      run.setState(node.id, 'degraded');
      const error = new ApplyFailure(
        `'${node.id}' is still present ${outcome.durationMs}ms after its delete call`,
        node.id,
        'delete',
        outcome.lastError,
        this.registry.handler(node.id).remediation?.(ctx, 'delete')
      );
      return { ...base, status: 'failed', message: error.message, error };
    }

    run.setState(node.id, 'deleted');
    return { ...base, status: 'deleted', durationMs: Date.now() - startTime };
  }

  /**
   * Delete; when that fails on a protected node, clear the flag, verify it
   * is cleared and retry exactly once
   */
  private async deleteWithProtection(ctx: NodeContext): Promise<void> {
    const handler = this.registry.handler(ctx.node.id);
    const remediation =
      handler.remediation?.(ctx, 'clear-protection') ?? `Remove deletion protection from ${ctx.name} manually`;

    try {
      await handler.delete(ctx);
      return;
    } catch (error) {
      const firstError = toError(error);
      const observation = await this.reobserve(ctx);

      if (!observation.exists) {
        ctx.logger.debug('Delete reported an error but the resource is gone', {
          error: firstError.message,
        });
        return;
      }

      if (!observation.deletionProtected || !handler.clearDeletionProtection) {
        throw new ApplyFailure(
          `Failed to delete '${ctx.node.id}': ${firstError.message}`,
          ctx.node.id,
          'delete',
          firstError,
          handler.remediation?.(ctx, 'delete')
        );
      }

      ctx.logger.warn('Delete rejected by deletion protection; clearing the flag', {
        error: firstError.message,
      });
      await handler.clearDeletionProtection(ctx);

      const verified = await this.reobserve(ctx);
      if (verified.exists && verified.deletionProtected) {
        throw new ProtectedResourceFailure(
          `Deletion protection on '${ctx.node.id}' did not clear`,
          ctx.node.id,
          remediation,
          firstError
        );
      }
      if (!verified.exists) {
        return;
      }

      try {
        await handler.delete(ctx);
      } catch (retryError) {
        throw new ProtectedResourceFailure(
          `Failed to delete protected resource '${ctx.node.id}' after clearing its protection: ${toError(retryError).message}`,
          ctx.node.id,
          remediation,
          toError(retryError)
        );
      }
    }
  }

  private async reobserve(ctx: NodeContext): Promise<NodeObservation> {
    try {
      return await this.registry.handler(ctx.node.id).observe(ctx);
    } catch (error) {
      const cause = toError(error);
      throw new ApplyFailure(
        `Failed to observe '${ctx.node.id}' after a failed delete: ${cause.message}`,
        ctx.node.id,
        'observe',
        cause
      );
    }
  }

  private teardownStatus(
    results: NodeResult[],
    errors: OrchestratorError[],
    deleted: string[]
  ): TeardownStatus {
    if (errors.length === 0 && results.every((r) => r.status !== 'skipped')) {
      return 'success';
    }
    if (errors.length === 0) {
      return 'cancelled';
    }
    return deleted.length > 0 ? 'partial' : 'failed';
  }

  private record(run: DeploymentRun, result: NodeResult): NodeResult {
    run.recordResult(result);
    return result;
  }

  private context(node: ResourceNodeDefinition, run: DeploymentRun): NodeContext {
    return this.registry.context(node.id, run.logger);
  }

  private emit(event: DeploymentEvent): void {
    this.options.emitEvent?.(event);
  }
}
