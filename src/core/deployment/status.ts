/**
 * Read-only status of the resource nodes of an environment
 */

import { toError } from '../errors.js';
import type { RolloutLogger } from '../logging/index.js';
import type { ResourceRegistry } from '../registry/index.js';
import type { NodeState, ResourceKind, StageName, StageTarget } from '../types/resources.js';

export interface NodeStatus {
  id: string;
  stage: StageName;
  kind: ResourceKind;
  name: string;
  state: NodeState | 'unknown';
  ready: boolean;
  reason?: string;
  message?: string;
  attributes?: Record<string, unknown>;
}

export interface StatusReport {
  environment: string;
  target: StageTarget;
  generatedAt: string;
  nodes: NodeStatus[];
  /** Every reported node exists and is ready */
  healthy: boolean;
}

export class StatusReporter {
  constructor(
    private readonly registry: ResourceRegistry,
    private readonly logger: RolloutLogger
  ) {}

  async collect(target: StageTarget): Promise<StatusReport> {
    const definitions =
      target === 'all' ? this.registry.definitions() : this.registry.definitions(target);
    const nodes: NodeStatus[] = [];

    for (const node of definitions) {
      const base = {
        id: node.id,
        stage: node.stage,
        kind: node.kind,
        name: this.registry.nameOf(node.id),
      };

      try {
        const observation = await this.registry.observe(node.id, this.logger);
        if (!observation.exists) {
          nodes.push({ ...base, state: 'absent', ready: false });
          continue;
        }
        const { readiness } = observation;
        nodes.push({
          ...base,
          state: readiness.ready ? 'ready' : 'degraded',
          ready: readiness.ready,
          ...(readiness.reason ? { reason: readiness.reason } : {}),
          ...(readiness.message ? { message: readiness.message } : {}),
          ...(observation.attributes ? { attributes: observation.attributes } : {}),
        });
      } catch (error) {
        nodes.push({ ...base, state: 'unknown', ready: false, reason: toError(error).message });
      }
    }

    return {
      environment: this.registry.config.environment,
      target,
      generatedAt: new Date().toISOString(),
      nodes,
      healthy: nodes.every((node) => node.ready),
    };
  }
}
