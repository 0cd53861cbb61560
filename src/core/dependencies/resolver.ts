/**
 * Dependency Resolution Engine
 *
 * Builds the dependency graph of the resource catalog once, rejects invalid
 * catalogs at startup, and answers ordering questions for apply and destroy.
 */

import { ConfigurationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ResourceNodeDefinition, StageName } from '../types/resources.js';
import { DependencyGraph } from './graph.js';

export interface ExecutionPlan {
  levels: string[][]; // Nodes grouped by dependency level
  totalResources: number;
  maxParallelism: number;
}

export interface DestroyBlock {
  id: string;
  /** Live nodes outside the destroyed stages that still depend on this one */
  blockedBy: string[];
}

export interface DestroyPlan {
  stages: StageName[];
  /** Nodes to delete, dependents first; blocked nodes are excluded */
  order: ResourceNodeDefinition[];
  blocked: DestroyBlock[];
  /** Nodes outside the destroyed stages that depend on a node inside them */
  externalDependents: string[];
}

export class DependencyResolver {
  private logger = getComponentLogger('dependency-resolver');
  private readonly graph: DependencyGraph<ResourceNodeDefinition>;

  constructor(definitions: readonly ResourceNodeDefinition[]) {
    this.graph = this.buildDependencyGraph(definitions);
    this.validateNoCycles();
    this.validateStageLayering();
  }

  /**
   * Build the graph, failing on duplicate ids and unknown dependencies
   */
  private buildDependencyGraph(
    definitions: readonly ResourceNodeDefinition[]
  ): DependencyGraph<ResourceNodeDefinition> {
    const graph = new DependencyGraph<ResourceNodeDefinition>();

    for (const definition of definitions) {
      if (graph.hasNode(definition.id)) {
        throw new ConfigurationError(`Duplicate resource node id '${definition.id}'`, definition.id);
      }
      graph.addNode(definition.id, definition);
    }

    for (const definition of definitions) {
      for (const dependencyId of definition.dependsOn) {
        if (!graph.hasNode(dependencyId)) {
          throw new ConfigurationError(
            `Resource node '${definition.id}' depends on unknown node '${dependencyId}'`,
            definition.id,
            [`Declare '${dependencyId}' or remove it from '${definition.id}'.dependsOn`]
          );
        }
        graph.addEdge(definition.id, dependencyId);
      }
    }

    return graph;
  }

  /**
   * Validate that the dependency graph has no cycles
   */
  validateNoCycles(): void {
    // getTopologicalOrder throws CircularDependencyError naming the cycle
    this.graph.getTopologicalOrder();
  }

  /**
   * Infra nodes never depend on app nodes, and every app node sits on top of
   * at least one infra node.
   */
  private validateStageLayering(): void {
    for (const id of this.graph.getNodeIds()) {
      const definition = this.definition(id);
      const dependencies = Array.from(this.graph.getTransitiveDependencies([id])).map((dep) =>
        this.definition(dep)
      );

      if (definition.stage === 'infra') {
        const appDependency = dependencies.find((dep) => dep.stage === 'app');
        if (appDependency) {
          throw new ConfigurationError(
            `Infra node '${id}' depends on app node '${appDependency.id}'`,
            id
          );
        }
      } else if (!dependencies.some((dep) => dep.stage === 'infra')) {
        throw new ConfigurationError(
          `App node '${id}' does not depend on any infra node`,
          id,
          ['Add an infra node (for example the node pool) to its dependsOn']
        );
      }
    }
  }

  getGraph(): DependencyGraph<ResourceNodeDefinition> {
    return this.graph;
  }

  definition(id: string): ResourceNodeDefinition {
    const node = this.graph.getNode(id);
    if (!node) {
      throw new ConfigurationError(`Unknown resource node '${id}'`, id);
    }
    return node.value;
  }

  /**
   * All definitions in declaration order
   */
  definitions(): ResourceNodeDefinition[] {
    return this.graph.getNodeIds().map((id) => this.definition(id));
  }

  stageNodes(stage: StageName): ResourceNodeDefinition[] {
    return this.definitions().filter((definition) => definition.stage === stage);
  }

  /**
   * Nodes of the stage plus everything they transitively depend on,
   * dependencies first.
   */
  orderForApply(stage: StageName): ResourceNodeDefinition[] {
    const stageIds = this.stageNodes(stage).map((definition) => definition.id);
    const ids = new Set([...stageIds, ...this.graph.getTransitiveDependencies(stageIds)]);
    const order = this.graph.getSubgraph(ids).getTopologicalOrder();

    this.logger.debug('Computed apply order', { stage, order });
    return order.map((id) => this.definition(id));
  }

  /**
   * Nodes of the given stages in reverse dependency order.
   *
   * A node is blocked while a live node outside the stages depends on it,
   * directly or through other nodes; blocked nodes are reported rather than
   * ordered. Unrelated branches stay in the order.
   */
  orderForDestroy(
    stages: StageName | StageName[],
    isLive: (id: string) => boolean = () => true
  ): DestroyPlan {
    const stageList = Array.isArray(stages) ? stages : [stages];
    const targetIds = new Set(
      this.definitions()
        .filter((definition) => stageList.includes(definition.stage))
        .map((definition) => definition.id)
    );

    const dependents = this.graph.getTransitiveDependents(targetIds);
    const externalDependents = this.graph
      .getNodeIds()
      .filter((id) => !targetIds.has(id) && dependents.has(id));

    const blockers = new Map<string, string[]>();
    for (const externalId of externalDependents) {
      if (!isLive(externalId)) {
        continue;
      }
      for (const dependencyId of this.graph.getTransitiveDependencies([externalId])) {
        if (targetIds.has(dependencyId)) {
          blockers.set(dependencyId, [...(blockers.get(dependencyId) ?? []), externalId]);
        }
      }
    }

    const order = this.graph
      .getSubgraph(targetIds)
      .getTopologicalOrder()
      .reverse()
      .filter((id) => !blockers.has(id))
      .map((id) => this.definition(id));

    const blocked = this.graph
      .getNodeIds()
      .filter((id) => blockers.has(id))
      .map((id) => ({ id, blockedBy: blockers.get(id) ?? [] }));

    if (blocked.length > 0) {
      this.logger.warn('Destroy order has blocked nodes', {
        stages: stageList,
        blocked: blocked.map((block) => block.id),
      });
    }

    return { stages: stageList, order, blocked, externalDependents };
  }

  /**
   * Group nodes by dependency level; nodes in one level are independent of
   * each other
   */
  analyzeExecutionLevels(ids: Iterable<string>): ExecutionPlan {
    const subgraph = this.graph.getSubgraph(ids);
    const topologicalOrder = subgraph.getTopologicalOrder();
    const levels: string[][] = [];
    const processed = new Set<string>();

    while (processed.size < topologicalOrder.length) {
      const currentLevel = topologicalOrder.filter(
        (id) =>
          !processed.has(id) && subgraph.getDependencies(id).every((dep) => processed.has(dep))
      );

      if (currentLevel.length === 0) {
        throw new Error('Unable to determine execution order - possible circular dependency');
      }

      levels.push(currentLevel);
      currentLevel.forEach((id) => processed.add(id));
    }

    return {
      levels,
      totalResources: topologicalOrder.length,
      maxParallelism: levels.length > 0 ? Math.max(...levels.map((level) => level.length)) : 0,
    };
  }
}
