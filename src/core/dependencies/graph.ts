/**
 * Dependency Graph Data Structure
 *
 * Represents dependencies between resource nodes and provides traversal and
 * deterministic topological sorting.
 */

import { formatCircularDependencyError } from '../errors.js';
import type { DependencyNode } from '../types/dependencies.js';

export class DependencyGraph<T> {
  private nodes = new Map<string, DependencyNode<T>>();

  /**
   * Add a node to the dependency graph. Insertion order is the declaration
   * order used to break ties.
   */
  addNode(id: string, value: T): void {
    if (this.nodes.has(id)) {
      throw new Error(`Node with id '${id}' already exists in dependency graph`);
    }

    this.nodes.set(id, {
      id,
      value,
      index: this.nodes.size,
      dependencies: new Set(),
      dependents: new Set(),
    });
  }

  /**
   * Add a dependency edge from dependent to dependency
   * @param dependentId - The node that depends on another
   * @param dependencyId - The node being depended upon
   */
  addEdge(dependentId: string, dependencyId: string): void {
    const dependent = this.nodes.get(dependentId);
    const dependency = this.nodes.get(dependencyId);

    if (!dependent) {
      throw new Error(`Dependent node '${dependentId}' not found in graph`);
    }
    if (!dependency) {
      throw new Error(`Dependency node '${dependencyId}' not found in graph`);
    }

    dependent.dependencies.add(dependencyId);
    dependency.dependents.add(dependentId);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): DependencyNode<T> | undefined {
    return this.nodes.get(id);
  }

  /**
   * Node ids in declaration order
   */
  getNodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  get size(): number {
    return this.nodes.size;
  }

  getDependencies(id: string): string[] {
    const node = this.nodes.get(id);
    return node ? Array.from(node.dependencies) : [];
  }

  getDependents(id: string): string[] {
    const node = this.nodes.get(id);
    return node ? Array.from(node.dependents) : [];
  }

  /**
   * Every node reachable by following dependency edges, excluding the start nodes
   * unless one depends on another
   */
  getTransitiveDependencies(ids: Iterable<string>): Set<string> {
    return this.walk(ids, (node) => node.dependencies);
  }

  /**
   * Every node that reaches one of the given nodes by dependency edges
   */
  getTransitiveDependents(ids: Iterable<string>): Set<string> {
    return this.walk(ids, (node) => node.dependents);
  }

  private walk(ids: Iterable<string>, next: (node: DependencyNode<T>) => Set<string>): Set<string> {
    const seen = new Set<string>();
    const stack = Array.from(ids);
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.nodes.get(id);
      if (!node) continue;
      for (const neighbour of next(node)) {
        if (!seen.has(neighbour)) {
          seen.add(neighbour);
          stack.push(neighbour);
        }
      }
    }
    return seen;
  }

  /**
   * Find cycles in the graph
   */
  findCycles(): string[][] {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const cycles: string[][] = [];

    const dfs = (nodeId: string, path: string[]): void => {
      if (recursionStack.has(nodeId)) {
        const cycleStart = path.indexOf(nodeId);
        cycles.push(path.slice(cycleStart));
        return;
      }

      if (visited.has(nodeId)) {
        return;
      }

      visited.add(nodeId);
      recursionStack.add(nodeId);
      path.push(nodeId);

      const node = this.nodes.get(nodeId);
      if (node) {
        for (const dependencyId of node.dependencies) {
          dfs(dependencyId, [...path]);
        }
      }

      recursionStack.delete(nodeId);
      path.pop();
    };

    for (const nodeId of this.nodes.keys()) {
      if (!visited.has(nodeId)) {
        dfs(nodeId, []);
      }
    }

    return cycles;
  }

  /**
   * Get topological ordering of nodes (dependencies first).
   *
   * Among nodes whose dependencies are all satisfied, the one declared first
   * is emitted first, so the order is reproducible.
   * Throws CircularDependencyError if cycles are detected.
   */
  getTopologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    const ready: DependencyNode<T>[] = [];
    const result: string[] = [];

    for (const [nodeId, node] of this.nodes) {
      inDegree.set(nodeId, node.dependencies.size);
      if (node.dependencies.size === 0) {
        ready.push(node);
      }
    }

    while (ready.length > 0) {
      ready.sort((a, b) => a.index - b.index);
      const node = ready.shift();
      if (!node) break;
      result.push(node.id);

      for (const dependentId of node.dependents) {
        const currentInDegree = inDegree.get(dependentId);
        if (currentInDegree === undefined) continue;
        const newInDegree = currentInDegree - 1;
        inDegree.set(dependentId, newInDegree);

        const dependent = this.nodes.get(dependentId);
        if (newInDegree === 0 && dependent) {
          ready.push(dependent);
        }
      }
    }

    if (result.length !== this.nodes.size) {
      throw formatCircularDependencyError(this.findCycles()[0] ?? []);
    }

    return result;
  }

  /**
   * Get a subgraph containing only the specified nodes and their relationships.
   * Declaration order is preserved.
   */
  getSubgraph(nodeIds: Iterable<string>): DependencyGraph<T> {
    const subgraph = new DependencyGraph<T>();
    const nodeIdSet = new Set(nodeIds);

    for (const [nodeId, node] of this.nodes) {
      if (nodeIdSet.has(nodeId)) {
        subgraph.addNode(nodeId, node.value);
      }
    }

    for (const nodeId of subgraph.getNodeIds()) {
      const node = this.nodes.get(nodeId);
      if (!node) continue;
      for (const dependencyId of node.dependencies) {
        if (nodeIdSet.has(dependencyId)) {
          subgraph.addEdge(nodeId, dependencyId);
        }
      }
    }

    return subgraph;
  }
}
