/**
 * Dependency-related types
 */

/**
 * Represents a node in the dependency graph
 */
export interface DependencyNode<T> {
  id: string;
  value: T;
  /** Position in declaration order, used to break ordering ties */
  index: number;
  dependencies: Set<string>; // Nodes this node depends on
  dependents: Set<string>; // Nodes that depend on this node
}
