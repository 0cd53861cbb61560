/**
 * Resource Registry
 *
 * Single source of truth for resource nodes: their definitions, canonical
 * names and the handler that talks to the owning API.
 */

import type { RolloutConfig } from '../config/schema.js';
import { DependencyResolver } from '../dependencies/index.js';
import { ConfigurationError } from '../errors.js';
import type { RolloutLogger } from '../logging/index.js';
import type {
  NodeContext,
  NodeObservation,
  ResourceHandler,
  ResourceHandlerMap,
  ResourceNodeDefinition,
  StageName,
} from '../types/resources.js';

export class ResourceRegistry {
  readonly resolver: DependencyResolver;

  constructor(
    definitions: readonly ResourceNodeDefinition[],
    private readonly handlers: ResourceHandlerMap,
    readonly config: RolloutConfig
  ) {
    this.resolver = new DependencyResolver(definitions);

    const missing = definitions.filter((definition) => !handlers[definition.id]);
    if (missing.length > 0) {
      throw new ConfigurationError(
        `No handler registered for resource nodes: ${missing.map((m) => m.id).join(', ')}`,
        missing[0]?.id
      );
    }
  }

  definition(id: string): ResourceNodeDefinition {
    return this.resolver.definition(id);
  }

  definitions(stage?: StageName): ResourceNodeDefinition[] {
    return stage ? this.resolver.stageNodes(stage) : this.resolver.definitions();
  }

  handler(id: string): ResourceHandler {
    const handler = this.handlers[id];
    if (!handler) {
      throw new ConfigurationError(`No handler registered for resource node '${id}'`, id);
    }
    return handler;
  }

  /**
   * Direct dependents of a node
   */
  getDependentsOf(id: string): string[] {
    return this.resolver.getGraph().getDependents(id);
  }

  /**
   * Canonical cloud or Kubernetes name of a node
   */
  nameOf(id: string): string {
    return this.definition(id).name(this.config);
  }

  context(id: string, logger: RolloutLogger): NodeContext {
    const node = this.definition(id);
    const name = node.name(this.config);
    return {
      node,
      name,
      config: this.config,
      logger: logger.child({ resourceId: id, resourceName: name }),
    };
  }

  observe(id: string, logger: RolloutLogger): Promise<NodeObservation> {
    return this.handler(id).observe(this.context(id, logger));
  }
}
