/**
 * Handlers for nodes backed by a single Kubernetes manifest
 */

import type { Manifest, ManifestClient } from '../../core/kubernetes/api.js';
import type { NodeContext, ResourceHandler, ResourceHandlerMap } from '../../core/types/resources.js';
import {
  databaseManifest,
  databaseServiceManifest,
  ingressManifest,
  n8nSecretManifest,
  namespaceManifest,
  postgresSecretManifest,
  randomSecret,
  type SecretGenerator,
  serviceManifest,
  storageManifest,
  workloadManifest,
} from '../n8n/manifests.js';
import {
  ingressReadiness,
  namespaceReadiness,
  persistentVolumeClaimReadiness,
  type ReadinessEvaluator,
  replicaReadiness,
  secretReadiness,
  serviceReadiness,
} from './readiness.js';

export type ManifestBuilder = (ctx: NodeContext) => Manifest;

export interface ManifestHandlerOptions {
  /**
   * Never patch an existing object. Secrets hold generated values that a
   * re-apply must not rotate.
   */
  createOnly?: boolean;
}

function kubectlTarget(manifest: Manifest): string {
  const { name, namespace } = manifest.metadata;
  return `${manifest.kind.toLowerCase()} ${name}${namespace ? ` -n ${namespace}` : ''}`;
}

export function manifestHandler(
  client: ManifestClient,
  build: ManifestBuilder,
  evaluate: ReadinessEvaluator,
  options: ManifestHandlerOptions = {}
): ResourceHandler {
  const handler: ResourceHandler = {
    async observe(ctx) {
      const live = await client.read(build(ctx));
      return live ? { exists: true, readiness: evaluate(live) } : { exists: false };
    },
    async create(ctx) {
      await client.create(build(ctx));
    },
    async delete(ctx) {
      await client.delete(build(ctx));
    },
    remediation(ctx, action) {
      const manifest = build(ctx);
      return action === 'delete'
        ? `kubectl delete ${kubectlTarget(manifest)}`
        : `kubectl describe ${kubectlTarget(manifest)}`;
    },
  };

  if (!options.createOnly) {
    handler.update = async (ctx) => {
      await client.apply(build(ctx));
    };
  }
  return handler;
}

/**
 * Handlers for every app-stage node that lives in the cluster
 */
export function createKubernetesHandlers(
  client: ManifestClient,
  generate: SecretGenerator = randomSecret
): ResourceHandlerMap {
  return {
    namespace: manifestHandler(client, (ctx) => namespaceManifest(ctx.config), namespaceReadiness),
    'postgres-secret': manifestHandler(
      client,
      (ctx) => postgresSecretManifest(ctx.config, generate),
      secretReadiness,
      { createOnly: true }
    ),
    'n8n-secret': manifestHandler(client, (ctx) => n8nSecretManifest(ctx.config, generate), secretReadiness, {
      createOnly: true,
    }),
    storage: manifestHandler(client, (ctx) => storageManifest(ctx.config), persistentVolumeClaimReadiness),
    database: manifestHandler(client, (ctx) => databaseManifest(ctx.config), replicaReadiness('StatefulSet')),
    'database-service': manifestHandler(client, (ctx) => databaseServiceManifest(ctx.config), serviceReadiness),
    workload: manifestHandler(client, (ctx) => workloadManifest(ctx.config), replicaReadiness('Deployment')),
    service: manifestHandler(client, (ctx) => serviceManifest(ctx.config), serviceReadiness),
    ingress: manifestHandler(client, (ctx) => ingressManifest(ctx.config), ingressReadiness),
  };
}
