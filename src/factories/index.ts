/**
 * Factories Index
 *
 * The n8n-on-GKE catalog and everything that backs it: gcloud handlers and
 * checks for the cloud side, manifest handlers for the cluster side.
 */

import type { RolloutConfig } from '../core/config/schema.js';
import { KubernetesClientProvider } from '../core/kubernetes/client-provider.js';
import { KubernetesClusterInspector, KubernetesManifestApi } from '../core/kubernetes/api.js';
import type { OrchestratorRuntime } from '../core/orchestrator.js';
import { N8N_CATALOG } from './catalog.js';
import { GkeCheckProvider } from './gcp/checks.js';
import { type CommandRunner, ExecFileCommandRunner } from './gcp/command-runner.js';
import { GcloudClient } from './gcp/gcloud.js';
import { createGcpHandlers } from './gcp/handlers.js';
import { GcloudPreflightEnvironment } from './gcp/preflight-environment.js';
import { createKubernetesHandlers } from './kubernetes/handlers.js';
import { kubeContextName } from './naming.js';

export { APP_NODES, INFRA_NODES, N8N_CATALOG } from './catalog.js';
export * from './gcp/index.js';
export {
  createKubernetesHandlers,
  type ManifestBuilder,
  manifestHandler,
  type ManifestHandlerOptions,
} from './kubernetes/handlers.js';
export * from './kubernetes/readiness.js';
export * from './n8n/manifests.js';
export * from './naming.js';

export interface RuntimeOptions {
  /** Defaults to running gcloud through execFile */
  runner?: CommandRunner;
  /** Stops in-flight gcloud calls */
  signal?: AbortSignal;
}

/**
 * Wire the real collaborators of one environment
 */
export function createRuntime(config: RolloutConfig, options: RuntimeOptions = {}): OrchestratorRuntime {
  const gcloud = new GcloudClient(
    options.runner ?? new ExecFileCommandRunner(),
    config,
    options.signal ? { signal: options.signal } : {}
  );
  const provider = new KubernetesClientProvider({
    context: kubeContextName(config),
    prepare: () => gcloud.getCredentials(),
  });
  const inspector = new KubernetesClusterInspector(provider);
  const manifests = new KubernetesManifestApi(provider);

  return {
    definitions: N8N_CATALOG,
    handlers: {
      ...createGcpHandlers(gcloud, inspector),
      ...createKubernetesHandlers(manifests),
    },
    checks: new GkeCheckProvider(new GcloudPreflightEnvironment(gcloud, inspector)),
  };
}
