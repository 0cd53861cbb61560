/**
 * Kubernetes Module
 *
 * Client provider, manifest and cluster inspection clients, and error
 * handling utilities.
 */

export { KubernetesClientProvider, type KubernetesClientConfig } from './client-provider.js';

export {
  type ClusterInspector,
  KubernetesClusterInspector,
  KubernetesManifestApi,
  type Manifest,
  type ManifestClient,
  type ManifestHeader,
  type NodeSummary,
  type PodSummary,
} from './api.js';

export {
  formatKubernetesError,
  getErrorStatusCode,
  isConflictError,
  isNotFoundError,
} from './errors.js';
