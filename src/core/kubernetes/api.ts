import type * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';
import type { KubernetesClientProvider } from './client-provider.js';
import { isRecord } from '../../utils/type-guards.js';
import { formatKubernetesError, isNotFoundError } from './errors.js';

export interface ManifestHeader {
  apiVersion: string;
  kind: string;
  metadata: { name: string; namespace?: string };
}

export interface Manifest extends ManifestHeader {
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  [field: string]: unknown;
}

/**
 * Read, apply and delete single manifests
 */
export interface ManifestClient {
  /** The live object, or undefined when it does not exist */
  read(header: ManifestHeader): Promise<Record<string, unknown> | undefined>;
  /** Patch when present, create when absent */
  apply(manifest: Manifest): Promise<void>;
  create(manifest: Manifest): Promise<void>;
  /** Returns false when the object was already gone */
  delete(header: ManifestHeader): Promise<boolean>;
}

export interface NodeSummary {
  name: string;
  ready: boolean;
}

export interface PodSummary {
  name: string;
  phase: string;
}

export interface ClusterInspector {
  listNodes(): Promise<NodeSummary[]>;
  listSystemPods(): Promise<PodSummary[]>;
}

function describe(header: ManifestHeader): string {
  const { name, namespace } = header.metadata;
  return `${header.kind}/${namespace ? `${namespace}/` : ''}${name}`;
}

/**
 * ManifestClient backed by KubernetesObjectApi
 */
export class KubernetesManifestApi implements ManifestClient {
  private logger = getComponentLogger('kubernetes-api');

  constructor(private readonly provider: KubernetesClientProvider) {}

  async read(header: ManifestHeader): Promise<Record<string, unknown> | undefined> {
    const api = await this.provider.getKubernetesApi();
    try {
      const body: unknown = await api.read<k8s.KubernetesObject>(header);
      return isRecord(body) ? body : undefined;
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw new Error(`Failed to read ${describe(header)}: ${formatKubernetesError(error)}`);
    }
  }

  async apply(manifest: Manifest): Promise<void> {
    const existing = await this.read(manifest);
    const api = await this.provider.getKubernetesApi();
    const resourceLogger = this.logger.child({ resource: describe(manifest) });

    try {
      if (existing) {
        // Patch only updates the fields we specify
        await api.patch<k8s.KubernetesObject>(manifest);
        resourceLogger.debug('Resource patched');
      } else {
        await api.create<k8s.KubernetesObject>(manifest);
        resourceLogger.debug('Resource created');
      }
    } catch (error) {
      throw new Error(`Failed to apply ${describe(manifest)}: ${formatKubernetesError(error)}`);
    }
  }

  async create(manifest: Manifest): Promise<void> {
    const api = await this.provider.getKubernetesApi();
    try {
      await api.create<k8s.KubernetesObject>(manifest);
    } catch (error) {
      throw new Error(`Failed to create ${describe(manifest)}: ${formatKubernetesError(error)}`);
    }
  }

  async delete(header: ManifestHeader): Promise<boolean> {
    const api = await this.provider.getKubernetesApi();
    try {
      await api.delete(header);
      this.logger.debug('Resource deleted', { resource: describe(header) });
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.debug('Resource not found during deletion, assuming already deleted', {
          resource: describe(header),
        });
        return false;
      }
      throw new Error(`Failed to delete ${describe(header)}: ${formatKubernetesError(error)}`);
    }
  }
}

/**
 * Node and kube-system pod listings from CoreV1Api
 */
export class KubernetesClusterInspector implements ClusterInspector {
  constructor(private readonly provider: KubernetesClientProvider) {}

  async listNodes(): Promise<NodeSummary[]> {
    const api = await this.provider.getCoreV1Api();
    const list = await api.listNode();
    return list.items.map((node) => ({
      name: node.metadata?.name ?? '',
      ready:
        node.status?.conditions?.some(
          (condition) => condition.type === 'Ready' && condition.status === 'True'
        ) ?? false,
    }));
  }

  async listSystemPods(): Promise<PodSummary[]> {
    const api = await this.provider.getCoreV1Api();
    const list = await api.listNamespacedPod({ namespace: 'kube-system' });
    return list.items.map((pod) => ({
      name: pod.metadata?.name ?? '',
      phase: pod.status?.phase ?? 'Unknown',
    }));
  }
}
