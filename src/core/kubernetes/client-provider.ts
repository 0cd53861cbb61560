/**
 * Kubernetes Client Provider
 *
 * Creates the KubeConfig lazily: the cluster has to exist and its
 * credentials have to be fetched before the first API call.
 */

import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';

export interface KubernetesClientConfig {
  /** kubeconfig context to select after loading */
  context?: string;
  /** Runs once before the kubeconfig is loaded, e.g. to fetch cluster credentials */
  prepare?: () => Promise<void>;
  /** Use this KubeConfig instead of loading the default one */
  kubeConfig?: k8s.KubeConfig;
}

export class KubernetesClientProvider {
  private logger = getComponentLogger('kubernetes-client-provider');
  private kubeConfig: Promise<k8s.KubeConfig> | undefined;

  constructor(private readonly config: KubernetesClientConfig = {}) {}

  getKubeConfig(): Promise<k8s.KubeConfig> {
    if (!this.kubeConfig) {
      this.kubeConfig = this.load();
      // A failed load is retried on the next call
      this.kubeConfig.catch(() => {
        this.kubeConfig = undefined;
      });
    }
    return this.kubeConfig;
  }

  async getKubernetesApi(): Promise<k8s.KubernetesObjectApi> {
    return k8s.KubernetesObjectApi.makeApiClient(await this.getKubeConfig());
  }

  async getCoreV1Api(): Promise<k8s.CoreV1Api> {
    return (await this.getKubeConfig()).makeApiClient(k8s.CoreV1Api);
  }

  private async load(): Promise<k8s.KubeConfig> {
    if (this.config.kubeConfig) {
      return this.config.kubeConfig;
    }

    await this.config.prepare?.();

    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();

    const { context } = this.config;
    if (context) {
      if (kc.getContexts().some((candidate) => candidate.name === context)) {
        kc.setCurrentContext(context);
      } else {
        this.logger.warn('Expected kubeconfig context not found; using the current context', {
          expected: context,
          current: kc.getCurrentContext(),
        });
      }
    }

    this.logger.debug('Loaded kubeconfig', { context: kc.getCurrentContext() });
    return kc;
  }
}
