import type { ClusterHealthSnapshot } from '../../core/readiness/cluster-health.js';
import type { ClusterInspector } from '../../core/kubernetes/api.js';
import { NODE_POOL_NAME } from '../naming.js';
import type { GcloudClient } from './gcloud.js';

/**
 * Gather cluster, node pool, node and kube-system pod status. Kubernetes is
 * only queried once the cluster and pool are RUNNING.
 */
export async function collectClusterHealth(
  gcloud: GcloudClient,
  inspector: ClusterInspector
): Promise<ClusterHealthSnapshot> {
  const cluster = await gcloud.describeCluster();
  const pool = cluster ? await gcloud.describeNodePool(NODE_POOL_NAME) : undefined;
  const snapshot: ClusterHealthSnapshot = {
    clusterStatus: cluster?.status,
    nodePoolStatus: pool?.status,
    nodes: { total: 0, ready: 0 },
    systemPods: { total: 0, running: 0 },
  };

  if (cluster?.status !== 'RUNNING' || pool?.status !== 'RUNNING') {
    return snapshot;
  }

  const nodes = await inspector.listNodes();
  const pods = await inspector.listSystemPods();
  const notRunning = pods.filter((pod) => pod.phase !== 'Running' && pod.phase !== 'Succeeded');

  return {
    ...snapshot,
    nodes: {
      total: nodes.length,
      ready: nodes.filter((node) => node.ready).length,
      notReady: nodes.filter((node) => !node.ready).map((node) => node.name),
    },
    systemPods: {
      total: pods.length,
      running: pods.filter((pod) => pod.phase === 'Running').length,
      notRunning: notRunning.map((pod) => pod.name),
    },
  };
}
