/**
 * Cluster health evaluation
 *
 * A cluster is healthy only when the cluster and its node pool are RUNNING,
 * every reported node is Ready and at least 80% of kube-system pods are
 * Running.
 */

import type { ReadinessResult } from '../types/resources.js';

export const SYSTEM_POD_THRESHOLD_PERCENT = 80;

/** Statuses a cluster or node pool does not leave without intervention */
export const TERMINAL_GKE_STATUSES = ['ERROR', 'STOPPING'];

export interface ClusterHealthSnapshot {
  clusterStatus?: string | undefined;
  nodePoolStatus?: string | undefined;
  nodes: { total: number; ready: number; notReady?: string[] };
  systemPods: { total: number; running: number; notRunning?: string[] };
}

export function systemPodsMeetThreshold(running: number, total: number): boolean {
  return total > 0 && running * 100 >= total * SYSTEM_POD_THRESHOLD_PERCENT;
}

export function evaluateClusterHealth(snapshot: ClusterHealthSnapshot): ReadinessResult {
  const { clusterStatus, nodePoolStatus, nodes, systemPods } = snapshot;
  const details: Record<string, unknown> = {
    clusterStatus,
    nodePoolStatus,
    nodesReady: nodes.ready,
    nodesTotal: nodes.total,
    systemPodsRunning: systemPods.running,
    systemPodsTotal: systemPods.total,
  };

  if (clusterStatus !== 'RUNNING') {
    const terminal = clusterStatus !== undefined && TERMINAL_GKE_STATUSES.includes(clusterStatus);
    return {
      ready: false,
      terminal,
      severity: terminal ? 'error' : 'info',
      reason: `Cluster status is ${clusterStatus ?? 'unknown'}`,
      details,
    };
  }

  if (nodePoolStatus !== 'RUNNING') {
    const terminal = nodePoolStatus !== undefined && TERMINAL_GKE_STATUSES.includes(nodePoolStatus);
    return {
      ready: false,
      terminal,
      severity: terminal ? 'error' : 'info',
      reason: `Node pool status is ${nodePoolStatus ?? 'unknown'}`,
      details,
    };
  }

  if (nodes.total === 0) {
    return { ready: false, severity: 'warning', reason: 'No nodes reported by the cluster', details };
  }

  if (nodes.ready !== nodes.total) {
    const names = nodes.notReady?.length ? ` (not ready: ${nodes.notReady.join(', ')})` : '';
    return {
      ready: false,
      severity: 'warning',
      reason: `${nodes.ready}/${nodes.total} nodes Ready${names}`,
      details,
    };
  }

  if (!systemPodsMeetThreshold(systemPods.running, systemPods.total)) {
    const percent =
      systemPods.total > 0 ? Math.floor((systemPods.running * 100) / systemPods.total) : 0;
    return {
      ready: false,
      severity: 'error',
      reason: `${systemPods.running}/${systemPods.total} (${percent}%) kube-system pods Running; at least ${SYSTEM_POD_THRESHOLD_PERCENT}% required`,
      details,
    };
  }

  return {
    ready: true,
    message: `Cluster healthy: ${nodes.ready}/${nodes.total} nodes Ready, ${systemPods.running}/${systemPods.total} kube-system pods Running`,
    details,
  };
}
