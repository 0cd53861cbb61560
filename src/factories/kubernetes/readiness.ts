/**
 * Readiness evaluators for live Kubernetes objects
 *
 * Live objects arrive as plain records from KubernetesObjectApi, so fields are
 * read through the type-guard helpers rather than the generated model classes.
 */

import type { ReadinessResult } from '../../core/types/resources.js';
import { arrayField, fieldAt, numberField, stringField } from '../../utils/type-guards.js';

export type ReadinessEvaluator = (live: Record<string, unknown>) => ReadinessResult;

export const namespaceReadiness: ReadinessEvaluator = (live) => {
  const phase = stringField(live, 'status', 'phase');
  return phase === 'Active'
    ? { ready: true }
    : { ready: false, reason: 'NamespaceNotActive', message: `Namespace phase is ${phase ?? 'unknown'}` };
};

export const secretReadiness: ReadinessEvaluator = () => ({ ready: true });

/**
 * A claim bound by WaitForFirstConsumer stays Pending until the pod that uses
 * it is scheduled, so only Lost counts against it
 */
export const persistentVolumeClaimReadiness: ReadinessEvaluator = (live) => {
  const phase = stringField(live, 'status', 'phase') ?? 'Pending';
  if (phase === 'Lost') {
    return {
      ready: false,
      terminal: true,
      severity: 'error',
      reason: 'ClaimLost',
      message: 'PersistentVolumeClaim lost its volume',
    };
  }
  return { ready: true, message: `Claim ${phase}` };
};

/**
 * Deployments and StatefulSets: the controller has seen the latest spec and
 * every desired replica is both updated and ready
 */
export function replicaReadiness(kind: string): ReadinessEvaluator {
  return (live) => {
    const desired = numberField(live, 'spec', 'replicas') ?? 1;
    const status = fieldAt(live, 'status');
    if (status === undefined) {
      return {
        ready: false,
        reason: 'StatusMissing',
        message: `${kind} status not available yet`,
        details: { desired },
      };
    }

    const generation = numberField(live, 'metadata', 'generation');
    const observedGeneration = numberField(status, 'observedGeneration');
    if (generation !== undefined && (observedGeneration ?? 0) < generation) {
      return {
        ready: false,
        reason: 'GenerationNotObserved',
        message: `${kind} generation ${generation} not observed yet (observed ${observedGeneration ?? 'none'})`,
        details: { generation, observedGeneration },
      };
    }

    const readyReplicas = numberField(status, 'readyReplicas') ?? 0;
    const updatedReplicas = numberField(status, 'updatedReplicas') ?? 0;
    if (readyReplicas === desired && updatedReplicas === desired) {
      return { ready: true, message: `${kind} has ${readyReplicas}/${desired} ready replicas` };
    }
    if (updatedReplicas !== desired) {
      return {
        ready: false,
        reason: 'RollingUpdateInProgress',
        message: `Waiting for rollout: ${updatedReplicas}/${desired} updated, ${readyReplicas}/${desired} ready`,
        details: { desired, readyReplicas, updatedReplicas },
      };
    }
    return {
      ready: false,
      reason: 'ReplicasNotReady',
      message: `Waiting for replicas: ${readyReplicas}/${desired} ready`,
      details: { desired, readyReplicas },
    };
  };
}

export const serviceReadiness: ReadinessEvaluator = (live) => {
  const type = stringField(live, 'spec', 'type') ?? 'ClusterIP';
  const clusterIP = stringField(live, 'spec', 'clusterIP');
  if (!clusterIP) {
    return { ready: false, reason: 'ClusterIPMissing', message: 'Service has no cluster IP yet' };
  }
  if (type === 'NodePort') {
    const allocated = arrayField(live, 'spec', 'ports').every(
      (port) => numberField(port, 'nodePort') !== undefined
    );
    if (!allocated) {
      return { ready: false, reason: 'NodePortMissing', message: 'NodePort not allocated yet' };
    }
  }
  return { ready: true, message: `${type} service at ${clusterIP}` };
};

export const ingressReadiness: ReadinessEvaluator = (live) => {
  const [first] = arrayField(live, 'status', 'loadBalancer', 'ingress');
  const address = stringField(first, 'ip') ?? stringField(first, 'hostname');
  return address
    ? { ready: true, message: `Ingress address ${address}` }
    : {
        ready: false,
        severity: 'warning',
        reason: 'AddressPending',
        message: 'Waiting for the load balancer to assign an address',
      };
};
