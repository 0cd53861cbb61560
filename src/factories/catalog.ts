/**
 * Resource catalog of an n8n environment on GKE
 *
 * Declaration order is the tie-break between nodes with no ordering
 * constraint, so nodes are listed in the order an operator would create them.
 */

import type { ResourceNodeDefinition } from '../core/types/resources.js';
import { names } from './naming.js';

export const INFRA_NODES: readonly ResourceNodeDefinition[] = [
  {
    id: 'network',
    stage: 'infra',
    kind: 'network',
    description: 'Custom-mode VPC network',
    dependsOn: [],
    convergence: 'foundational',
    name: names.network,
  },
  {
    id: 'subnet',
    stage: 'infra',
    kind: 'subnetwork',
    description: 'Subnetwork with secondary ranges for pods and services',
    dependsOn: ['network'],
    convergence: 'foundational',
    name: names.subnet,
  },
  {
    id: 'firewall-internal',
    stage: 'infra',
    kind: 'firewall-rule',
    description: 'Allow traffic between nodes, pods and services',
    dependsOn: ['network'],
    convergence: 'foundational',
    name: names.firewallInternal,
  },
  {
    id: 'firewall-ssh',
    stage: 'infra',
    kind: 'firewall-rule',
    description: 'Allow SSH through IAP',
    dependsOn: ['network'],
    convergence: 'foundational',
    name: names.firewallSsh,
  },
  {
    id: 'firewall-health-check',
    stage: 'infra',
    kind: 'firewall-rule',
    description: 'Allow Google load balancer health checks',
    dependsOn: ['network'],
    convergence: 'foundational',
    name: names.firewallHealthCheck,
  },
  {
    id: 'router',
    stage: 'infra',
    kind: 'router',
    description: 'Cloud Router with Cloud NAT for private nodes',
    dependsOn: ['network', 'subnet'],
    convergence: 'foundational',
    name: names.router,
  },
  {
    id: 'cluster',
    stage: 'infra',
    kind: 'cluster',
    description: 'GKE cluster',
    dependsOn: ['subnet', 'router', 'firewall-internal'],
    convergence: 'foundational',
    deletionProtected: true,
    name: names.cluster,
  },
  {
    id: 'node-pool',
    stage: 'infra',
    kind: 'node-pool',
    description: 'Autoscaling node pool; ready when the cluster is healthy',
    dependsOn: ['cluster', 'firewall-ssh'],
    convergence: 'foundational',
    name: names.nodePool,
  },
];

export const APP_NODES: readonly ResourceNodeDefinition[] = [
  {
    id: 'static-ip',
    stage: 'app',
    kind: 'global-address',
    description: 'Global static IP for the ingress',
    dependsOn: ['cluster'],
    convergence: 'foundational',
    name: names.staticIp,
  },
  {
    id: 'namespace',
    stage: 'app',
    kind: 'namespace',
    description: 'Application namespace',
    dependsOn: ['node-pool'],
    convergence: 'foundational',
    name: names.namespace,
  },
  {
    id: 'postgres-secret',
    stage: 'app',
    kind: 'secret',
    description: 'PostgreSQL credentials',
    dependsOn: ['namespace'],
    convergence: 'foundational',
    name: names.postgresSecret,
  },
  {
    id: 'n8n-secret',
    stage: 'app',
    kind: 'secret',
    description: 'n8n encryption key',
    dependsOn: ['namespace'],
    convergence: 'foundational',
    name: names.n8nSecret,
  },
  {
    id: 'storage',
    stage: 'app',
    kind: 'persistent-volume-claim',
    description: 'n8n data volume',
    dependsOn: ['namespace'],
    convergence: 'foundational',
    stateBearing: true,
    name: names.storage,
  },
  {
    id: 'database',
    stage: 'app',
    kind: 'stateful-set',
    description: 'PostgreSQL statefulset',
    dependsOn: ['namespace', 'postgres-secret'],
    convergence: 'foundational',
    stateBearing: true,
    name: names.database,
  },
  {
    id: 'database-service',
    stage: 'app',
    kind: 'service',
    description: 'PostgreSQL service',
    dependsOn: ['database'],
    convergence: 'foundational',
    name: names.databaseService,
  },
  {
    id: 'workload',
    stage: 'app',
    kind: 'deployment',
    description: 'n8n deployment',
    dependsOn: ['postgres-secret', 'n8n-secret', 'storage', 'database-service'],
    convergence: 'foundational',
    name: names.workload,
  },
  {
    id: 'service',
    stage: 'app',
    kind: 'service',
    description: 'n8n NodePort service',
    dependsOn: ['workload'],
    convergence: 'foundational',
    name: names.service,
  },
  {
    id: 'ingress',
    stage: 'app',
    kind: 'ingress',
    description: 'GCE ingress bound to the static IP',
    dependsOn: ['service', 'static-ip', 'firewall-health-check'],
    convergence: 'best-effort',
    name: names.ingress,
  },
  {
    id: 'certificate',
    stage: 'app',
    kind: 'managed-certificate',
    description: 'Google-managed SSL certificate for the domain',
    dependsOn: ['static-ip'],
    convergence: 'best-effort',
    name: names.certificate,
  },
];

export const N8N_CATALOG: readonly ResourceNodeDefinition[] = [...INFRA_NODES, ...APP_NODES];
