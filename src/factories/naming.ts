/**
 * Resource naming registry
 *
 * Every cloud and Kubernetes name is derived here from the environment's
 * cluster name, so no other module builds names by hand.
 */

import type { RolloutConfig } from '../core/config/schema.js';

export const N8N_NAMESPACE = 'n8n';
export const NODE_POOL_NAME = 'n8n-node-pool';
export const DEFAULT_NODE_POOL_NAME = 'default-pool';

type Namer = (config: RolloutConfig) => string;

const network: Namer = (config) => `${config.clusterName}-n8n-vpc`;

export const names = {
  network,
  subnet: (config) => `${config.clusterName}-n8n-subnet`,
  firewallInternal: (config) => `${network(config)}-allow-internal`,
  firewallSsh: (config) => `${network(config)}-allow-ssh`,
  firewallHealthCheck: (config) => `${network(config)}-allow-health-check`,
  router: (config) => `${network(config)}-router`,
  nat: (config) => `${network(config)}-nat`,
  cluster: (config) => config.clusterName,
  nodePool: () => NODE_POOL_NAME,
  staticIp: (config) => `${config.clusterName}-n8n-static-ip`,
  certificate: (config) => `${config.clusterName}-n8n-ssl-cert`,
  namespace: () => N8N_NAMESPACE,
  postgresSecret: () => 'postgres-secret',
  n8nSecret: () => 'n8n-secret',
  storage: () => 'n8n-data',
  database: () => 'n8n-postgres',
  databaseService: () => 'n8n-postgres',
  workload: () => 'n8n-deployment',
  service: () => 'n8n-service',
  ingress: () => 'n8n-ingress',
} satisfies Record<string, Namer>;

/**
 * Zone for zonal clusters, region for regional ones
 */
export function clusterLocation(config: RolloutConfig): { flag: '--zone' | '--region'; value: string } {
  return config.topology === 'regional'
    ? { flag: '--region', value: config.region }
    : { flag: '--zone', value: config.zone };
}

/**
 * kubeconfig context written by `gcloud container clusters get-credentials`
 */
export function kubeContextName(config: RolloutConfig): string {
  return `gke_${config.projectId}_${clusterLocation(config).value}_${config.clusterName}`;
}
