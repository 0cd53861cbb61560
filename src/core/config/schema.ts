/**
 * Environment configuration schema
 */

import { type } from 'arktype';

export const ContainerResourcesSchema = type({
  cpuRequest: 'string > 0',
  cpuLimit: 'string > 0',
  memoryRequest: 'string > 0',
  memoryLimit: 'string > 0',
});

export const RolloutConfigSchema = type({
  environment: 'string > 0',
  projectId: 'string > 0',
  region: 'string > 0',
  zone: 'string > 0',
  clusterName: 'string > 0',
  topology: "'zonal' | 'regional'",
  deletionProtection: 'boolean',
  network: {
    subnetCidr: 'string > 0',
    podsCidr: 'string > 0',
    servicesCidr: 'string > 0',
    sshSourceRanges: 'string[]',
    healthCheckSourceRanges: 'string[]',
  },
  cluster: {
    machineType: 'string > 0',
    diskSizeGb: '20 <= number.integer <= 500',
    diskType: "'pd-standard' | 'pd-balanced' | 'pd-ssd'",
    initialNodeCount: '1 <= number.integer <= 10',
    minNodes: '1 <= number.integer <= 10',
    maxNodes: '1 <= number.integer <= 10',
    preemptible: 'boolean',
    releaseChannel: "'RAPID' | 'REGULAR' | 'STABLE'",
  },
  app: {
    domain: 'string > 0',
    n8nImage: 'string > 0',
    postgresImage: 'string > 0',
    replicas: '1 <= number.integer <= 5',
    storageGb: '1 <= number.integer <= 500',
    postgresStorageGb: '1 <= number.integer <= 500',
    timezone: 'string > 0',
    resources: {
      n8n: ContainerResourcesSchema,
      postgres: ContainerResourcesSchema,
    },
  },
  readiness: {
    initialDelayMs: 'number > 0',
    maxDelayMs: 'number > 0',
    backoffMultiplier: 'number >= 1',
    timeouts: 'Record<string, number>',
  },
});

export type RolloutConfig = typeof RolloutConfigSchema.infer;

export type ContainerResources = typeof ContainerResourcesSchema.infer;

/**
 * Shape of config/environments.yaml before merging
 */
export const EnvironmentTableSchema = type({
  defaults: 'object',
  environments: 'Record<string, object>',
});
