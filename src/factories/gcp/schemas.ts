/**
 * Shapes of the gcloud `--format=json` output this package reads.
 * Unknown keys are ignored.
 */

import { type } from 'arktype';

export const ActiveAccountsSchema = type({
  account: 'string',
  'status?': 'string',
}).array();

export const ProjectSchema = type({
  projectId: 'string',
  'lifecycleState?': 'string',
  'projectNumber?': 'string',
});

export const EnabledServicesSchema = type({
  name: 'string',
  'config?': { name: 'string' },
}).array();

export const MachineTypeSchema = type({
  name: 'string',
  'guestCpus?': 'number',
  'memoryMb?': 'number',
});

export const RegionSchema = type({
  name: 'string',
  'quotas?': type({ metric: 'string', limit: 'number', usage: 'number' }).array(),
});

export const NetworkSchema = type({
  name: 'string',
  'autoCreateSubnetworks?': 'boolean',
});

export const SubnetworkSchema = type({
  name: 'string',
  ipCidrRange: 'string',
  network: 'string',
  'secondaryIpRanges?': type({ rangeName: 'string', ipCidrRange: 'string' }).array(),
});

export const FirewallSchema = type({
  name: 'string',
  network: 'string',
  'sourceRanges?': 'string[]',
});

export const RouterSchema = type({
  name: 'string',
  'nats?': type({ name: 'string' }).array(),
});

export const ClusterSchema = type({
  name: 'string',
  status: 'string',
  'statusMessage?': 'string',
  'deletionProtection?': 'boolean',
  'endpoint?': 'string',
  'currentNodeCount?': 'number',
});

export const NodePoolSchema = type({
  name: 'string',
  status: 'string',
  'initialNodeCount?': 'number',
});

export const NodePoolListSchema = NodePoolSchema.array();

export const GlobalAddressSchema = type({
  name: 'string',
  'address?': 'string',
  'addressType?': 'string',
  'status?': 'string',
});

export const SslCertificateSchema = type({
  name: 'string',
  'type?': 'string',
  'managed?': {
    'status?': 'string',
    'domains?': 'string[]',
    'domainStatus?': 'Record<string, string>',
  },
});

export type ProjectDescription = typeof ProjectSchema.infer;
export type MachineTypeDescription = typeof MachineTypeSchema.infer;
export type RegionDescription = typeof RegionSchema.infer;
export type QuotaDescription = NonNullable<RegionDescription['quotas']>[number];
export type NetworkDescription = typeof NetworkSchema.infer;
export type SubnetworkDescription = typeof SubnetworkSchema.infer;
export type FirewallDescription = typeof FirewallSchema.infer;
export type RouterDescription = typeof RouterSchema.infer;
export type ClusterDescription = typeof ClusterSchema.infer;
export type NodePoolDescription = typeof NodePoolSchema.infer;
export type GlobalAddressDescription = typeof GlobalAddressSchema.infer;
export type SslCertificateDescription = typeof SslCertificateSchema.infer;
