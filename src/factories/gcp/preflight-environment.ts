/**
 * What the standard checks need to know about the local machine and the
 * target project
 */

import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import type { ClusterInspector } from '../../core/kubernetes/api.js';
import type { ClusterHealthSnapshot } from '../../core/readiness/cluster-health.js';
import { collectClusterHealth } from './cluster-health.js';
import type { GcloudClient } from './gcloud.js';
import type {
  ClusterDescription,
  GlobalAddressDescription,
  ProjectDescription,
  QuotaDescription,
  SslCertificateDescription,
  SubnetworkDescription,
} from './schemas.js';

export interface PreflightEnvironment {
  /** Absolute path of an executable on PATH */
  resolveBinary(name: string): Promise<string | undefined>;
  activeAccount(): Promise<string | undefined>;
  describeProject(): Promise<ProjectDescription | undefined>;
  listEnabledApis(): Promise<string[]>;
  enableApis(apis: readonly string[]): Promise<void>;
  machineTypeAvailable(machineType: string, zone: string): Promise<boolean>;
  /** vCPUs of one machine, undefined when the type is not offered */
  machineTypeCpus(machineType: string, zone: string): Promise<number | undefined>;
  regionQuotas(): Promise<QuotaDescription[]>;
  describeSubnetwork(name: string): Promise<SubnetworkDescription | undefined>;
  describeCluster(): Promise<ClusterDescription | undefined>;
  describeGlobalAddress(name: string): Promise<GlobalAddressDescription | undefined>;
  describeSslCertificate(name: string): Promise<SslCertificateDescription | undefined>;
  clusterHealth(): Promise<ClusterHealthSnapshot>;
  /** GET without following redirects; a transport failure is returned, not thrown */
  requestEndpoint(url: string): Promise<EndpointResponse>;
}

export type EndpointResponse = { status: number } | { error: string };

const ENDPOINT_TIMEOUT_MS = 10_000;

export class GcloudPreflightEnvironment implements PreflightEnvironment {
  constructor(
    private readonly gcloud: GcloudClient,
    private readonly inspector: ClusterInspector,
    private readonly path: string = process.env.PATH ?? ''
  ) {}

  async resolveBinary(name: string): Promise<string | undefined> {
    for (const directory of this.path.split(delimiter).filter(Boolean)) {
      const candidate = join(directory, name);
      const executable = await access(candidate, constants.X_OK).then(
        () => true,
        () => false
      );
      if (executable) {
        return candidate;
      }
    }
    return undefined;
  }

  async activeAccount(): Promise<string | undefined> {
    return (await this.gcloud.activeAccounts())[0];
  }

  describeProject(): Promise<ProjectDescription | undefined> {
    return this.gcloud.describeProject();
  }

  listEnabledApis(): Promise<string[]> {
    return this.gcloud.listEnabledApis();
  }

  enableApis(apis: readonly string[]): Promise<void> {
    return this.gcloud.enableApis(apis);
  }

  machineTypeAvailable(machineType: string, zone: string): Promise<boolean> {
    return this.gcloud.machineTypeAvailable(machineType, zone);
  }

  async machineTypeCpus(machineType: string, zone: string): Promise<number | undefined> {
    return (await this.gcloud.describeMachineType(machineType, zone))?.guestCpus;
  }

  async regionQuotas(): Promise<QuotaDescription[]> {
    return (await this.gcloud.describeRegion())?.quotas ?? [];
  }

  describeSubnetwork(name: string): Promise<SubnetworkDescription | undefined> {
    return this.gcloud.describeSubnetwork(name);
  }

  describeCluster(): Promise<ClusterDescription | undefined> {
    return this.gcloud.describeCluster();
  }

  describeGlobalAddress(name: string): Promise<GlobalAddressDescription | undefined> {
    return this.gcloud.describeGlobalAddress(name);
  }

  describeSslCertificate(name: string): Promise<SslCertificateDescription | undefined> {
    return this.gcloud.describeSslCertificate(name);
  }

  clusterHealth(): Promise<ClusterHealthSnapshot> {
    return collectClusterHealth(this.gcloud, this.inspector);
  }

  async requestEndpoint(url: string): Promise<EndpointResponse> {
    try {
      const response = await fetch(url, { redirect: 'manual', signal: AbortSignal.timeout(ENDPOINT_TIMEOUT_MS) });
      return { status: response.status };
    } catch (error) {
      return { error: error instanceof Error ? error.message : String(error) };
    }
  }
}
