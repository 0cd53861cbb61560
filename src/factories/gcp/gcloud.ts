/**
 * gcloud client
 *
 * Thin wrapper over the gcloud CLI. Reads use `--format=json` and validate
 * their output; "not found" reads return undefined. Creates tolerate
 * "already exists" and deletes tolerate "not found", so every mutation is
 * idempotent. Every call is bounded by a timeout and stops on the run's
 * abort signal.
 */

import { type ArkErrors, type } from 'arktype';
import type { RolloutConfig } from '../../core/config/schema.js';
import { CommandExecutionError } from '../../core/errors.js';
import { getComponentLogger } from '../../core/logging/index.js';
import { clusterLocation, DEFAULT_NODE_POOL_NAME } from '../naming.js';
import { type CommandOptions, type CommandRunner, commandFailure } from './command-runner.js';
import {
  ActiveAccountsSchema,
  type ClusterDescription,
  ClusterSchema,
  EnabledServicesSchema,
  type FirewallDescription,
  FirewallSchema,
  type GlobalAddressDescription,
  GlobalAddressSchema,
  type MachineTypeDescription,
  MachineTypeSchema,
  type NetworkDescription,
  NetworkSchema,
  type NodePoolDescription,
  NodePoolListSchema,
  NodePoolSchema,
  type ProjectDescription,
  ProjectSchema,
  type RegionDescription,
  RegionSchema,
  type RouterDescription,
  RouterSchema,
  type SslCertificateDescription,
  SslCertificateSchema,
  type SubnetworkDescription,
  SubnetworkSchema,
} from './schemas.js';

export const GCLOUD = 'gcloud';

export const DEFAULT_COMMAND_TIMEOUT_MS = 10 * 60 * 1000;

const NOT_FOUND = /not found|NOT_FOUND|code=404/i;
const ALREADY_EXISTS = /already exists|ALREADY_EXISTS|code=409/i;

export interface FirewallSpec {
  name: string;
  network: string;
  allow: string;
  sourceRanges: string[];
  description: string;
}

export interface GcloudClientOptions {
  /** Upper bound on a single gcloud invocation */
  commandTimeoutMs?: number;
  signal?: AbortSignal;
}

export class GcloudClient {
  private logger = getComponentLogger('gcloud');

  constructor(
    private readonly runner: CommandRunner,
    private readonly config: RolloutConfig,
    private readonly options: GcloudClientOptions = {}
  ) {}

  private get project(): string {
    return `--project=${this.config.projectId}`;
  }

  private get location(): string {
    const { flag, value } = clusterLocation(this.config);
    return `${flag}=${value}`;
  }

  private get regionFlag(): string {
    return `--region=${this.config.region}`;
  }

  // Reads

  async activeAccounts(): Promise<string[]> {
    const raw = await this.readJson(['auth', 'list', '--filter=status:ACTIVE'], { project: false });
    return this.parse(ActiveAccountsSchema, raw ?? [], 'auth list').map((entry) => entry.account);
  }

  async describeProject(): Promise<ProjectDescription | undefined> {
    const raw = await this.readJson(['projects', 'describe', this.config.projectId], { project: false });
    return raw === undefined ? undefined : this.parse(ProjectSchema, raw, 'project');
  }

  async listEnabledApis(): Promise<string[]> {
    const raw = await this.readJson(['services', 'list', '--enabled']);
    return this.parse(EnabledServicesSchema, raw ?? [], 'services list').map(
      (service) => service.config?.name ?? service.name.split('/').pop() ?? service.name
    );
  }

  async describeMachineType(machineType: string, zone: string): Promise<MachineTypeDescription | undefined> {
    const raw = await this.readJson(['compute', 'machine-types', 'describe', machineType, `--zone=${zone}`]);
    return raw === undefined ? undefined : this.parse(MachineTypeSchema, raw, 'machine type');
  }

  async machineTypeAvailable(machineType: string, zone: string): Promise<boolean> {
    return (await this.describeMachineType(machineType, zone))?.name === machineType;
  }

  /**
   * Regional Compute Engine quotas (CPUS, INSTANCES, DISKS_TOTAL_GB, SSD_TOTAL_GB, ...)
   */
  async describeRegion(): Promise<RegionDescription | undefined> {
    const raw = await this.readJson(['compute', 'regions', 'describe', this.config.region]);
    return raw === undefined ? undefined : this.parse(RegionSchema, raw, 'region');
  }

  async describeNetwork(name: string): Promise<NetworkDescription | undefined> {
    const raw = await this.readJson(['compute', 'networks', 'describe', name]);
    return raw === undefined ? undefined : this.parse(NetworkSchema, raw, 'network');
  }

  async describeSubnetwork(name: string): Promise<SubnetworkDescription | undefined> {
    const raw = await this.readJson(['compute', 'networks', 'subnets', 'describe', name, this.regionFlag]);
    return raw === undefined ? undefined : this.parse(SubnetworkSchema, raw, 'subnetwork');
  }

  async describeFirewall(name: string): Promise<FirewallDescription | undefined> {
    const raw = await this.readJson(['compute', 'firewall-rules', 'describe', name]);
    return raw === undefined ? undefined : this.parse(FirewallSchema, raw, 'firewall rule');
  }

  async describeRouter(name: string): Promise<RouterDescription | undefined> {
    const raw = await this.readJson(['compute', 'routers', 'describe', name, this.regionFlag]);
    return raw === undefined ? undefined : this.parse(RouterSchema, raw, 'router');
  }

  async describeCluster(): Promise<ClusterDescription | undefined> {
    const raw = await this.readJson(['container', 'clusters', 'describe', this.config.clusterName, this.location]);
    return raw === undefined ? undefined : this.parse(ClusterSchema, raw, 'cluster');
  }

  async describeNodePool(name: string): Promise<NodePoolDescription | undefined> {
    const raw = await this.readJson([
      'container',
      'node-pools',
      'describe',
      name,
      `--cluster=${this.config.clusterName}`,
      this.location,
    ]);
    return raw === undefined ? undefined : this.parse(NodePoolSchema, raw, 'node pool');
  }

  async listNodePools(): Promise<NodePoolDescription[]> {
    const raw = await this.readJson([
      'container',
      'node-pools',
      'list',
      `--cluster=${this.config.clusterName}`,
      this.location,
    ]);
    return raw === undefined ? [] : this.parse(NodePoolListSchema, raw, 'node pool list');
  }

  async describeGlobalAddress(name: string): Promise<GlobalAddressDescription | undefined> {
    const raw = await this.readJson(['compute', 'addresses', 'describe', name, '--global']);
    return raw === undefined ? undefined : this.parse(GlobalAddressSchema, raw, 'address');
  }

  async describeSslCertificate(name: string): Promise<SslCertificateDescription | undefined> {
    const raw = await this.readJson(['compute', 'ssl-certificates', 'describe', name, '--global']);
    return raw === undefined ? undefined : this.parse(SslCertificateSchema, raw, 'SSL certificate');
  }

  // Mutations

  async enableApis(apis: readonly string[]): Promise<void> {
    await this.mutate(['services', 'enable', ...apis]);
  }

  async createNetwork(name: string): Promise<void> {
    await this.create(['compute', 'networks', 'create', name, '--subnet-mode=custom']);
  }

  async deleteNetwork(name: string): Promise<void> {
    await this.delete(['compute', 'networks', 'delete', name]);
  }

  async createSubnetwork(name: string, network: string): Promise<void> {
    const { subnetCidr, podsCidr, servicesCidr } = this.config.network;
    await this.create([
      'compute',
      'networks',
      'subnets',
      'create',
      name,
      `--network=${network}`,
      this.regionFlag,
      `--range=${subnetCidr}`,
      `--secondary-range=pods=${podsCidr},services=${servicesCidr}`,
      '--enable-private-ip-google-access',
    ]);
  }

  async deleteSubnetwork(name: string): Promise<void> {
    await this.delete(['compute', 'networks', 'subnets', 'delete', name, this.regionFlag]);
  }

  async createFirewall(spec: FirewallSpec): Promise<void> {
    await this.create([
      'compute',
      'firewall-rules',
      'create',
      spec.name,
      `--network=${spec.network}`,
      '--direction=INGRESS',
      `--allow=${spec.allow}`,
      `--source-ranges=${spec.sourceRanges.join(',')}`,
      `--description=${spec.description}`,
    ]);
  }

  async deleteFirewall(name: string): Promise<void> {
    await this.delete(['compute', 'firewall-rules', 'delete', name]);
  }

  async createRouter(name: string, network: string): Promise<void> {
    await this.create(['compute', 'routers', 'create', name, `--network=${network}`, this.regionFlag]);
  }

  async createNat(name: string, router: string): Promise<void> {
    await this.create([
      'compute',
      'routers',
      'nats',
      'create',
      name,
      `--router=${router}`,
      this.regionFlag,
      '--auto-allocate-nat-external-ips',
      '--nat-all-subnet-ip-ranges',
    ]);
  }

  async deleteRouter(name: string): Promise<void> {
    await this.delete(['compute', 'routers', 'delete', name, this.regionFlag]);
  }

  /**
   * Starts cluster creation and returns; the cluster converges through describe
   */
  async createCluster(network: string, subnetwork: string): Promise<void> {
    const { cluster } = this.config;
    await this.create([
      'container',
      'clusters',
      'create',
      this.config.clusterName,
      this.location,
      `--network=${network}`,
      `--subnetwork=${subnetwork}`,
      '--enable-ip-alias',
      '--cluster-secondary-range-name=pods',
      '--services-secondary-range-name=services',
      `--release-channel=${cluster.releaseChannel.toLowerCase()}`,
      '--num-nodes=1',
      `--machine-type=${cluster.machineType}`,
      `--disk-size=${cluster.diskSizeGb}`,
      `--disk-type=${cluster.diskType}`,
      `--workload-pool=${this.config.projectId}.svc.id.goog`,
      this.config.deletionProtection ? '--deletion-protection' : '--no-deletion-protection',
      '--async',
    ]);
  }

  async deleteCluster(): Promise<void> {
    await this.delete(['container', 'clusters', 'delete', this.config.clusterName, this.location, '--async']);
  }

  async clearClusterDeletionProtection(): Promise<void> {
    await this.mutate([
      'container',
      'clusters',
      'update',
      this.config.clusterName,
      this.location,
      '--no-deletion-protection',
    ]);
  }

  /**
   * Starts creating the autoscaling pool; it converges through describe
   */
  async createNodePool(name: string): Promise<void> {
    const { cluster } = this.config;
    await this.create([
      'container',
      'node-pools',
      'create',
      name,
      `--cluster=${this.config.clusterName}`,
      this.location,
      `--machine-type=${cluster.machineType}`,
      `--disk-size=${cluster.diskSizeGb}`,
      `--disk-type=${cluster.diskType}`,
      `--num-nodes=${cluster.initialNodeCount}`,
      '--enable-autoscaling',
      `--min-nodes=${cluster.minNodes}`,
      `--max-nodes=${cluster.maxNodes}`,
      '--enable-autorepair',
      '--enable-autoupgrade',
      ...(cluster.preemptible ? ['--preemptible'] : []),
      '--async',
    ]);
  }

  async deleteNodePool(name: string, options: { async?: boolean } = {}): Promise<void> {
    await this.delete([
      'container',
      'node-pools',
      'delete',
      name,
      `--cluster=${this.config.clusterName}`,
      this.location,
      ...(options.async ? ['--async'] : []),
    ]);
  }

  /**
   * Deletes the pool GKE creates with the cluster. GKE runs one operation per
   * cluster at a time, so nothing is issued while any pool is changing.
   * Returns whether a delete was issued.
   */
  async removeDefaultNodePool(options: { async?: boolean } = {}): Promise<boolean> {
    const pools = await this.listNodePools();
    if (!pools.some((pool) => pool.name === DEFAULT_NODE_POOL_NAME)) {
      return false;
    }
    const busy = pools.filter((pool) => pool.status !== 'RUNNING');
    if (busy.length > 0) {
      this.logger.debug('Deferring default node pool removal', {
        busy: busy.map((pool) => `${pool.name}:${pool.status}`),
      });
      return false;
    }
    this.logger.info('Removing the default node pool', { cluster: this.config.clusterName });
    await this.deleteNodePool(DEFAULT_NODE_POOL_NAME, options);
    return true;
  }

  async createGlobalAddress(name: string): Promise<void> {
    await this.create(['compute', 'addresses', 'create', name, '--global', '--ip-version=IPV4']);
  }

  async deleteGlobalAddress(name: string): Promise<void> {
    await this.delete(['compute', 'addresses', 'delete', name, '--global']);
  }

  async createSslCertificate(name: string, domain: string): Promise<void> {
    await this.create(['compute', 'ssl-certificates', 'create', name, `--domains=${domain}`, '--global']);
  }

  async deleteSslCertificate(name: string): Promise<void> {
    await this.delete(['compute', 'ssl-certificates', 'delete', name, '--global']);
  }

  /**
   * Writes kubeconfig credentials for the cluster
   */
  async getCredentials(): Promise<void> {
    await this.mutate(['container', 'clusters', 'get-credentials', this.config.clusterName, this.location]);
  }

  /**
   * Shell form of a gcloud command, for remediation messages
   */
  commandLine(args: readonly string[]): string {
    return [GCLOUD, ...args, this.project].join(' ');
  }

  clusterCommandLine(verb: string, ...extra: string[]): string {
    return this.commandLine(['container', 'clusters', verb, this.config.clusterName, this.location, ...extra]);
  }

  // Plumbing

  private get commandOptions(): CommandOptions {
    return {
      timeoutMs: this.options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      ...(this.options.signal ? { signal: this.options.signal } : {}),
    };
  }

  private async readJson(args: string[], options: { project?: boolean } = {}): Promise<unknown> {
    const fullArgs = [...args, '--format=json', ...(options.project === false ? [] : [this.project])];
    const result = await this.runner.run(GCLOUD, fullArgs, this.commandOptions);

    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        return undefined;
      }
      throw commandFailure(GCLOUD, fullArgs, result);
    }

    try {
      const parsed: unknown = JSON.parse(result.stdout || 'null');
      return parsed ?? undefined;
    } catch (error) {
      throw new CommandExecutionError(
        `gcloud ${args.slice(0, 3).join(' ')} returned output that is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        GCLOUD,
        fullArgs,
        0,
        result.stderr
      );
    }
  }

  private parse<T>(validate: (data: unknown) => T | ArkErrors, raw: unknown, what: string): T {
    const parsed = validate(raw);
    if (parsed instanceof type.errors) {
      throw new CommandExecutionError(
        `Unexpected gcloud ${what} output:\n${parsed.summary}`,
        GCLOUD,
        [],
        0,
        ''
      );
    }
    return parsed;
  }

  private async mutate(args: string[]): Promise<void> {
    const fullArgs = [...args, '--quiet', this.project];
    const result = await this.runner.run(GCLOUD, fullArgs, this.commandOptions);
    if (result.exitCode !== 0) {
      throw commandFailure(GCLOUD, fullArgs, result);
    }
  }

  private async create(args: string[]): Promise<void> {
    const fullArgs = [...args, '--quiet', this.project];
    const result = await this.runner.run(GCLOUD, fullArgs, this.commandOptions);
    if (result.exitCode !== 0) {
      if (ALREADY_EXISTS.test(result.stderr)) {
        this.logger.debug('Resource already exists', { args: args.slice(0, 4) });
        return;
      }
      throw commandFailure(GCLOUD, fullArgs, result);
    }
  }

  private async delete(args: string[]): Promise<void> {
    const fullArgs = [...args, '--quiet', this.project];
    const result = await this.runner.run(GCLOUD, fullArgs, this.commandOptions);
    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        this.logger.debug('Resource already deleted', { args: args.slice(0, 4) });
        return;
      }
      throw commandFailure(GCLOUD, fullArgs, result);
    }
  }
}
